import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import type { Geometry } from 'geojson';
import {
  CapabilityRequestError,
  type CreateDatapointInput,
  type CreateSensorInput,
  type CreateStreamInput,
  type GeostreamsCapability,
  type LatLon,
  type SiteCandidate,
  type SitesCapability,
  type SubmitTraitsInput,
  type TraitsCapability
} from '@fieldtraits/module-sdk';

export interface StoredSensor {
  id: string;
  name: string;
  geometry: Geometry | null;
}

export interface StoredStream {
  id: string;
  name: string;
  sensorId: string;
  geometry: Geometry | null;
}

export interface StoredDatapoint extends CreateDatapointInput {
  id: string;
}

export type FakeOperation = 'findSensor' | 'createSensor' | 'findStream' | 'createStream' | 'createDatapoint';

export interface FakeGeostreamsOptions {
  sensors?: StoredSensor[];
  streams?: StoredStream[];
  /** Returning true makes the call fail with a 500. */
  failWhen?: (operation: FakeOperation, label: string) => boolean;
}

export interface FakeGeostreams extends GeostreamsCapability {
  sensors: StoredSensor[];
  streams: StoredStream[];
  datapoints: StoredDatapoint[];
  sensorInputs: CreateSensorInput[];
  /** `operation:label` for every call, in order. */
  calls: string[];
}

function failure(operation: FakeOperation, label: string): CapabilityRequestError {
  return new CapabilityRequestError({
    method: operation.startsWith('find') ? 'GET' : 'POST',
    url: `http://store.test/${operation}`,
    status: 500,
    body: `failed ${label}`
  });
}

export function createFakeGeostreams(options: FakeGeostreamsOptions = {}): FakeGeostreams {
  const sensors = [...(options.sensors ?? [])];
  const streams = [...(options.streams ?? [])];
  const datapoints: StoredDatapoint[] = [];
  const sensorInputs: CreateSensorInput[] = [];
  const calls: string[] = [];
  let nextId = 1;

  const record = (operation: FakeOperation, label: string) => {
    calls.push(`${operation}:${label}`);
    if (options.failWhen?.(operation, label)) {
      throw failure(operation, label);
    }
  };

  return {
    sensors,
    streams,
    datapoints,
    sensorInputs,
    calls,
    async findSensorByName(name: string) {
      record('findSensor', name);
      return sensors.find((sensor) => sensor.name === name) ?? null;
    },
    async createSensor(input: CreateSensorInput) {
      record('createSensor', input.name);
      const id = `sensor-${nextId++}`;
      sensors.push({ id, name: input.name, geometry: input.geometry });
      sensorInputs.push(input);
      return id;
    },
    async findStreamByName(name: string) {
      record('findStream', name);
      const stream = streams.find((entry) => entry.name === name);
      return stream ? { ...stream } : null;
    },
    async createStream(input: CreateStreamInput) {
      record('createStream', input.name);
      const id = `stream-${nextId++}`;
      streams.push({ id, name: input.name, sensorId: input.sensorId, geometry: input.geometry });
      return id;
    },
    async createDatapoint(input: CreateDatapointInput) {
      record('createDatapoint', input.streamId);
      const id = `datapoint-${nextId++}`;
      datapoints.push({ ...input, id });
      return id;
    }
  };
}

export interface FakeSites extends SitesCapability {
  lookups: Array<{ latLon: LatLon; filterDate: string | null | undefined }>;
}

export function createFakeSites(candidates: SiteCandidate[] = []): FakeSites {
  const lookups: FakeSites['lookups'] = [];
  return {
    lookups,
    async findSitesByLatLon(latLon: LatLon, filterDate?: string | null) {
      lookups.push({ latLon, filterDate });
      return candidates.map((candidate) => ({ ...candidate }));
    }
  };
}

export interface FakeTraits extends TraitsCapability {
  uploads: Array<{ content: string; fileType: string }>;
}

export function createFakeTraits(options: { fail?: (content: string) => boolean } = {}): FakeTraits {
  const uploads: FakeTraits['uploads'] = [];
  return {
    uploads,
    async submitTraits(input: SubmitTraitsInput) {
      const content = typeof input.content === 'string' ? input.content : Buffer.from(input.content).toString('utf8');
      uploads.push({ content, fileType: input.fileType });
      if (options.fail?.(content)) {
        throw new CapabilityRequestError({
          method: 'POST',
          url: 'http://bety.test/api/v1/traits.csv',
          status: 400,
          body: 'rejected'
        });
      }
      return [`trait-${uploads.length}`];
    }
  };
}

export const HEADER = 'lon,lat,dp_time,timestamp,source,value,trait';

export interface FixtureDir {
  dir: string;
  write(name: string, content: string | Uint8Array): Promise<string>;
  resolve(name: string): string;
  cleanup(): Promise<void>;
}

export async function createFixtureDir(): Promise<FixtureDir> {
  const dir = await mkdtemp(path.join(tmpdir(), 'csv-upload-'));
  return {
    dir,
    async write(name, content) {
      const target = path.join(dir, name);
      await writeFile(target, content, 'utf8');
      return target;
    },
    resolve(name) {
      return path.join(dir, name);
    },
    async cleanup() {
      await rm(dir, { recursive: true, force: true });
    }
  };
}
