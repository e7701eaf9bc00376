import type { Geometry } from 'geojson';
import { CapabilityRequestError } from '../errors';
import { httpRequest, type FetchLike } from '../internal/http';

export interface GeostreamsCapabilityConfig {
  baseUrl: string;
  key?: string | null;
  timeoutMs?: number | null;
  fetchImpl?: FetchLike;
}

export interface SensorRecord {
  id: string;
  name: string;
  geometry: Geometry | null;
}

export interface StreamRecord {
  id: string;
  name: string;
  geometry: Geometry | null;
  sensorId: string | null;
}

export interface SensorTypeProperties {
  id: string;
  title: string;
  sensorType: number;
}

export interface CreateSensorInput {
  name: string;
  geometry: Geometry;
  sensorType: SensorTypeProperties;
  region: string;
}

export interface CreateStreamInput {
  name: string;
  sensorId: string;
  geometry: Geometry | null;
  properties?: Record<string, unknown>;
}

export interface CreateDatapointInput {
  streamId: string;
  startTime: string;
  endTime: string;
  geometry: Geometry | null;
  properties: Record<string, unknown>;
}

export interface GeostreamsCapability {
  findSensorByName(name: string): Promise<SensorRecord | null>;
  createSensor(input: CreateSensorInput): Promise<string>;
  findStreamByName(name: string): Promise<StreamRecord | null>;
  createStream(input: CreateStreamInput): Promise<string>;
  createDatapoint(input: CreateDatapointInput): Promise<string>;
}

const API_PREFIX = '/api/geostreams';

function toRecord(value: unknown): Record<string, unknown> | null {
  if (value && typeof value === 'object' && !Array.isArray(value)) {
    return value as Record<string, unknown>;
  }
  return null;
}

function toIdentifier(value: unknown): string | null {
  if (typeof value === 'string' && value.trim().length > 0) {
    return value.trim();
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  return null;
}

export function isGeometry(value: unknown): value is Geometry {
  const record = toRecord(value);
  if (!record || typeof record.type !== 'string') {
    return false;
  }
  if (record.type === 'GeometryCollection') {
    return Array.isArray(record.geometries);
  }
  return Array.isArray(record.coordinates);
}

function toGeometry(value: unknown): Geometry | null {
  return isGeometry(value) ? value : null;
}

export function createGeostreamsCapability(config: GeostreamsCapabilityConfig): GeostreamsCapability {
  const baseUrl = config.baseUrl.replace(/\/+$/, '');

  /**
   * The store is free to ignore the name filter, so the listing is scanned for
   * an exact name match rather than trusting the first element.
   */
  async function findByName(
    resource: 'sensors' | 'streams',
    filterParam: string,
    name: string
  ): Promise<{ id: string; record: Record<string, unknown> } | null> {
    const path = `${API_PREFIX}/${resource}`;
    const response = await httpRequest<unknown>({
      baseUrl,
      path,
      method: 'GET',
      query: { [filterParam]: name },
      apiKey: config.key,
      timeoutMs: config.timeoutMs,
      fetchImpl: config.fetchImpl,
      expectJson: true
    });
    const unexpected = (message: string) =>
      CapabilityRequestError.unexpectedResponse({
        method: 'GET',
        url: `${baseUrl}${path}`,
        status: response.status,
        message,
        metadata: { capability: 'geostreams', resource, name }
      });

    // Anything but a listing must not read as "not found", or the caller creates a duplicate.
    if (!Array.isArray(response.data)) {
      throw unexpected(`Geostreams ${resource} lookup did not return a list`);
    }
    for (const item of response.data) {
      const record = toRecord(item);
      if (record && record.name === name) {
        const id = toIdentifier(record.id);
        if (!id) {
          throw unexpected(`Geostreams returned ${resource} "${name}" without an id`);
        }
        return { id, record };
      }
    }
    return null;
  }

  async function create(resource: 'sensors' | 'streams' | 'datapoints', body: Record<string, unknown>): Promise<string> {
    const path = `${API_PREFIX}/${resource}`;
    const response = await httpRequest<unknown>({
      baseUrl,
      path,
      method: 'POST',
      body,
      apiKey: config.key,
      timeoutMs: config.timeoutMs,
      fetchImpl: config.fetchImpl,
      expectJson: true
    });
    const id = toIdentifier(toRecord(response.data)?.id);
    if (!id) {
      throw CapabilityRequestError.unexpectedResponse({
        method: 'POST',
        url: `${baseUrl}${path}`,
        status: response.status,
        message: `Geostreams did not return an id for the created ${resource.replace(/s$/, '')}`,
        metadata: { capability: 'geostreams', resource }
      });
    }
    return id;
  }

  return {
    async findSensorByName(name: string): Promise<SensorRecord | null> {
      const found = await findByName('sensors', 'sensor_name', name);
      if (!found) {
        return null;
      }
      const { id, record } = found;
      return { id, name, geometry: toGeometry(record.geometry) } satisfies SensorRecord;
    },

    async createSensor(input: CreateSensorInput): Promise<string> {
      return create('sensors', {
        name: input.name,
        type: 'Point',
        geometry: input.geometry,
        properties: {
          popupContent: input.name,
          type: {
            id: input.sensorType.id,
            title: input.sensorType.title,
            sensorType: input.sensorType.sensorType
          },
          name: input.name,
          region: input.region
        }
      });
    },

    async findStreamByName(name: string): Promise<StreamRecord | null> {
      const found = await findByName('streams', 'stream_name', name);
      if (!found) {
        return null;
      }
      const { id, record } = found;
      return {
        id,
        name,
        geometry: toGeometry(record.geometry),
        sensorId: toIdentifier(record.sensor_id)
      } satisfies StreamRecord;
    },

    async createStream(input: CreateStreamInput): Promise<string> {
      return create('streams', {
        name: input.name,
        type: 'Feature',
        geometry: input.geometry,
        properties: input.properties ?? {},
        sensor_id: input.sensorId
      });
    },

    async createDatapoint(input: CreateDatapointInput): Promise<string> {
      return create('datapoints', {
        start_time: input.startTime,
        end_time: input.endTime,
        type: 'Point',
        geometry: input.geometry,
        properties: input.properties,
        stream_id: input.streamId
      });
    }
  } satisfies GeostreamsCapability;
}
