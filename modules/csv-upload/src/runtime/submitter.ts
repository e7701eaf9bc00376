import type { Geometry } from 'geojson';
import { noopLogger, type GeostreamsCapability, type ModuleLogger } from '@fieldtraits/module-sdk';
import type { MatchedSites } from './resolver';

export interface SubmitterDependencies {
  geostreams: GeostreamsCapability;
  logger?: ModuleLogger;
}

export interface SubmitDatapointInput {
  streamPrefix: string;
  matchedSites: MatchedSites;
  startTime: string;
  endTime: string;
  metadata: Record<string, unknown>;
  /** Overrides the sensor geometry for new streams and the stream geometry for datapoints. */
  geometry?: Geometry | null;
}

export function buildStreamName(streamPrefix: string, sensorId: string): string {
  return `${streamPrefix} (${sensorId})`;
}

/** Posts one datapoint per matched sensor, creating the sensor's stream when needed. */
export async function submitDatapoint(deps: SubmitterDependencies, input: SubmitDatapointInput): Promise<void> {
  const logger = deps.logger ?? noopLogger;
  const override = input.geometry ?? null;

  for (const [sensorId, site] of input.matchedSites) {
    const streamName = buildStreamName(input.streamPrefix, sensorId);

    let streamId: string;
    let streamGeometry: Geometry | null;
    const stream = await deps.geostreams.findStreamByName(streamName);
    if (stream) {
      streamId = stream.id;
      streamGeometry = stream.geometry;
    } else {
      streamGeometry = override ?? site.geometry;
      streamId = await deps.geostreams.createStream({ name: streamName, sensorId, geometry: streamGeometry });
      logger.debug('Created stream', { streamId, name: streamName, sensorId });
    }

    await deps.geostreams.createDatapoint({
      streamId,
      startTime: input.startTime,
      endTime: input.endTime,
      geometry: override ?? streamGeometry,
      properties: input.metadata
    });
  }
}
