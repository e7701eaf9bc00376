import { readFile } from 'node:fs/promises';
import type { Geometry } from 'geojson';
import {
  createJobHandler,
  withLogContext,
  type GeostreamsCapability,
  type ModuleLogger,
  type SitesCapability
} from '@fieldtraits/module-sdk';
import type { CsvUploadSecrets, CsvUploadSettings } from '../config/settings';
import { checkContinue, fileExists, parseCsvRecords, toLatLon, toTraitRow } from '../runtime/csvFiles';
import { resolveSites, type SensorDefaults } from '../runtime/resolver';
import {
  createRunAggregator,
  fileFailure,
  logFileOutcome,
  toGeostreamsRunResult,
  type FileOutcome,
  type FileProgress,
  type GeostreamsRunResult
} from '../runtime/runSummary';
import { submitDatapoint } from '../runtime/submitter';
import { sensorDefaultsFromSettings, uploadParametersDescriptor, type UploadParameters } from './common';

export interface GeostreamsFileOptions {
  geostreams: GeostreamsCapability;
  sites: SitesCapability;
  sensor: SensorDefaults;
  plotName?: string | null;
  geometry?: Geometry | null;
  logger?: ModuleLogger;
}

/**
 * Resolves and submits every row of one CSV file, stopping at the first
 * failing row. Rows submitted before the failure stay counted.
 */
export async function processGeostreamsFile(path: string, options: GeostreamsFileOptions): Promise<FileOutcome> {
  const progress: FileProgress = { linesLoaded: 0, processed: false };
  try {
    const content = await readFile(path, 'utf8');
    progress.processed = true;

    const records = parseCsvRecords(content, options.logger);
    for (const [index, record] of records.entries()) {
      const row = toTraitRow(record, index + 1);
      const matchedSites = await resolveSites(options, {
        plotName: options.plotName,
        latLon: toLatLon(row),
        filterDate: row.timestamp
      });
      await submitDatapoint(options, {
        streamPrefix: row.trait,
        matchedSites,
        startTime: row.dpTime,
        endTime: row.dpTime,
        metadata: { source: row.source, value: row.value },
        geometry: options.geometry
      });
      progress.linesLoaded += 1;
    }
  } catch (error) {
    return fileFailure(path, error, progress);
  }
  return { ok: true, path, ...progress };
}

export const geostreamsUploaderJob = createJobHandler<
  CsvUploadSettings,
  CsvUploadSecrets,
  GeostreamsRunResult,
  UploadParameters,
  ['geostreams', 'sites']
>({
  name: 'geostreams-uploader',
  displayName: 'Geostreams CSV uploader',
  description: 'Loads plot trait rows into Geostreams, creating sensors and streams on first use.',
  requires: ['geostreams', 'sites'],
  parameters: uploadParametersDescriptor,
  handler: async (context) => {
    const { files } = context.parameters;
    const precondition = checkContinue(files);
    if (!precondition.ok) {
      return { code: precondition.code, error: precondition.error };
    }

    const aggregator = createRunAggregator({ logger: context.logger });
    const sensor = sensorDefaultsFromSettings(context.settings);

    for (const path of files) {
      if (!aggregator.recordFile(path)) {
        continue;
      }
      if (!(await fileExists(path))) {
        return toGeostreamsRunResult(aggregator.missingFile(path));
      }

      const outcome = await processGeostreamsFile(path, {
        geostreams: context.capabilities.geostreams,
        sites: context.capabilities.sites,
        sensor,
        plotName: context.settings.upload.plotName,
        geometry: context.settings.upload.geometry,
        logger: withLogContext(context.logger, { path })
      });
      aggregator.recordOutcome(outcome);
      logFileOutcome(context.logger, outcome);
    }

    return toGeostreamsRunResult(aggregator.finish());
  }
});
