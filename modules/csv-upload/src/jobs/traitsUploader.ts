import { readFile } from 'node:fs/promises';
import { createJobHandler, noopLogger, type ModuleLogger, type TraitsCapability } from '@fieldtraits/module-sdk';
import type { CsvUploadSecrets, CsvUploadSettings } from '../config/settings';
import { checkContinue, countLines, fileExists } from '../runtime/csvFiles';
import {
  createRunAggregator,
  fileFailure,
  logFileOutcome,
  toTraitsRunResult,
  type FileOutcome,
  type FileProgress,
  type TraitsRunResult
} from '../runtime/runSummary';
import { uploadParametersDescriptor, type UploadParameters } from './common';

/**
 * Posts a CSV file to BETYdb in one request, byte for byte. Empty files are
 * skipped.
 */
export async function processTraitsFile(
  path: string,
  traits: TraitsCapability,
  logger: ModuleLogger = noopLogger
): Promise<FileOutcome> {
  const progress: FileProgress = { linesLoaded: 0, processed: false };
  try {
    const content = await readFile(path);
    // one char per byte, enough to find the line breaks
    const lines = countLines(content.toString('latin1'));
    if (lines === 0) {
      return { ok: true, path, ...progress };
    }

    progress.processed = true;
    // header
    progress.linesLoaded = lines - 1;
    const ids = await traits.submitTraits({ content, fileType: 'csv' });
    logger.debug('BETYdb accepted traits', { path, traits: ids?.length ?? 0 });
  } catch (error) {
    return fileFailure(path, error, progress);
  }
  return { ok: true, path, ...progress };
}

export const traitsUploaderJob = createJobHandler<
  CsvUploadSettings,
  CsvUploadSecrets,
  TraitsRunResult,
  UploadParameters,
  ['traits']
>({
  name: 'traits-uploader',
  displayName: 'BETYdb traits uploader',
  description: 'Posts trait CSV files to the BETYdb bulk traits endpoint.',
  requires: ['traits'],
  parameters: uploadParametersDescriptor,
  handler: async (context) => {
    const { files } = context.parameters;
    const precondition = checkContinue(files);
    if (!precondition.ok) {
      return { code: precondition.code, error: precondition.error };
    }

    const aggregator = createRunAggregator({ logger: context.logger });
    for (const path of files) {
      if (!aggregator.recordFile(path)) {
        continue;
      }
      if (!(await fileExists(path))) {
        return toTraitsRunResult(aggregator.missingFile(path));
      }

      const outcome = await processTraitsFile(path, context.capabilities.traits, context.logger);
      aggregator.recordOutcome(outcome);
      logFileOutcome(context.logger, outcome);
    }

    return toTraitsRunResult(aggregator.finish());
  }
});
