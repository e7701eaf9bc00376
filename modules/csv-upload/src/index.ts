export {
  CsvUploadSettingsSchema,
  CsvUploadSecretsSchema,
  defaultSettings,
  defaultSecrets,
  loadSettings,
  resolveSettingsFromRaw,
  resolveSecretsFromRaw,
  type CsvUploadSettings,
  type CsvUploadSecrets,
  type CsvUploadSettingsOverrides,
  type LoadedConfig
} from './config/settings';
export * from './jobs';
export {
  checkContinue,
  countLines,
  isCsvPath,
  MalformedRowError,
  NO_CSV_FILES_CODE,
  NO_CSV_FILES_MESSAGE,
  type TraitRow
} from './runtime/csvFiles';
export { wktToGeoJson, geometrySchema, GeometryConversionError } from './runtime/geometry';
export { resolveSites, type MatchedSite, type MatchedSites, type SensorDefaults } from './runtime/resolver';
export { buildStreamName, submitDatapoint } from './runtime/submitter';
export {
  ADAPTER_VERSION,
  BETYDB_ADAPTER,
  FILE_ERRORS_CODE,
  GEOSTREAMS_ADAPTER,
  MISSING_FILE_CODE,
  createRunAggregator,
  formatDuration,
  type AdapterSummary,
  type FileOutcome,
  type FileErrorKind,
  type GeostreamsRunResult,
  type TraitsRunResult
} from './runtime/runSummary';
export { default as csvUploadModule } from '../module';
