export type { ModuleMetadata, ValueDescriptor } from './types';
export type {
  ModuleContext,
  CreateModuleContextOptions,
  CreateJobContextOptions,
  RunJobOptions
} from './context';
export { createModuleContext, createJobContext, runJob } from './context';
export type {
  ModuleCapabilities,
  ModuleCapabilityConfig,
  ResolvedModuleCapabilityConfig,
  CapabilityConfigTemplate,
  CapabilityValueTemplate,
  CapabilityValueReference,
  CapabilityRefOptions,
  ModuleCapabilityOverrides,
  CapabilityOverride,
  CapabilityOverrideFactory,
  CapabilityKey,
  CapabilitiesWith
} from './runtime/capabilities';
export {
  createModuleCapabilities,
  mergeCapabilityOverrides,
  resolveModuleCapabilityConfig,
  settingsRef,
  secretsRef,
  requireCapabilities
} from './runtime/capabilities';
export { defineModule, type ModuleDefinition, type ModuleTargetSummary } from './module';
export {
  createJobHandler,
  type JobContext,
  type JobHandler,
  type JobTargetDefinition,
  type RequiredJobContext
} from './targets';
export type { ModuleLogger, LogLevel, LogMeta, ConsoleLoggerOptions } from './logger';
export { noopLogger, createConsoleLogger, withLogContext, isLogLevel } from './logger';
export { schemaDescriptor, type SchemaLike, type SchemaDescriptorOptions } from './descriptors';
export {
  createGeostreamsCapability,
  createTraitsCapability,
  createSitesCapability,
  isGeometry,
  isTraitsFileType
} from './capabilities';
export type {
  GeostreamsCapability,
  GeostreamsCapabilityConfig,
  SensorRecord,
  StreamRecord,
  SensorTypeProperties,
  CreateSensorInput,
  CreateStreamInput,
  CreateDatapointInput,
  TraitsCapability,
  TraitsCapabilityConfig,
  TraitsFileType,
  SubmitTraitsInput,
  SitesCapability,
  SitesCapabilityConfig,
  SiteCandidate,
  LatLon
} from './capabilities';
export {
  CapabilityRequestError,
  describeError,
  type CapabilityErrorCode,
  type CapabilityErrorMetadata
} from './errors';
