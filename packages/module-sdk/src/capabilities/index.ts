export type {
  GeostreamsCapability,
  GeostreamsCapabilityConfig,
  SensorRecord,
  StreamRecord,
  SensorTypeProperties,
  CreateSensorInput,
  CreateStreamInput,
  CreateDatapointInput
} from './geostreams';
export { createGeostreamsCapability, isGeometry } from './geostreams';
export type { TraitsCapability, TraitsCapabilityConfig, TraitsFileType, SubmitTraitsInput } from './traits';
export { createTraitsCapability, isTraitsFileType } from './traits';
export type { SitesCapability, SitesCapabilityConfig, SiteCandidate, LatLon } from './sites';
export { createSitesCapability } from './sites';
