import type { Geometry } from 'geojson';
import {
  noopLogger,
  type GeostreamsCapability,
  type LatLon,
  type ModuleLogger,
  type SensorTypeProperties,
  type SitesCapability
} from '@fieldtraits/module-sdk';
import { wktToGeoJson } from './geometry';

export interface MatchedSite {
  name: string;
  geometry: Geometry | null;
}

/** Keyed by sensor id, in resolution order. */
export type MatchedSites = Map<string, MatchedSite>;

export interface SensorDefaults {
  region: string;
  type: SensorTypeProperties;
}

export interface ResolverDependencies {
  geostreams: GeostreamsCapability;
  sites: SitesCapability;
  sensor: SensorDefaults;
  logger?: ModuleLogger;
}

export interface ResolveSitesInput {
  plotName?: string | null;
  latLon: LatLon;
  filterDate?: string | null;
}

/**
 * Sensors for a plot: the sensor named `plotName` when it exists, otherwise
 * one sensor per BETYdb site containing `latLon`, created on first use.
 */
export async function resolveSites(deps: ResolverDependencies, input: ResolveSitesInput): Promise<MatchedSites> {
  const logger = deps.logger ?? noopLogger;
  const matched: MatchedSites = new Map();

  if (input.plotName) {
    const sensor = await deps.geostreams.findSensorByName(input.plotName);
    if (sensor) {
      matched.set(sensor.id, { name: sensor.name, geometry: sensor.geometry });
      return matched;
    }
    logger.debug('No sensor found for plot name, looking up sites by location', { plotName: input.plotName });
  }

  const candidates = await deps.sites.findSitesByLatLon(input.latLon, input.filterDate);
  for (const site of candidates) {
    const geometry = wktToGeoJson(site.geometry);
    const existing = await deps.geostreams.findSensorByName(site.sitename);
    if (existing) {
      matched.set(existing.id, { name: site.sitename, geometry });
      continue;
    }

    const sensorId = await deps.geostreams.createSensor({
      name: site.sitename,
      geometry,
      sensorType: deps.sensor.type,
      region: deps.sensor.region
    });
    logger.debug('Created sensor', { sensorId, name: site.sitename });
    matched.set(sensorId, { name: site.sitename, geometry });
  }

  return matched;
}
