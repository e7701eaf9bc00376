import {
  createGeostreamsCapability,
  createSitesCapability,
  createTraitsCapability,
  type GeostreamsCapability,
  type GeostreamsCapabilityConfig,
  type SitesCapability,
  type SitesCapabilityConfig,
  type TraitsCapability,
  type TraitsCapabilityConfig
} from '../capabilities';
import { noopLogger, type ModuleLogger } from '../logger';

export interface CapabilityValueReference<T = unknown> {
  $ref: string;
  fallback?: CapabilityValueTemplate<T>;
  optional?: boolean;
}

export interface CapabilityRefOptions<T> {
  fallback?: CapabilityValueTemplate<T>;
  optional?: boolean;
}

function createCapabilityReference<T>(
  scope: 'settings' | 'secrets',
  path: string,
  options: CapabilityRefOptions<T> = {}
): CapabilityValueReference<T> {
  const trimmedPath = path.trim();
  if (!trimmedPath) {
    throw new Error('Capability reference path must not be empty');
  }

  const reference: CapabilityValueReference<T> = {
    $ref: `${scope}.${trimmedPath}`
  };

  if (options.fallback !== undefined) {
    reference.fallback = options.fallback;
  }

  if (options.optional !== undefined) {
    reference.optional = options.optional;
  } else if (scope === 'secrets') {
    reference.optional = true;
  }

  return reference;
}

export function settingsRef<T = unknown>(
  path: string,
  options: CapabilityRefOptions<T> = {}
): CapabilityValueReference<T> {
  return createCapabilityReference('settings', path, options);
}

export function secretsRef<T = unknown>(
  path: string,
  options: CapabilityRefOptions<T> = {}
): CapabilityValueReference<T> {
  return createCapabilityReference('secrets', path, options);
}

export type CapabilityValueTemplate<T> = T | CapabilityValueReference<T>;

export type CapabilityConfigTemplate<TConfig> = {
  [K in keyof TConfig]?: CapabilityValueTemplate<TConfig[K]>;
};

export interface ModuleCapabilityConfig {
  geostreams?: CapabilityConfigTemplate<GeostreamsCapabilityConfig>;
  traits?: CapabilityConfigTemplate<TraitsCapabilityConfig>;
  sites?: CapabilityConfigTemplate<SitesCapabilityConfig>;
}

export interface ResolvedModuleCapabilityConfig {
  geostreams?: GeostreamsCapabilityConfig;
  traits?: TraitsCapabilityConfig;
  sites?: SitesCapabilityConfig;
}

export type CapabilityOverrideFactory<TCapability, TConfig> = (
  config: TConfig | undefined,
  createDefault: () => TCapability | undefined
) => TCapability | undefined;

/** `null` disables a capability, a function wraps or replaces the default one. */
export type CapabilityOverride<TCapability, TConfig> =
  | TCapability
  | CapabilityOverrideFactory<TCapability, TConfig>
  | null
  | undefined;

export interface ModuleCapabilityOverrides {
  geostreams?: CapabilityOverride<GeostreamsCapability, GeostreamsCapabilityConfig>;
  traits?: CapabilityOverride<TraitsCapability, TraitsCapabilityConfig>;
  sites?: CapabilityOverride<SitesCapability, SitesCapabilityConfig>;
}

export interface ModuleCapabilities {
  geostreams?: GeostreamsCapability;
  traits?: TraitsCapability;
  sites?: SitesCapability;
}

type ResolveContext = {
  settings: unknown;
  secrets: unknown;
};

function isCapabilityValueReference(value: unknown): value is CapabilityValueReference {
  if (!value || typeof value !== 'object' || Array.isArray(value)) {
    return false;
  }
  return '$ref' in value && typeof value.$ref === 'string';
}

function getReferenceValue(reference: string, context: ResolveContext): unknown {
  const trimmed = reference.trim();
  if (!trimmed) {
    throw new Error('Capability reference path must not be empty');
  }
  const segments = trimmed.split('.');
  const scope = segments.shift();
  let current: unknown;
  if (scope === 'settings') {
    current = context.settings;
  } else if (scope === 'secrets') {
    current = context.secrets;
  } else {
    throw new Error(`Capability reference must start with "settings" or "secrets": ${reference}`);
  }
  for (const rawSegment of segments) {
    const segment = rawSegment.trim();
    if (!segment || current === null || current === undefined || typeof current !== 'object') {
      return undefined;
    }
    current = (current as Record<string, unknown>)[segment];
  }
  return current;
}

function resolveTemplate(value: unknown, context: ResolveContext, label: string): unknown {
  if (!isCapabilityValueReference(value)) {
    return value;
  }
  const raw = getReferenceValue(value.$ref, context);
  if (raw === undefined || raw === null) {
    if (value.fallback !== undefined) {
      return resolveTemplate(value.fallback, context, `${label} (fallback)`);
    }
    if (value.optional) {
      return undefined;
    }
    throw new Error(`Capability reference "${value.$ref}" resolved to undefined for ${label}`);
  }
  return raw;
}

function resolveCapabilitySection<TConfig extends { baseUrl: string }>(
  template: CapabilityConfigTemplate<TConfig> | undefined,
  context: ResolveContext,
  label: string
): TConfig | undefined {
  if (!template) {
    return undefined;
  }
  const result: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(template)) {
    const resolved = resolveTemplate(entry, context, `${label}.${key}`);
    if (resolved !== undefined) {
      result[key] = resolved;
    }
  }
  if (typeof result.baseUrl !== 'string' || !result.baseUrl) {
    throw new Error(`${label}.baseUrl must resolve to a non-empty string`);
  }
  return result as TConfig;
}

export function resolveModuleCapabilityConfig(
  config: ModuleCapabilityConfig | undefined,
  context: ResolveContext
): ResolvedModuleCapabilityConfig {
  if (!config) {
    return {};
  }
  const resolved: ResolvedModuleCapabilityConfig = {};

  const geostreams = resolveCapabilitySection(config.geostreams, context, 'capabilities.geostreams');
  if (geostreams !== undefined) {
    resolved.geostreams = geostreams;
  }

  const traits = resolveCapabilitySection(config.traits, context, 'capabilities.traits');
  if (traits !== undefined) {
    resolved.traits = traits;
  }

  const sites = resolveCapabilitySection(config.sites, context, 'capabilities.sites');
  if (sites !== undefined) {
    resolved.sites = sites;
  }

  return resolved;
}

function resolveCapability<TCapability, TConfig>(
  config: TConfig | undefined,
  override: CapabilityOverride<TCapability, TConfig>,
  factory: (config: TConfig) => TCapability
): TCapability | undefined {
  if (typeof override === 'function') {
    const overrideFactory = override as CapabilityOverrideFactory<TCapability, TConfig>;
    return overrideFactory(config, () => (config ? factory(config) : undefined));
  }
  if (override === null) {
    return undefined;
  }
  if (override !== undefined) {
    return override;
  }
  if (!config) {
    return undefined;
  }
  return factory(config);
}

export function createModuleCapabilities(
  config: ResolvedModuleCapabilityConfig = {},
  overrides: ModuleCapabilityOverrides = {},
  logger: ModuleLogger = noopLogger
): ModuleCapabilities {
  return {
    geostreams: resolveCapability(config.geostreams, overrides.geostreams, createGeostreamsCapability),
    traits: resolveCapability(config.traits, overrides.traits, (traitsConfig) =>
      createTraitsCapability({ ...traitsConfig, logger: traitsConfig.logger ?? logger })
    ),
    sites: resolveCapability(config.sites, overrides.sites, createSitesCapability)
  } satisfies ModuleCapabilities;
}

export function mergeCapabilityOverrides(
  ...values: Array<ModuleCapabilityOverrides | undefined>
): ModuleCapabilityOverrides {
  const merged: ModuleCapabilityOverrides = {};
  for (const entry of values) {
    if (!entry) {
      continue;
    }
    if (entry.geostreams !== undefined) {
      merged.geostreams = entry.geostreams;
    }
    if (entry.traits !== undefined) {
      merged.traits = entry.traits;
    }
    if (entry.sites !== undefined) {
      merged.sites = entry.sites;
    }
  }
  return merged;
}

export type CapabilityKey = keyof ModuleCapabilities & string;

export type CapabilitiesWith<T extends CapabilityKey> = ModuleCapabilities & {
  [K in T]-?: NonNullable<ModuleCapabilities[K]>;
};

export function requireCapabilities<TKeys extends readonly CapabilityKey[]>(
  capabilities: ModuleCapabilities,
  required: TKeys,
  contextLabel = 'module'
): asserts capabilities is CapabilitiesWith<TKeys[number]> {
  for (const key of required) {
    if (!capabilities[key]) {
      throw new Error(`${contextLabel} requires capability "${key}" but it was not configured.`);
    }
  }
}
