export interface ModuleMetadata {
  /** Machine-readable name, also the key of the run summary, e.g. `terra.geostreams`. */
  name: string;
  /** Semantic version reported with every run. */
  version: string;
  displayName?: string;
  description?: string;
}

export interface ValueDescriptor<TValue> {
  /** Used when the caller supplies nothing. */
  defaults?: TValue;
  /** Coerces raw input (parsed JSON, CLI flags, environment) into the typed value. */
  resolve?: (raw: unknown) => TValue;
}
