import type { ValueDescriptor } from './types';

export interface SchemaLike<T> {
  parse(value: unknown): T;
}

export interface SchemaDescriptorOptions<T> {
  defaults?: T;
  /** Prefixed to parse failures so the caller can tell settings from parameters. */
  label?: string;
}

export function schemaDescriptor<T>(
  schema: SchemaLike<T>,
  options: SchemaDescriptorOptions<T> = {}
): ValueDescriptor<T> {
  return {
    defaults: options.defaults,
    resolve: (raw) => {
      try {
        return schema.parse(raw ?? options.defaults);
      } catch (error) {
        if (!options.label) {
          throw error;
        }
        const message = error instanceof Error ? error.message : String(error);
        throw new Error(`Invalid ${options.label}: ${message}`);
      }
    }
  } satisfies ValueDescriptor<T>;
}
