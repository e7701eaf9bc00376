import { noopLogger, type ModuleLogger } from './logger';
import {
  createModuleCapabilities,
  mergeCapabilityOverrides,
  resolveModuleCapabilityConfig,
  type CapabilityKey,
  type ModuleCapabilities,
  type ModuleCapabilityConfig,
  type ModuleCapabilityOverrides
} from './runtime/capabilities';
import type { ModuleMetadata, ValueDescriptor } from './types';
import type { JobContext, JobTargetDefinition } from './targets';

function resolveValue<TValue>(
  descriptor: ValueDescriptor<TValue> | undefined,
  raw: unknown,
  label: string
): TValue {
  if (descriptor?.resolve) {
    return descriptor.resolve(raw ?? descriptor.defaults);
  }
  if (raw !== undefined) {
    return raw as TValue;
  }
  if (descriptor?.defaults !== undefined) {
    return descriptor.defaults;
  }
  throw new Error(`${label} not provided and no defaults or resolver defined.`);
}

export interface ModuleContext<TSettings = unknown, TSecrets = unknown> {
  module: ModuleMetadata;
  settings: TSettings;
  secrets: TSecrets;
  capabilities: ModuleCapabilities;
  logger: ModuleLogger;
}

export interface CreateModuleContextOptions<TSettings, TSecrets> {
  module: ModuleMetadata;
  settingsDescriptor?: ValueDescriptor<TSettings>;
  secretsDescriptor?: ValueDescriptor<TSecrets>;
  /** Templates resolved against the settings and secrets of this context. */
  capabilityConfig?: ModuleCapabilityConfig;
  capabilityOverrides?: ModuleCapabilityOverrides[];
  settings?: unknown;
  secrets?: unknown;
  logger?: ModuleLogger;
}

export function createModuleContext<TSettings, TSecrets>(
  options: CreateModuleContextOptions<TSettings, TSecrets>
): ModuleContext<TSettings, TSecrets> {
  const logger = options.logger ?? noopLogger;
  const settings = resolveValue(options.settingsDescriptor, options.settings, 'Module settings');
  const secrets = resolveValue(options.secretsDescriptor, options.secrets ?? {}, 'Module secrets');
  const capabilityConfig = resolveModuleCapabilityConfig(options.capabilityConfig, { settings, secrets });
  const capabilityOverrides = mergeCapabilityOverrides(...(options.capabilityOverrides ?? []));
  const capabilities = createModuleCapabilities(capabilityConfig, capabilityOverrides, logger);

  return {
    module: options.module,
    settings,
    secrets,
    capabilities,
    logger
  } satisfies ModuleContext<TSettings, TSecrets>;
}

export interface CreateJobContextOptions<TSettings, TSecrets, TParameters>
  extends CreateModuleContextOptions<TSettings, TSecrets> {
  job: {
    name: string;
    version?: string;
  };
  parametersDescriptor?: ValueDescriptor<TParameters>;
  parameters?: unknown;
}

export function createJobContext<TSettings, TSecrets, TParameters>(
  options: CreateJobContextOptions<TSettings, TSecrets, TParameters>
): JobContext<TSettings, TSecrets, TParameters> {
  const moduleContext = createModuleContext<TSettings, TSecrets>(options);
  const parameters = resolveValue(options.parametersDescriptor, options.parameters, 'Job parameters');

  return {
    ...moduleContext,
    job: {
      name: options.job.name,
      version: options.job.version ?? options.module.version
    },
    parameters
  } satisfies JobContext<TSettings, TSecrets, TParameters>;
}

export type RunJobOptions<TSettings, TSecrets> = Omit<
  CreateJobContextOptions<TSettings, TSecrets, unknown>,
  'job' | 'parametersDescriptor'
>;

/**
 * Builds a job context for `target` (its parameter descriptor and capability
 * overrides included) and runs the handler.
 */
export async function runJob<
  TSettings,
  TSecrets,
  TParameters,
  TResult,
  TRequired extends readonly CapabilityKey[]
>(
  target: JobTargetDefinition<TSettings, TSecrets, TParameters, TResult, TRequired>,
  options: RunJobOptions<TSettings, TSecrets>
): Promise<TResult> {
  const context = createJobContext<TSettings, TSecrets, TParameters>({
    ...options,
    job: { name: target.name, version: target.version },
    parametersDescriptor: target.parameters,
    capabilityOverrides: [target.capabilityOverrides, ...(options.capabilityOverrides ?? [])].filter(
      (entry): entry is ModuleCapabilityOverrides => entry !== undefined
    )
  });
  return target.handler(context);
}
