import type { ModuleContext } from './context';
import {
  requireCapabilities,
  type CapabilitiesWith,
  type CapabilityKey,
  type ModuleCapabilityOverrides
} from './runtime/capabilities';
import type { ValueDescriptor } from './types';

export interface JobContext<TSettings, TSecrets, TParameters = Record<string, unknown>>
  extends ModuleContext<TSettings, TSecrets> {
  job: {
    name: string;
    version: string;
  };
  parameters: TParameters;
}

/** Job context whose `capabilities` are guaranteed to carry every key in `TRequired`. */
export type RequiredJobContext<
  TSettings,
  TSecrets,
  TParameters,
  TRequired extends readonly CapabilityKey[]
> = JobContext<TSettings, TSecrets, TParameters> & {
  capabilities: CapabilitiesWith<TRequired[number]>;
};

export type JobHandler<
  TSettings,
  TSecrets,
  TParameters,
  TResult,
  TRequired extends readonly CapabilityKey[] = []
> = (context: RequiredJobContext<TSettings, TSecrets, TParameters, TRequired>) => Promise<TResult> | TResult;

export interface JobTargetDefinition<
  TSettings,
  TSecrets,
  TParameters,
  TResult,
  TRequired extends readonly CapabilityKey[] = []
> {
  kind: 'job';
  name: string;
  version?: string;
  displayName?: string;
  description?: string;
  capabilityOverrides?: ModuleCapabilityOverrides;
  requires?: TRequired;
  parameters?: ValueDescriptor<TParameters>;
  handler: (context: JobContext<TSettings, TSecrets, TParameters>) => Promise<TResult>;
}

export interface CreateJobHandlerOptions<
  TSettings,
  TSecrets,
  TParameters,
  TResult,
  TRequired extends readonly CapabilityKey[] = []
> {
  name: string;
  version?: string;
  displayName?: string;
  description?: string;
  capabilityOverrides?: ModuleCapabilityOverrides;
  requires?: TRequired;
  parameters?: ValueDescriptor<TParameters>;
  handler: JobHandler<TSettings, TSecrets, TParameters, TResult, TRequired>;
}

export function createJobHandler<
  TSettings = Record<string, unknown>,
  TSecrets = Record<string, unknown>,
  TResult = unknown,
  TParameters = Record<string, unknown>,
  TRequired extends readonly CapabilityKey[] = []
>(
  options: CreateJobHandlerOptions<TSettings, TSecrets, TParameters, TResult, TRequired>
): JobTargetDefinition<TSettings, TSecrets, TParameters, TResult, TRequired> {
  const requires = options.requires;
  const label = `job ${options.name}`;

  const handler = async (context: JobContext<TSettings, TSecrets, TParameters>): Promise<TResult> => {
    const capabilities = context.capabilities;
    requireCapabilities<readonly TRequired[number][]>(capabilities, requires ?? [], label);
    return options.handler({ ...context, capabilities });
  };

  return {
    kind: 'job',
    name: options.name,
    version: options.version,
    displayName: options.displayName,
    description: options.description,
    capabilityOverrides: options.capabilityOverrides,
    requires,
    parameters: options.parameters,
    handler
  };
}
