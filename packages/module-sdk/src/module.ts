import type { ModuleCapabilityConfig } from './runtime/capabilities';
import type { ModuleMetadata, ValueDescriptor } from './types';

const SEMVER_PATTERN =
  /^(0|[1-9]\d*)\.(0|[1-9]\d*)\.(0|[1-9]\d*)(?:-[0-9A-Za-z-]+(?:\.[0-9A-Za-z-]+)*)?(?:\+[0-9A-Za-z-]+(?:\.[0-9A-Za-z-]+)*)?$/;

function assertSemver(value: string, label: string): void {
  if (!SEMVER_PATTERN.test(value)) {
    throw new Error(`${label} must be a valid semver string, received "${value}".`);
  }
}

export interface ModuleTargetSummary {
  kind: 'job';
  name: string;
  version?: string;
}

export interface ModuleDefinition<
  TSettings,
  TSecrets,
  TTargets extends Record<string, ModuleTargetSummary> = Record<string, ModuleTargetSummary>
> {
  metadata: ModuleMetadata;
  settings: ValueDescriptor<TSettings>;
  secrets?: ValueDescriptor<TSecrets>;
  capabilities?: ModuleCapabilityConfig;
  targets: TTargets;
}

export function defineModule<TSettings, TSecrets, TTargets extends Record<string, ModuleTargetSummary>>(
  definition: ModuleDefinition<TSettings, TSecrets, TTargets>
): Readonly<ModuleDefinition<TSettings, TSecrets, TTargets>> {
  assertSemver(definition.metadata.version, `Module ${definition.metadata.name} version`);

  const names = new Set<string>();
  for (const target of Object.values(definition.targets)) {
    assertSemver(target.version ?? definition.metadata.version, `${target.kind} target "${target.name}" version`);
    if (names.has(target.name)) {
      throw new Error(`Module ${definition.metadata.name} declares target "${target.name}" more than once.`);
    }
    names.add(target.name);
  }

  return Object.freeze({
    ...definition,
    targets: Object.freeze({ ...definition.targets })
  });
}
