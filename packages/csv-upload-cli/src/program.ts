import { Command, InvalidArgumentError } from 'commander';
import type { Geometry } from 'geojson';
import {
  createConsoleLogger,
  isLogLevel,
  runJob,
  type LogLevel,
  type ModuleCapabilityOverrides,
  type ModuleLogger,
  type RunJobOptions
} from '@fieldtraits/module-sdk';
import {
  csvUploadModule,
  geometrySchema,
  geostreamsUploaderJob,
  loadSettings,
  resolveSettingsFromRaw,
  traitsUploaderJob,
  type CsvUploadSecrets,
  type CsvUploadSettings,
  type CsvUploadSettingsOverrides,
  type GeostreamsRunResult,
  type TraitsRunResult
} from '@fieldtraits/csv-upload';
import type { EnvSource } from '@fieldtraits/shared';

type GlobalOptions = {
  geostreamsUrl?: string;
  geostreamsKey?: string;
  betydbUrl?: string;
  betydbKey?: string;
  plotName?: string;
  geometry?: string;
  timeout?: number;
  logLevel: LogLevel;
};

type UploadTarget = 'geostreams' | 'traits';

type RunResult = GeostreamsRunResult | TraitsRunResult;

type CliDependencies = {
  env?: EnvSource;
  capabilityOverrides?: ModuleCapabilityOverrides;
  loggerFactory?: (level: LogLevel) => ModuleLogger;
  setExitCode?: (code: number) => void;
};

function parseTimeout(value: string): number {
  const parsed = /^\d+$/.test(value.trim()) ? Number(value.trim()) : Number.NaN;
  if (!Number.isSafeInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive number of milliseconds.');
  }
  return parsed;
}

function parseLogLevel(value: string): LogLevel {
  if (!isLogLevel(value)) {
    throw new InvalidArgumentError('Expected one of debug, info, warn or error.');
  }
  return value;
}

function parseGeometry(value: string): Geometry {
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`Invalid --geometry: ${reason}`);
  }
  const result = geometrySchema.safeParse(parsed);
  if (!result.success) {
    throw new Error(`Invalid --geometry: ${result.error.issues[0]?.message ?? 'not a GeoJSON geometry'}`);
  }
  return result.data;
}

function buildUploadOverrides(options: GlobalOptions): CsvUploadSettingsOverrides['upload'] {
  const upload: NonNullable<CsvUploadSettingsOverrides['upload']> = {};
  if (options.plotName !== undefined) {
    upload.plotName = options.plotName;
  }
  if (options.geometry !== undefined) {
    upload.geometry = parseGeometry(options.geometry);
  }
  if (options.timeout !== undefined) {
    upload.requestTimeoutMs = options.timeout;
  }
  return upload;
}

/** Environment first, then command line flags. */
function resolveConfig(options: GlobalOptions, env: EnvSource): { settings: CsvUploadSettings; secrets: CsvUploadSecrets } {
  const loaded = loadSettings(env);
  const settings = resolveSettingsFromRaw(
    {
      geostreams: options.geostreamsUrl === undefined ? undefined : { baseUrl: options.geostreamsUrl },
      bety: options.betydbUrl === undefined ? undefined : { baseUrl: options.betydbUrl },
      upload: buildUploadOverrides(options)
    },
    loaded.settings
  );
  return {
    settings,
    secrets: {
      geostreamsKey: options.geostreamsKey ?? loaded.secrets.geostreamsKey,
      betyKey: options.betydbKey ?? loaded.secrets.betyKey
    }
  };
}

async function handleUpload(
  target: UploadTarget,
  files: string[],
  options: GlobalOptions,
  deps: CliDependencies
): Promise<void> {
  const { settings, secrets } = resolveConfig(options, deps.env ?? process.env);
  const logger = (deps.loggerFactory ?? defaultLoggerFactory)(options.logLevel);
  const jobOptions: RunJobOptions<CsvUploadSettings, CsvUploadSecrets> = {
    module: csvUploadModule.metadata,
    settingsDescriptor: csvUploadModule.settings,
    secretsDescriptor: csvUploadModule.secrets,
    capabilityConfig: csvUploadModule.capabilities,
    capabilityOverrides: deps.capabilityOverrides ? [deps.capabilityOverrides] : [],
    settings,
    secrets,
    parameters: { files },
    logger
  };

  const result: RunResult =
    target === 'geostreams' ? await runJob(geostreamsUploaderJob, jobOptions) : await runJob(traitsUploaderJob, jobOptions);

  console.log(JSON.stringify(result, null, 2));
  if (result.code < 0) {
    (deps.setExitCode ?? defaultSetExitCode)(1);
  }
}

function defaultLoggerFactory(level: LogLevel): ModuleLogger {
  return createConsoleLogger({ prefix: 'csv-upload', level });
}

function defaultSetExitCode(code: number): void {
  process.exitCode = code;
}

export function createInterface(deps: CliDependencies = {}): Command {
  const program = new Command();
  program
    .name('csv-upload')
    .description('Upload plot trait CSV files to BETYdb or Geostreams')
    .option('--geostreams-url <url>', 'Geostreams base URL')
    .option('--geostreams-key <key>', 'Geostreams API key')
    .option('--betydb-url <url>', 'BETYdb base URL')
    .option('--betydb-key <key>', 'BETYdb API key')
    .option('--plot-name <name>', 'Sensor name to use for every row instead of a location lookup')
    .option('--geometry <json>', 'GeoJSON geometry for new streams and datapoints')
    .option('--timeout <ms>', 'Per-request timeout in milliseconds', parseTimeout)
    .option('--log-level <level>', 'Log level (debug|info|warn|error)', parseLogLevel, 'info');

  program
    .command('geostreams')
    .description('Create Geostreams datapoints for every row of the CSV files')
    .argument('<files...>', 'Files to process; only .csv files are uploaded')
    .action(async (files: string[]) => {
      await handleUpload('geostreams', files, program.opts<GlobalOptions>(), deps);
    });

  program
    .command('traits')
    .description('Post each CSV file to the BETYdb bulk traits endpoint')
    .argument('<files...>', 'Files to process; only .csv files are uploaded')
    .action(async (files: string[]) => {
      await handleUpload('traits', files, program.opts<GlobalOptions>(), deps);
    });

  return program;
}
