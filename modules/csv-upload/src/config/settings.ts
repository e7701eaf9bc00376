import { z } from 'zod';
import { integerVar, jsonVar, loadEnvConfig, stringVar, type EnvSource } from '@fieldtraits/shared';
import { geometrySchema } from '../runtime/geometry';

export const DEFAULT_GEOSTREAMS_URL = 'http://127.0.0.1:9000/clowder';
export const DEFAULT_BETYDB_URL = 'http://127.0.0.1:3000/bety';

export const CsvUploadSettingsSchema = z.object({
  geostreams: z.object({
    baseUrl: z.string().url()
  }),
  bety: z.object({
    baseUrl: z.string().url()
  }),
  upload: z.object({
    /** Sensor to use for every row instead of looking up sites by location. */
    plotName: z.string().min(1).nullable(),
    geometry: geometrySchema.nullable(),
    requestTimeoutMs: z.number().int().positive().nullable()
  }),
  sensor: z.object({
    region: z.string().min(1),
    typeId: z.string().min(1),
    typeTitle: z.string().min(1),
    sensorType: z.number().int()
  })
});

export const CsvUploadSecretsSchema = z.object({
  geostreamsKey: z.string().optional(),
  betyKey: z.string().optional()
});

export type CsvUploadSettings = z.infer<typeof CsvUploadSettingsSchema>;
export type CsvUploadSecrets = z.infer<typeof CsvUploadSecretsSchema>;

const SettingsOverridesSchema = z.object({
  geostreams: CsvUploadSettingsSchema.shape.geostreams.partial().optional(),
  bety: CsvUploadSettingsSchema.shape.bety.partial().optional(),
  upload: CsvUploadSettingsSchema.shape.upload.partial().optional(),
  sensor: CsvUploadSettingsSchema.shape.sensor.partial().optional()
});

export type CsvUploadSettingsOverrides = z.infer<typeof SettingsOverridesSchema>;

export function defaultSettings(): CsvUploadSettings {
  return {
    geostreams: { baseUrl: DEFAULT_GEOSTREAMS_URL },
    bety: { baseUrl: DEFAULT_BETYDB_URL },
    upload: { plotName: null, geometry: null, requestTimeoutMs: null },
    sensor: {
      region: 'Maricopa',
      typeId: 'MAC Field Scanner',
      typeTitle: 'MAC Field Scanner',
      sensorType: 4
    }
  };
}

export function defaultSecrets(): CsvUploadSecrets {
  return { geostreamsKey: undefined, betyKey: undefined };
}

/** Applies partial settings section by section over `base`. */
export function resolveSettingsFromRaw(raw: unknown, base: CsvUploadSettings = defaultSettings()): CsvUploadSettings {
  if (raw === undefined || raw === null) {
    return CsvUploadSettingsSchema.parse(base);
  }
  const overrides = SettingsOverridesSchema.parse(raw);
  return CsvUploadSettingsSchema.parse({
    geostreams: { ...base.geostreams, ...overrides.geostreams },
    bety: { ...base.bety, ...overrides.bety },
    upload: { ...base.upload, ...overrides.upload },
    sensor: { ...base.sensor, ...overrides.sensor }
  });
}

export function resolveSecretsFromRaw(raw: unknown): CsvUploadSecrets {
  return CsvUploadSecretsSchema.parse(raw ?? defaultSecrets());
}

const envSchema = z.object({
  GEOSTREAMS_URL: stringVar({ defaultValue: DEFAULT_GEOSTREAMS_URL }),
  GEOSTREAMS_KEY: stringVar(),
  BETYDB_URL: stringVar({ defaultValue: DEFAULT_BETYDB_URL }),
  BETYDB_KEY: stringVar(),
  CSV_UPLOAD_PLOT_NAME: stringVar(),
  CSV_UPLOAD_GEOMETRY: jsonVar({ schema: geometrySchema }),
  CSV_UPLOAD_REQUEST_TIMEOUT_MS: integerVar({ min: 1 }),
  GEOSTREAMS_SENSOR_REGION: stringVar(),
  GEOSTREAMS_SENSOR_TYPE_ID: stringVar(),
  GEOSTREAMS_SENSOR_TYPE_TITLE: stringVar(),
  GEOSTREAMS_SENSOR_TYPE: integerVar()
});

export interface LoadedConfig {
  settings: CsvUploadSettings;
  secrets: CsvUploadSecrets;
}

export function loadSettings(env?: EnvSource): LoadedConfig {
  const values = loadEnvConfig(envSchema, { env, context: 'csv-upload' });
  const defaults = defaultSettings();

  const settings = resolveSettingsFromRaw({
    geostreams: { baseUrl: values.GEOSTREAMS_URL },
    bety: { baseUrl: values.BETYDB_URL },
    upload: {
      plotName: values.CSV_UPLOAD_PLOT_NAME ?? null,
      geometry: values.CSV_UPLOAD_GEOMETRY ?? null,
      requestTimeoutMs: values.CSV_UPLOAD_REQUEST_TIMEOUT_MS ?? null
    },
    sensor: {
      region: values.GEOSTREAMS_SENSOR_REGION ?? defaults.sensor.region,
      typeId: values.GEOSTREAMS_SENSOR_TYPE_ID ?? defaults.sensor.typeId,
      typeTitle: values.GEOSTREAMS_SENSOR_TYPE_TITLE ?? defaults.sensor.typeTitle,
      sensorType: values.GEOSTREAMS_SENSOR_TYPE ?? defaults.sensor.sensorType
    }
  });

  return {
    settings,
    secrets: resolveSecretsFromRaw({
      geostreamsKey: values.GEOSTREAMS_KEY,
      betyKey: values.BETYDB_KEY
    })
  };
}
