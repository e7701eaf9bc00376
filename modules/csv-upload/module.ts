import { defineModule, secretsRef, settingsRef } from '@fieldtraits/module-sdk';
import type { CsvUploadSecrets, CsvUploadSettings } from './src/config/settings';
import { defaultSecrets, defaultSettings, resolveSecretsFromRaw, resolveSettingsFromRaw } from './src/config/settings';
import { jobs } from './src/jobs';

const requestTimeoutMs = settingsRef<number>('upload.requestTimeoutMs', { optional: true });

export default defineModule<CsvUploadSettings, CsvUploadSecrets, typeof jobs>({
  metadata: {
    name: 'csv-upload',
    version: '2.0.0',
    displayName: 'Plot trait CSV uploader',
    description: 'Uploads plot trait CSV files to BETYdb or to Geostreams.'
  },
  settings: {
    defaults: defaultSettings(),
    resolve: (raw) => resolveSettingsFromRaw(raw)
  },
  secrets: {
    defaults: defaultSecrets(),
    resolve: (raw) => resolveSecretsFromRaw(raw)
  },
  capabilities: {
    geostreams: {
      baseUrl: settingsRef('geostreams.baseUrl'),
      key: secretsRef('geostreamsKey'),
      timeoutMs: requestTimeoutMs
    },
    traits: {
      baseUrl: settingsRef('bety.baseUrl'),
      key: secretsRef('betyKey'),
      timeoutMs: requestTimeoutMs
    },
    sites: {
      baseUrl: settingsRef('bety.baseUrl'),
      key: secretsRef('betyKey'),
      timeoutMs: requestTimeoutMs
    }
  },
  targets: jobs
});
