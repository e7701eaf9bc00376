import { z } from 'zod';
import { schemaDescriptor } from '@fieldtraits/module-sdk';
import type { CsvUploadSettings } from '../config/settings';
import type { SensorDefaults } from '../runtime/resolver';

const parametersSchema = z
  .object({
    files: z.array(z.string().min(1, 'file paths must not be empty'))
  })
  .strip();

export type UploadParameters = z.infer<typeof parametersSchema>;

export const uploadParametersDescriptor = schemaDescriptor(parametersSchema, { label: 'upload parameters' });

export function sensorDefaultsFromSettings(settings: CsvUploadSettings): SensorDefaults {
  return {
    region: settings.sensor.region,
    type: {
      id: settings.sensor.typeId,
      title: settings.sensor.typeTitle,
      sensorType: settings.sensor.sensorType
    }
  };
}
