import { geostreamsUploaderJob } from './geostreamsUploader';
import { traitsUploaderJob } from './traitsUploader';

export const jobs = {
  geostreamsUploader: geostreamsUploaderJob,
  traitsUploader: traitsUploaderJob
};

export type CsvUploadJobKey = keyof typeof jobs;

export { geostreamsUploaderJob, processGeostreamsFile, type GeostreamsFileOptions } from './geostreamsUploader';
export { traitsUploaderJob, processTraitsFile } from './traitsUploader';
export { uploadParametersDescriptor, sensorDefaultsFromSettings, type UploadParameters } from './common';
