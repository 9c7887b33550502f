import { UploadService } from '../operations/upload.service';
import { GlobalOptions, withApplication } from './bootstrap';

export interface UploadCommandOptions extends GlobalOptions {
  key?: string;
}

export function uploadCommand(file: string, options: UploadCommandOptions): Promise<void> {
  return withApplication(options, async (app) => {
    const result = await app.get(UploadService).upload(file, options.key);
    console.log(`Uploaded ${file} to s3://${result.bucket}/${result.key}`);
    if (result.triggers) {
      console.log('The pipeline will start shortly; follow it with: etl-pipeline monitor');
    }
  });
}
