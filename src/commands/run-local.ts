import { RunLocalService } from '../pipeline/run-local.service';
import { GlobalOptions, withApplication } from './bootstrap';

export interface RunLocalCommandOptions extends GlobalOptions {
  bucket?: string;
  remote?: boolean;
}

export function runLocalCommand(key: string, options: RunLocalCommandOptions): Promise<void> {
  return withApplication(options, async (app) => {
    const result = await app.get(RunLocalService).run({
      key,
      bucket: options.bucket,
      remote: options.remote,
    });

    if (result.mode === 'remote') {
      console.log(`${result.functionName} responded: ${result.payload}`);
      return;
    }
    console.log(JSON.stringify(result.summary, null, 2));
  });
}
