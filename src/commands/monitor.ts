import { MonitorService } from '../operations/monitor.service';
import { GlobalOptions, withApplication } from './bootstrap';

export interface MonitorCommandOptions extends GlobalOptions {
  hours: number;
  prefix?: string;
}

export function monitorCommand(options: MonitorCommandOptions): Promise<void> {
  return withApplication(options, async (app) => {
    const report = await app.get(MonitorService).run({
      hours: options.hours,
      prefix: options.prefix,
    });

    const output = report.listing && report.listing.parquetParts > 0 ? 'present' : 'missing';
    console.log(
      `\nfunction: ${report.function}, job: ${report.job}, ` +
        `output: ${report.output} (partitioned parquet ${output})`,
    );
    return report.failures === 0;
  });
}
