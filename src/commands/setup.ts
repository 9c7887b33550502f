import { SetupService } from '../operations/setup.service';
import { GlobalOptions, withApplication } from './bootstrap';

export function setupCommand(options: GlobalOptions): Promise<void> {
  return withApplication(options, async (app) => {
    const report = await app.get(SetupService).setup();
    if (report.failures > 0) {
      return false;
    }
    console.log('\nSetup complete. Next steps:');
    console.log('  1. Edit .env with your project name, environment and region');
    console.log('  2. etl-pipeline package');
    console.log('  3. etl-pipeline stack up');
  });
}
