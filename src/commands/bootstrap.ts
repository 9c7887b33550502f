import { INestApplicationContext, LogLevel, Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from '../app.module';
import { errorMessage } from '../common/errors';

export interface GlobalOptions {
  verbose?: boolean;
}

export function logLevels(options: GlobalOptions): LogLevel[] {
  return options.verbose
    ? ['log', 'warn', 'error', 'debug', 'verbose']
    : ['log', 'warn', 'error'];
}

/**
 * Runs one CLI action inside a Nest application context and closes it
 * afterwards. Failures are logged and turned into exit code 1; the action
 * returns `false` to report a handled failure the same way.
 */
export async function withApplication(
  options: GlobalOptions,
  action: (app: INestApplicationContext) => Promise<boolean | void>,
): Promise<void> {
  const logger = new Logger('etl-pipeline');
  let app: INestApplicationContext | undefined;

  try {
    app = await NestFactory.createApplicationContext(AppModule, {
      logger: logLevels(options),
      abortOnError: false,
    });
    const succeeded = await action(app);
    if (succeeded === false) {
      process.exitCode = 1;
    }
  } catch (error) {
    logger.error(errorMessage(error));
    if (options.verbose && error instanceof Error && error.stack) {
      logger.debug(error.stack);
    }
    process.exitCode = 1;
  } finally {
    await app?.close();
  }
}
