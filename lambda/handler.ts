import 'reflect-metadata';
import { GlueClient } from '@aws-sdk/client-glue';
import type { LoggerService } from '@nestjs/common';
import { GlueJobStarter } from '../src/pipeline/job-starter';
import { loadTriggerConfig } from '../src/pipeline/trigger.config';
import { TriggerDispatcher } from '../src/pipeline/trigger-dispatcher';

// Invoked by the bucket notification declared in infra/index.ts. The Pulumi
// program sets the environment read here; it is read once per cold start.

const config = loadTriggerConfig(process.env);

const quietLogger: LoggerService = {
  log: () => undefined,
  warn: (message: string) => console.warn(message),
  error: (message: string) => console.error(message),
};

const dispatcher = new TriggerDispatcher(
  new GlueJobStarter(
    new GlueClient({ region: config.region, maxAttempts: config.maxAttempts }),
  ),
  config,
  config.logEnabled ? console : quietLogger,
);

if (config.logEnabled && config.logGroupName) {
  console.log(`Trigger for ${config.jobName} logging to ${config.logGroupName}`);
}

export const handler = async (event: unknown) => {
  if (config.logEnabled) {
    console.log('Received S3 event', JSON.stringify(event));
  }
  return dispatcher.dispatch(event);
};

export default handler;
