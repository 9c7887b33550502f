#!/usr/bin/env node
import 'reflect-metadata';
import { Command, InvalidArgumentError } from 'commander';
import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { GlobalOptions } from './commands/bootstrap';
import { importResourcesCommand } from './commands/import-resources';
import { MonitorCommandOptions, monitorCommand } from './commands/monitor';
import { packageCommand } from './commands/package';
import { RunLocalCommandOptions, runLocalCommand } from './commands/run-local';
import { setupCommand } from './commands/setup';
import { parseStackAction, stackCommand } from './commands/stack';
import { UploadCommandOptions, uploadCommand } from './commands/upload';

// src/ when run from sources, dist/src/ once built.
function readVersion(): string {
  const manifest = [join(__dirname, '..', 'package.json'), join(__dirname, '..', '..', 'package.json')]
    .find((candidate) => existsSync(candidate));
  if (!manifest) {
    return '0.0.0';
  }
  const parsed: { version?: string } = JSON.parse(readFileSync(manifest, 'utf-8'));
  return parsed.version ?? '0.0.0';
}

function parseHours(value: string): number {
  const hours = Number(value);
  if (!Number.isFinite(hours) || hours <= 0) {
    throw new InvalidArgumentError('Expected a positive number of hours');
  }
  return hours;
}

const program = new Command();

program
  .name('etl-pipeline')
  .description('Deploy and operate the S3 -> Lambda -> Glue ETL pipeline')
  .version(readVersion())
  .option('--verbose', 'Show debug output');

program
  .command('setup')
  .description('Check prerequisites and prepare the working directory')
  .action((_options: object, command: Command) =>
    setupCommand(command.optsWithGlobals<GlobalOptions>()),
  );

program
  .command('package')
  .description('Build the deployment artifacts for the configured package variant')
  .action((_options: object, command: Command) =>
    packageCommand(command.optsWithGlobals<GlobalOptions>()),
  );

program
  .command('import-resources')
  .description('Adopt existing AWS resources into the Pulumi stack')
  .action((_options: object, command: Command) =>
    importResourcesCommand(command.optsWithGlobals<GlobalOptions>()),
  );

program
  .command('run-local')
  .description('Dispatch a synthetic S3 event for an object already in the source bucket')
  .argument('<key>', 'Object key, e.g. input/sample_financial_data.csv')
  .option('--bucket <bucket>', 'Source bucket (default: the configured source bucket)')
  .option('--remote', 'Invoke the deployed function instead of dispatching in-process')
  .action((key: string, _options: object, command: Command) =>
    runLocalCommand(key, command.optsWithGlobals<RunLocalCommandOptions>()),
  );

program
  .command('monitor')
  .description('Show function status, recent logs, Glue runs and processed output')
  .option('--hours <hours>', 'How far back to read log events', parseHours, 1)
  .option('--prefix <prefix>', 'Output prefix to inspect (default: OUTPUT_PREFIX)')
  .action((_options: object, command: Command) =>
    monitorCommand(command.optsWithGlobals<MonitorCommandOptions>()),
  );

program
  .command('upload')
  .description('Upload a local file to the source bucket under the input prefix')
  .argument('<file>', 'Local .csv or .json file')
  .option('--key <key>', 'Object key (default: <INPUT_PREFIX><file name>)')
  .action((file: string, _options: object, command: Command) =>
    uploadCommand(file, command.optsWithGlobals<UploadCommandOptions>()),
  );

program
  .command('stack')
  .description('Drive the Pulumi stack: preview, up, destroy or outputs')
  .argument('<action>', 'preview | up | destroy | outputs', parseStackAction)
  .action((action: ReturnType<typeof parseStackAction>, _options: object, command: Command) =>
    stackCommand(action, command.optsWithGlobals<GlobalOptions>()),
  );

program.parseAsync().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
