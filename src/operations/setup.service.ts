import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { copyFileSync, existsSync, mkdirSync } from 'fs';
import { join } from 'path';
import { StsService } from '../aws/sts.service';
import { errorMessage } from '../common/errors';
import { COMMAND_RUNNER, CommandRunner } from '../common/process-runner';
import { PipelineConfig } from '../config/pipeline-config.interface';

export const MINIMUM_NODE_MAJOR = 20;
export const WORKSPACE_DIRECTORIES = ['data', 'build'];

export type SetupOutcome = 'ok' | 'warning' | 'failed';

export interface SetupStep {
  name: string;
  outcome: SetupOutcome;
  detail: string;
}

export interface SetupReport {
  steps: SetupStep[];
  failures: number;
}

@Injectable()
export class SetupService {
  private readonly logger = new Logger(SetupService.name);
  private readonly config: PipelineConfig;

  constructor(
    private readonly stsService: StsService,
    private readonly configService: ConfigService,
    @Inject(COMMAND_RUNNER) private readonly run: CommandRunner,
  ) {
    this.config = this.configService.getOrThrow<PipelineConfig>('pipeline');
  }

  async setup(nodeVersion = process.versions.node): Promise<SetupReport> {
    const steps = [
      this.checkNode(nodeVersion),
      await this.checkPulumi(),
      await this.checkCredentials(),
      this.createDirectories(),
      this.seedEnvFile(),
    ];

    for (const step of steps) {
      const line = `${step.name}: ${step.detail}`;
      if (step.outcome === 'failed') {
        this.logger.error(line);
      } else if (step.outcome === 'warning') {
        this.logger.warn(line);
      } else {
        this.logger.log(line);
      }
    }

    return { steps, failures: steps.filter((step) => step.outcome === 'failed').length };
  }

  private checkNode(version: string): SetupStep {
    const major = Number.parseInt(version.split('.')[0], 10);
    if (Number.isNaN(major) || major < MINIMUM_NODE_MAJOR) {
      return {
        name: 'Node.js',
        outcome: 'failed',
        detail: `version ${version} found, ${MINIMUM_NODE_MAJOR} or newer required`,
      };
    }
    return { name: 'Node.js', outcome: 'ok', detail: `version ${version}` };
  }

  private async checkPulumi(): Promise<SetupStep> {
    try {
      const result = await this.run('pulumi', ['version']);
      if (result.code === 0) {
        return { name: 'Pulumi CLI', outcome: 'ok', detail: result.stdout.trim() };
      }
      return {
        name: 'Pulumi CLI',
        outcome: 'warning',
        detail: `exited with code ${result.code}; stack commands will not work`,
      };
    } catch (error) {
      return {
        name: 'Pulumi CLI',
        outcome: 'warning',
        detail: `not available (${errorMessage(error)}); stack commands will not work`,
      };
    }
  }

  private async checkCredentials(): Promise<SetupStep> {
    try {
      const identity = await this.stsService.callerIdentity();
      return {
        name: 'AWS credentials',
        outcome: 'ok',
        detail: `account ${identity.account ?? 'unknown'} (${identity.arn ?? 'unknown'})`,
      };
    } catch (error) {
      return {
        name: 'AWS credentials',
        outcome: 'warning',
        detail: `not configured (${errorMessage(error)})`,
      };
    }
  }

  private createDirectories(): SetupStep {
    for (const directory of WORKSPACE_DIRECTORIES) {
      mkdirSync(join(this.config.rootDir, directory), { recursive: true });
    }
    return {
      name: 'Workspace',
      outcome: 'ok',
      detail: `ensured ${WORKSPACE_DIRECTORIES.join(', ')}`,
    };
  }

  private seedEnvFile(): SetupStep {
    const target = join(this.config.rootDir, '.env');
    const template = join(this.config.rootDir, '.env.example');
    if (existsSync(target)) {
      return { name: '.env', outcome: 'ok', detail: 'already present' };
    }
    if (!existsSync(template)) {
      return { name: '.env', outcome: 'warning', detail: 'no .env.example to copy from' };
    }
    copyFileSync(template, target);
    return { name: '.env', outcome: 'ok', detail: 'created from .env.example; edit it before deploying' };
  }
}
