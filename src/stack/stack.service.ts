import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  DestroyResult,
  LocalWorkspace,
  OutputMap,
  PreviewResult,
  Stack,
  UpResult,
} from '@pulumi/pulumi/automation';
import { join } from 'path';
import { PipelineConfig } from '../config/pipeline-config.interface';
import { toStackConfig } from './stack-config';

export type StackAction = 'preview' | 'up' | 'destroy' | 'outputs';

@Injectable()
export class StackService {
  private readonly logger = new Logger(StackService.name);
  private readonly config: PipelineConfig;
  private stack?: Promise<Stack>;

  constructor(private readonly configService: ConfigService) {
    this.config = this.configService.getOrThrow<PipelineConfig>('pipeline');
  }

  /** Selected lazily so commands that never touch Pulumi do not need its CLI. */
  getStack(): Promise<Stack> {
    if (!this.stack) {
      this.stack = this.openStack();
    }
    return this.stack;
  }

  async preview(): Promise<PreviewResult> {
    const stack = await this.getStack();
    return stack.preview({ onOutput: this.echo });
  }

  async up(): Promise<UpResult> {
    const stack = await this.getStack();
    return stack.up({ onOutput: this.echo });
  }

  async destroy(): Promise<DestroyResult> {
    const stack = await this.getStack();
    return stack.destroy({ onOutput: this.echo });
  }

  async outputs(): Promise<OutputMap> {
    const stack = await this.getStack();
    return stack.outputs();
  }

  private async openStack(): Promise<Stack> {
    const { set, unset } = toStackConfig(this.config);
    const workDir = join(this.config.rootDir, 'infra');

    this.logger.log(`Selecting stack ${this.config.stackName} in ${workDir}`);
    const stack = await LocalWorkspace.createOrSelectStack({
      stackName: this.config.stackName,
      workDir,
    });

    await stack.setAllConfig(set);
    if (unset.length > 0) {
      await stack.removeAllConfig(unset);
    }
    this.logger.log(`Applied ${Object.keys(set).length} config value(s) to the stack`);
    return stack;
  }

  private readonly echo = (out: string) => {
    process.stdout.write(out);
  };
}
