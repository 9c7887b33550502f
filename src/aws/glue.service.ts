import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  GetJobCommand,
  GetJobRunsCommand,
  GlueClient,
  Job,
  JobRun,
} from '@aws-sdk/client-glue';
import { GlueJobStarter, JobStarter } from '../pipeline/job-starter';
import { GLUE_CLIENT } from './aws.constants';

@Injectable()
export class GlueService implements JobStarter {
  private readonly logger = new Logger(GlueService.name);
  private readonly starter: GlueJobStarter;

  constructor(@Inject(GLUE_CLIENT) private readonly client: GlueClient) {
    this.starter = new GlueJobStarter(client);
  }

  async startJobRun(jobName: string, args: Record<string, string>): Promise<string> {
    const runId = await this.starter.startJobRun(jobName, args);
    this.logger.log(`Triggered Glue job ${jobName} (run: ${runId})`);
    return runId;
  }

  async getJob(jobName: string): Promise<Job | undefined> {
    const response = await this.client.send(new GetJobCommand({ JobName: jobName }));
    return response.Job;
  }

  async getJobRuns(jobName: string, maxResults = 5): Promise<JobRun[]> {
    const response = await this.client.send(
      new GetJobRunsCommand({ JobName: jobName, MaxResults: maxResults }),
    );
    return response.JobRuns ?? [];
  }
}
