import { GlueClient, StartJobRunCommand } from '@aws-sdk/client-glue';

export interface JobStarter {
  /** Starts one run and resolves with its run id. */
  startJobRun(jobName: string, args: Record<string, string>): Promise<string>;
}

export class GlueJobStarter implements JobStarter {
  constructor(private readonly client: GlueClient) {}

  async startJobRun(jobName: string, args: Record<string, string>): Promise<string> {
    const response = await this.client.send(
      new StartJobRunCommand({
        JobName: jobName,
        Arguments: args,
      }),
    );
    if (!response.JobRunId) {
      throw new Error(`Glue accepted ${jobName} but returned no run id`);
    }
    return response.JobRunId;
  }
}
