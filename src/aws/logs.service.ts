import { Inject, Injectable } from '@nestjs/common';
import {
  CloudWatchLogsClient,
  DescribeLogStreamsCommand,
  GetLogEventsCommand,
  LogStream,
  OutputLogEvent,
} from '@aws-sdk/client-cloudwatch-logs';
import { LOGS_CLIENT } from './aws.constants';

@Injectable()
export class LogsService {
  constructor(@Inject(LOGS_CLIENT) private readonly client: CloudWatchLogsClient) {}

  async recentStreams(logGroupName: string, limit = 5): Promise<LogStream[]> {
    const response = await this.client.send(
      new DescribeLogStreamsCommand({
        logGroupName,
        orderBy: 'LastEventTime',
        descending: true,
        limit,
      }),
    );
    return response.logStreams ?? [];
  }

  async events(
    logGroupName: string,
    logStreamName: string,
    startTime: number,
    limit = 50,
  ): Promise<OutputLogEvent[]> {
    const response = await this.client.send(
      new GetLogEventsCommand({ logGroupName, logStreamName, startTime, limit }),
    );
    return response.events ?? [];
  }
}
