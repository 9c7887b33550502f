import { Inject, Injectable } from '@nestjs/common';
import { GetCallerIdentityCommand, STSClient } from '@aws-sdk/client-sts';
import { STS_CLIENT } from './aws.constants';

export interface CallerIdentity {
  account?: string;
  arn?: string;
}

@Injectable()
export class StsService {
  constructor(@Inject(STS_CLIENT) private readonly client: STSClient) {}

  async callerIdentity(): Promise<CallerIdentity> {
    const response = await this.client.send(new GetCallerIdentityCommand({}));
    return { account: response.Account, arn: response.Arn };
  }
}
