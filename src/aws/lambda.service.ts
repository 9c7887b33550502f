import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  FunctionConfiguration,
  GetFunctionCommand,
  InvokeCommand,
  LambdaClient,
} from '@aws-sdk/client-lambda';
import { LAMBDA_CLIENT } from './aws.constants';

export interface InvocationResult {
  statusCode?: number;
  functionError?: string;
  payload: string;
}

@Injectable()
export class LambdaService {
  private readonly logger = new Logger(LambdaService.name);

  constructor(@Inject(LAMBDA_CLIENT) private readonly client: LambdaClient) {}

  async invokeFunction(
    functionName: string,
    payload: unknown,
    invocationType: 'Event' | 'RequestResponse' = 'RequestResponse',
  ): Promise<InvocationResult> {
    const response = await this.client.send(
      new InvokeCommand({
        FunctionName: functionName,
        InvocationType: invocationType,
        Payload: Buffer.from(JSON.stringify(payload)),
      }),
    );

    this.logger.log(`Invoked lambda ${functionName} (${invocationType})`);

    return {
      statusCode: response.StatusCode,
      functionError: response.FunctionError,
      payload: response.Payload ? Buffer.from(response.Payload).toString('utf-8') : '',
    };
  }

  async getFunctionConfiguration(
    functionName: string,
  ): Promise<FunctionConfiguration | undefined> {
    const response = await this.client.send(
      new GetFunctionCommand({ FunctionName: functionName }),
    );
    return response.Configuration;
  }
}
