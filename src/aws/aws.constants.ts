export const S3_CLIENT = Symbol('S3_CLIENT');
export const LAMBDA_CLIENT = Symbol('LAMBDA_CLIENT');
export const GLUE_CLIENT = Symbol('GLUE_CLIENT');
export const LOGS_CLIENT = Symbol('LOGS_CLIENT');
export const STS_CLIENT = Symbol('STS_CLIENT');
