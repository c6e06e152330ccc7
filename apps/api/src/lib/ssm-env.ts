// apps/api/src/lib/ssm-env.ts
import { Logger } from '@nestjs/common';
import { GetParametersCommand, SSMClient } from '@aws-sdk/client-ssm';

const REGION = process.env.AWS_REGION || 'us-east-1';

// Parameter names match the env names one to one.
const PARAM_KEYS = ['DATABASE_URL', 'REDIS_URL', 'FX_API_KEY', 'FORECAST_API_URL'];

const logger = new Logger('SSM');

/** Copies production secrets from Parameter Store into process.env. Must run before AppModule is imported. */
export async function loadSsmEnv(client = new SSMClient({ region: REGION })): Promise<string[]> {
  const { Parameters, InvalidParameters } = await client.send(
    new GetParametersCommand({ Names: PARAM_KEYS, WithDecryption: true }),
  );

  const loaded: string[] = [];
  for (const p of Parameters ?? []) {
    if (p.Name && p.Value) {
      process.env[p.Name] = p.Value;
      loaded.push(p.Name);
    }
  }

  if (InvalidParameters && InvalidParameters.length > 0) {
    logger.warn(`Missing parameters: ${InvalidParameters.join(', ')}`);
  }
  return loaded;
}
