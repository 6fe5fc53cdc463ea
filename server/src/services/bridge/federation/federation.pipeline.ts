/**
 * Federation Pipeline
 *
 * Turns an authorization code into an account profile through five strictly
 * ordered external exchanges (A -> E). The first failing stage stops the run;
 * nothing is retried or cached.
 */

import { performance } from 'perf_hooks';
import { logger } from '../../../lib/logger/structured-logger.js';
import { isTimeoutError, withTimeout } from '../../../lib/reliability/timeout-guard.js';
import {
  PipelineError,
  ProviderTransportError,
  isStageError,
  type StageError
} from '../bridge.errors.js';
import type {
  AccountProfile,
  FederatedUserToken,
  FederationClient,
  LauncherCredential,
  ProviderTokens,
  SecurityTokenServiceToken,
  ServiceAccessToken,
  StageDescriptor
} from './federation.types.js';

export const codeExchangeStage: StageDescriptor<string, ProviderTokens> = {
  name: 'code_exchange',
  run: (code, client, options) => client.exchangeCode(code, options),
};

export const userTokenStage: StageDescriptor<ProviderTokens, FederatedUserToken> = {
  name: 'user_token',
  run: (tokens, client, options) => client.fetchUserToken(tokens.accessToken, options),
};

export const stsTokenStage: StageDescriptor<FederatedUserToken, SecurityTokenServiceToken> = {
  name: 'sts_token',
  run: (userToken, client, options) => client.fetchStsToken(userToken, options),
};

export const serviceTokenStage: StageDescriptor<SecurityTokenServiceToken, ServiceAccessToken> = {
  name: 'service_token',
  run: (stsToken, client, options) => client.fetchServiceToken(stsToken, options),
};

export const profileStage: StageDescriptor<ServiceAccessToken, AccountProfile> = {
  name: 'profile',
  run: (serviceToken, client, options) => client.fetchProfile(serviceToken, options),
};

export const FEDERATION_STAGES = [
  codeExchangeStage,
  userTokenStage,
  stsTokenStage,
  serviceTokenStage,
  profileStage,
] as const;

export interface PipelineOptions {
  /** Bound on each stage call; exceeding it is a stage failure */
  stageTimeoutMs: number;
  /** Hashed correlation id, for log correlation only */
  idHash?: string;
}

export type PipelineResult =
  | { ok: true; profile: AccountProfile; credential: LauncherCredential }
  | { ok: false; error: PipelineError };

function toStageError(err: unknown, operation: string): StageError {
  if (isStageError(err)) {
    return err;
  }
  if (isTimeoutError(err)) {
    return new ProviderTransportError(err.message, { timedOut: true });
  }
  return new ProviderTransportError(
    `${operation} failed: ${err instanceof Error ? err.message : String(err)}`
  );
}

async function runStage<I, O>(
  stage: StageDescriptor<I, O>,
  input: I,
  client: FederationClient,
  options: PipelineOptions
): Promise<O> {
  const operation = `federation.${stage.name}`;
  const controller = new AbortController();
  const startTime = performance.now();

  try {
    const output = await withTimeout(
      stage.run(input, client, { signal: controller.signal }),
      options.stageTimeoutMs,
      operation,
      () => controller.abort()
    );

    logger.debug({
      idHash: options.idHash,
      stage: stage.name,
      durationMs: Math.round(performance.now() - startTime),
      event: 'federation_stage_completed'
    }, `[Federation] Stage ${stage.name} completed`);

    return output;
  } catch (err) {
    const cause = toStageError(err, operation);

    logger.warn({
      idHash: options.idHash,
      stage: stage.name,
      errorCode: cause.code,
      errorType: cause.name,
      durationMs: Math.round(performance.now() - startTime),
      event: 'federation_stage_failed'
    }, `[Federation] Stage ${stage.name} failed`);

    throw new PipelineError(stage.name, cause);
  }
}

/**
 * Run stages A -> E in order, stopping at the first failure
 */
export async function runFederationPipeline(
  code: string,
  client: FederationClient,
  options: PipelineOptions
): Promise<PipelineResult> {
  try {
    const providerTokens = await runStage(codeExchangeStage, code, client, options);
    const userToken = await runStage(userTokenStage, providerTokens, client, options);
    const stsToken = await runStage(stsTokenStage, userToken, client, options);
    const serviceToken = await runStage(serviceTokenStage, stsToken, client, options);
    const profile = await runStage(profileStage, serviceToken, client, options);

    return {
      ok: true,
      profile,
      credential: {
        accessToken: serviceToken.token,
        expiresIn: serviceToken.expiresIn,
        refreshToken: providerTokens.refreshToken,
      },
    };
  } catch (err) {
    if (err instanceof PipelineError) {
      return { ok: false, error: err };
    }
    throw err;
  }
}
