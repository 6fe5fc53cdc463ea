/**
 * Login Bridge Error Taxonomy
 *
 * Every error carries a stable snake_case `code` that ends up in the
 * `error` field of the payload delivered to the launcher socket.
 *
 * - ConfigurationError / InvalidCorrelationIdError never reach the registry
 * - Stage errors (transport, rejected, serialization) short-circuit the
 *   federation pipeline and are wrapped into a PipelineError
 */

/**
 * Federation stage names, in execution order
 */
export const STAGE_NAMES = ['code_exchange', 'user_token', 'sts_token', 'service_token', 'profile'] as const;

export type StageName = typeof STAGE_NAMES[number];

/**
 * Expected, user-actionable rejections reported by the provider chain
 */
export type RejectionCode =
  | 'invalid_grant'
  | 'provider_rejected'
  | 'no_federated_identity'
  | 'region_unavailable'
  | 'age_verification_required'
  | 'child_account'
  | 'insufficient_entitlement'
  | 'service_rejected'
  | 'missing_entitlement';

export type TransportErrorCode = 'provider_transport_error' | 'provider_timeout';

export type BridgeErrorCode =
  | 'configuration_error'
  | 'invalid_correlation_id'
  | 'serialization_error'
  | TransportErrorCode
  | RejectionCode;

export abstract class BridgeError extends Error {
  abstract readonly code: BridgeErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends BridgeError {
  readonly code = 'configuration_error';

  constructor(message: string, public readonly keys: string[] = []) {
    super(message);
  }
}

export class InvalidCorrelationIdError extends BridgeError {
  readonly code = 'invalid_correlation_id';

  constructor() {
    super('Missing or malformed login session id');
  }
}

export class ProviderTransportError extends BridgeError {
  readonly code: TransportErrorCode;
  readonly statusCode: number | undefined;

  constructor(
    message: string,
    options: { timedOut?: boolean; statusCode?: number } = {}
  ) {
    super(message);
    this.code = options.timedOut ? 'provider_timeout' : 'provider_transport_error';
    this.statusCode = options.statusCode;
  }
}

export class ProviderRejectedError extends BridgeError {
  constructor(
    public readonly code: RejectionCode,
    message: string,
    public readonly statusCode?: number
  ) {
    super(message);
  }
}

export class SerializationError extends BridgeError {
  readonly code = 'serialization_error';
}

export type StageError = ProviderTransportError | ProviderRejectedError | SerializationError;

export function isStageError(error: unknown): error is StageError {
  return error instanceof ProviderTransportError
    || error instanceof ProviderRejectedError
    || error instanceof SerializationError;
}

/**
 * A stage failure, attributed to the stage that produced it
 */
export class PipelineError extends Error {
  constructor(
    public readonly stage: StageName,
    public readonly cause: StageError
  ) {
    super(`Federation stage ${stage} failed: ${cause.message}`);
    this.name = 'PipelineError';
  }

  get code(): BridgeErrorCode {
    return this.cause.code;
  }
}
