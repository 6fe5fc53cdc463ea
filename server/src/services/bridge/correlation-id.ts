import crypto from 'crypto';
import type { CorrelationId } from '../../infra/websocket/websocket.types.js';
import { InvalidCorrelationIdError } from './bridge.errors.js';

const CORRELATION_ID_BYTES = 32;

/** URL-safe, legal as an OAuth `state` value without escaping */
const CORRELATION_ID_PATTERN = /^[A-Za-z0-9_-]{1,128}$/;

/**
 * 256 bits of randomness, base64url encoded (43 chars).
 * The id is the only capability guarding a pending login.
 */
export function generateCorrelationId(): CorrelationId {
  return crypto.randomBytes(CORRELATION_ID_BYTES).toString('base64url');
}

export function isValidCorrelationId(value: unknown): value is CorrelationId {
  return typeof value === 'string' && CORRELATION_ID_PATTERN.test(value);
}

export function assertCorrelationId(value: unknown): CorrelationId {
  if (!isValidCorrelationId(value)) {
    throw new InvalidCorrelationIdError();
  }
  return value;
}
