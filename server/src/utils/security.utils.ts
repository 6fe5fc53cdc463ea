import crypto from 'crypto';

/**
 * Short, stable hash of a capability token (correlation id) for logging.
 * The raw value must never appear in logs.
 */
export function hashCorrelationId(id: string | undefined): string {
  if (!id) return 'none';
  return crypto.createHash('sha256').update(id).digest('hex').substring(0, 12);
}
