/**
 * Federation HTTP transport
 *
 * One request/response per call, no retries. Maps every outcome onto the
 * stage error taxonomy:
 * - network failure, timeout, 5xx  -> ProviderTransportError
 * - 4xx                            -> ProviderRejectedError (stage-specific code)
 * - non-JSON / schema mismatch     -> SerializationError
 */

import type { z } from 'zod';
import { fetchTextWithTimeout, FetchFailedError, type FetchedText } from '../../../utils/fetch-with-timeout.js';
import {
  ProviderRejectedError,
  ProviderTransportError,
  SerializationError,
  type StageName
} from '../bridge.errors.js';
import type { StageCallOptions } from './federation.types.js';

export interface FederationRequest<T> {
  stage: StageName;
  url: string;
  init: RequestInit;
  schema: z.ZodType<T>;
  /** Build the rejection for a 4xx; body is the parsed JSON body when there is one */
  classifyRejection(status: number, body: unknown): ProviderRejectedError;
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

export class FederationHttp {
  constructor(private readonly timeoutMs: number) {}

  async request<T>(req: FederationRequest<T>, options: StageCallOptions = {}): Promise<T> {
    let fetched: FetchedText;

    try {
      fetched = await fetchTextWithTimeout(req.url, req.init, {
        timeoutMs: this.timeoutMs,
        stage: req.stage,
        provider: 'federation',
        signal: options.signal
      });
    } catch (err) {
      if (err instanceof FetchFailedError) {
        throw new ProviderTransportError(err.message, { timedOut: err.errorKind === 'TIMEOUT' });
      }
      throw new ProviderTransportError(
        `Failed to read ${req.stage} response: ${err instanceof Error ? err.message : String(err)}`
      );
    }

    const { status, text } = fetched;

    if (status >= 500) {
      throw new ProviderTransportError(
        `Upstream ${req.stage} endpoint returned ${status}`,
        { statusCode: status }
      );
    }

    const body = parseJson(text);

    if (status >= 400) {
      throw req.classifyRejection(status, body);
    }

    if (body === undefined) {
      throw new SerializationError(`Upstream ${req.stage} response was not valid JSON`);
    }

    const parsed = req.schema.safeParse(body);
    if (!parsed.success) {
      const fields = parsed.error.issues.map(issue => issue.path.map(String).join('.') || '(root)');
      throw new SerializationError(
        `Upstream ${req.stage} response did not match the expected shape (${fields.join(', ')})`
      );
    }
    return parsed.data;
  }
}
