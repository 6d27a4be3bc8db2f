import { PermanentProviderError, TransientProviderError } from '../errors.js';

const TRANSIENT_STATUSES = new Set([408, 425, 429]);

export interface PostJsonOptions {
  token?: string;
  timeoutMs: number;
}

/**
 * POSTs JSON to an external collaborator and classifies failures:
 * timeouts, network errors, 408/425/429 and 5xx are transient; any other
 * non-2xx answer (bad request, credentials, quota) is permanent.
 */
export async function postJson(service: string, url: string, body: unknown, options: PostJsonOptions): Promise<unknown> {
  let response: Response;
  try {
    response = await fetch(url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        ...(options.token && { 'Authorization': `Bearer ${options.token}` }),
      },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(options.timeoutMs),
    });
  } catch (error) {
    const reason = error instanceof Error && error.name === 'TimeoutError' ? 'request timed out' : 'request failed';
    throw new TransientProviderError(service, reason, { cause: String(error) });
  }

  if (!response.ok) {
    const details = { status: response.status };
    if (TRANSIENT_STATUSES.has(response.status) || response.status >= 500) {
      throw new TransientProviderError(service, `responded ${response.status}`, details);
    }
    throw new PermanentProviderError(service, `rejected request with ${response.status}`, details);
  }

  try {
    return await response.json();
  } catch (error) {
    throw new TransientProviderError(service, 'returned a body that is not JSON', { cause: String(error) });
  }
}
