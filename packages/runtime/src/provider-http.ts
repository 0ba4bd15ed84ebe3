import { ConciergeError, isConciergeError, type JsonValue } from "@concierge/types";
import { parseJson } from "@concierge/core";

export interface ProviderRequest {
  /** Vendor label used in error messages, e.g. "Groq". */
  readonly provider: string;
  readonly url: string;
  readonly headers?: Record<string, string>;
  readonly body: { [key: string]: JsonValue };
  readonly signal?: AbortSignal;
  readonly fetch: typeof fetch;
}

/**
 * POST a JSON body to a model vendor and return the parsed response body.
 *
 * Network errors, 429 and 5xx are retryable `PROVIDER_UNAVAILABLE`; other
 * non-2xx answers are not. An abort carrying a `ConciergeError` reason (a
 * timeout) is rethrown as is.
 */
export async function postProviderJson(req: ProviderRequest): Promise<unknown> {
  let response: Response;
  try {
    response = await req.fetch(req.url, {
      method: "POST",
      headers: { "Content-Type": "application/json", ...req.headers },
      body: JSON.stringify(req.body),
      signal: req.signal,
    });
  } catch (err) {
    if (isConciergeError(err)) throw err;
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConciergeError("PROVIDER_UNAVAILABLE", `${req.provider} request failed: ${reason}`, {
      cause: err,
    });
  }

  if (!response.ok) {
    const errorText = await response.text().catch(() => "");
    throw new ConciergeError("PROVIDER_UNAVAILABLE", `${req.provider} API error ${response.status}: ${errorText}`, {
      retryable: response.status === 429 || response.status >= 500,
      details: { status: response.status },
    });
  }

  try {
    return parseJson(await response.text());
  } catch (err) {
    if (isConciergeError(err)) throw err;
    throw new ConciergeError("PROVIDER_UNAVAILABLE", `${req.provider} returned malformed JSON`, {
      cause: err,
    });
  }
}

/** A response body that failed its schema. Retryable: the next sample may be well-formed. */
export function malformedPayload(provider: string, issues: string[]): ConciergeError {
  return new ConciergeError("PROVIDER_UNAVAILABLE", `${provider} returned a malformed payload`, {
    details: { issues },
  });
}
