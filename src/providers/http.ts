/**
 * @fileoverview Thin JSON POST helper over the global `fetch`.
 *
 * Non-2xx statuses resolve normally; the caller maps them through
 * {@link mapHttpError}. Network failures and aborts reject.
 *
 * @module orga-runtime/providers/http
 */

export interface HttpResponse {
  status: number;
  headers: Headers;

  /** Parsed JSON body, or `undefined` when the body was not JSON */
  body: unknown;
  text: string;
}

export interface HttpRequestOptions {
  /** Request timeout in milliseconds, combined with `signal` */
  timeout?: number;
  signal?: AbortSignal;
}

/**
 * Merges header sets; later sets win. JSON content type is the default.
 */
export function mergeHeaders(...headerSets: Array<Record<string, string> | undefined>): Record<string, string> {
  const merged: Record<string, string> = { 'Content-Type': 'application/json' };
  for (const set of headerSets) {
    if (set === undefined) continue;
    for (const [key, value] of Object.entries(set)) {
      merged[key] = value;
    }
  }
  return merged;
}

function buildSignal(options?: HttpRequestOptions): AbortSignal | undefined {
  const signals: AbortSignal[] = [];
  if (options?.signal !== undefined) signals.push(options.signal);
  if (options?.timeout !== undefined && options.timeout > 0) {
    signals.push(AbortSignal.timeout(options.timeout));
  }

  if (signals.length === 0) return undefined;
  if (signals.length === 1) return signals[0];
  return AbortSignal.any(signals);
}

export async function httpPost(
  url: string,
  body: unknown,
  headers: Record<string, string>,
  options?: HttpRequestOptions,
): Promise<HttpResponse> {
  const res = await fetch(url, {
    method: 'POST',
    headers: mergeHeaders(headers),
    body: JSON.stringify(body),
    signal: buildSignal(options),
  });

  const text = await res.text();
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    parsed = undefined;
  }

  return { status: res.status, headers: res.headers, body: parsed, text };
}
