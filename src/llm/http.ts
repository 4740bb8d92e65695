/**
 * fetch() plumbing shared by the adapters.
 */

export interface PostOptions {
  headers?: Record<string, string>;
  body: unknown;
  /** Seconds. 0 or undefined disables the timeout. */
  timeout?: number;
  signal?: AbortSignal;
}

export class HttpError extends Error {
  constructor(readonly status: number, readonly body: string, url: string) {
    super(`HTTP ${status} from ${url}: ${body}`);
    this.name = 'HttpError';
  }
}

export async function postJson(url: string, options: PostOptions): Promise<unknown> {
  const fetchOptions: RequestInit = {
    method: 'POST',
    headers: { 'Content-Type': 'application/json', ...options.headers },
    body: JSON.stringify(options.body),
  };

  // Combine timeout + external cancel signal.
  const signals: AbortSignal[] = [];
  if (options.timeout && options.timeout > 0) {
    signals.push(AbortSignal.timeout(options.timeout * 1000));
  }
  if (options.signal) signals.push(options.signal);

  if (signals.length === 1) {
    fetchOptions.signal = signals[0];
  } else if (signals.length > 1) {
    fetchOptions.signal = AbortSignal.any(signals);
  }

  const response = await fetch(url, fetchOptions);

  if (!response.ok) {
    throw new HttpError(response.status, await response.text(), url);
  }

  return response.json();
}

/** GET that only cares whether the endpoint answers 2xx */
export async function probe(url: string, headers: Record<string, string> = {}): Promise<boolean> {
  try {
    const response = await fetch(url, { headers, signal: AbortSignal.timeout(5000) });
    return response.ok;
  } catch {
    return false;
  }
}
