/**
 * HTTP-Helfer für externe APIs (Preisquelle, Gist)
 *
 * Feste Timeouts, keine Retries. Fehler werden als typisierte Errors geworfen,
 * die Aufrufer entscheiden, ob daraus ein leeres Ergebnis wird.
 */

export class HttpError extends Error {
  constructor(
    message: string,
    public readonly status: number
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

export class RequestTimeoutError extends Error {
  constructor(
    message: string,
    public readonly timeoutMs: number
  ) {
    super(message);
    this.name = 'RequestTimeoutError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Bricht ein Promise nach `timeoutMs` mit RequestTimeoutError ab.
 * Der Timer wird in jedem Fall aufgeräumt.
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new RequestTimeoutError(`${label}: Timeout nach ${timeoutMs}ms`, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Führt einen Request aus und liefert den geparsten JSON-Body (unvalidiert)
 */
export async function requestJson(url: string, init: RequestInit & { timeoutMs: number }): Promise<unknown> {
  const { timeoutMs, ...rest } = init;

  let res: Response;
  try {
    res = await fetch(url, { ...rest, signal: AbortSignal.timeout(timeoutMs) });
  } catch (error: unknown) {
    if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
      throw new RequestTimeoutError(`Timeout nach ${timeoutMs}ms`, timeoutMs);
    }
    throw error;
  }

  if (!res.ok) {
    throw new HttpError(`HTTP ${res.status}`, res.status);
  }

  const body: unknown = await res.json();
  return body;
}
