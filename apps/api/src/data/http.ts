export class ProviderHttpError extends Error {
  constructor(
    readonly status: number,
    readonly statusText: string,
  ) {
    super(`HTTP ${status} ${statusText}`);
    this.name = 'ProviderHttpError';
  }
}

/**
 * GET a JSON document, aborting after `timeoutMs`. Throws on non-2xx, network
 * failure, timeout or an unparseable body; adapters turn all of those into "no data".
 */
export async function fetchJson<T>(
  url: string,
  params: Record<string, string>,
  timeoutMs: number,
): Promise<T> {
  const query = new URLSearchParams(params).toString();
  const response = await fetch(query ? `${url}?${query}` : url, {
    signal: AbortSignal.timeout(timeoutMs),
  });

  if (!response.ok) {
    throw new ProviderHttpError(response.status, response.statusText);
  }

  return response.json() as Promise<T>;
}

export function parseNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value.trim().replace(/%$/, ''));
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}
