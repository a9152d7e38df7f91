/**
 * Shared timing helpers for outbound HTTP calls.
 */

export function sleep(ms: number): Promise<void> {
  return new Promise((res) => setTimeout(res, Math.max(0, Math.floor(ms))));
}

export interface TextReply {
  status: number;
  body: string;
}

export function readText(res: Response): Promise<TextReply> {
  return res.text().then((body) => ({ status: res.status, body }));
}

/**
 * `fetch` plus `read(response)` under one abort deadline of `timeoutMs`: a server
 * that sends headers and then stalls the body is cut off too. Rejects with an
 * `AbortError` on timeout and with the runtime's error on transport failure.
 */
export async function fetchWithTimeout<T>(
  url: string,
  init: RequestInit | undefined,
  timeoutMs: number,
  read: (res: Response) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  const id = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const res = await fetch(url, { ...(init || {}), signal: controller.signal });
    return await read(res);
  } finally {
    clearTimeout(id);
  }
}
