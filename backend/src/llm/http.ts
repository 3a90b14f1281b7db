import { HttpError } from "./errors";

export function isTimeoutError(err: unknown): boolean {
  if (typeof err !== "object" || err === null || !("name" in err)) return false;
  return err.name === "TimeoutError" || err.name === "AbortError";
}

async function requestJson<T>(
  url: string,
  init: { method: "GET" | "POST"; body?: unknown },
  headers: Record<string, string>,
  timeoutMs: number
): Promise<{ data: T; latencyMs: number }> {
  const startedAt = Date.now();
  const res = await fetch(url, {
    method: init.method,
    headers: { "content-type": "application/json", ...headers },
    body: init.body === undefined ? undefined : JSON.stringify(init.body),
    signal: AbortSignal.timeout(timeoutMs)
  });
  const text = await res.text();
  if (!res.ok) {
    throw new HttpError(res.status, `HTTP ${res.status} ${res.statusText}: ${text.slice(0, 4000)}`);
  }
  return { data: JSON.parse(text) as T, latencyMs: Date.now() - startedAt };
}

export function postJson<T>(
  url: string,
  body: unknown,
  headers: Record<string, string>,
  timeoutMs: number
): Promise<{ data: T; latencyMs: number }> {
  return requestJson<T>(url, { method: "POST", body }, headers, timeoutMs);
}

export function getJson<T>(
  url: string,
  headers: Record<string, string>,
  timeoutMs: number
): Promise<{ data: T; latencyMs: number }> {
  return requestJson<T>(url, { method: "GET" }, headers, timeoutMs);
}
