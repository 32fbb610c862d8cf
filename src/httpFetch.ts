import { errMessage } from "./errors.js";

export const DEFAULT_TIMEOUT_MS = 20_000;

export class RequestTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`timed out after ${timeoutMs}ms`);
    this.name = "RequestTimeoutError";
  }
}

export function isDebugEnabled(): boolean {
  return process.env.METERFEED_DEBUG === "1";
}

let nextReqId = 1;

export type TimedResponse = {
  resp: Response;
  text: string;
};

// Settles with `p`, or rejects with the signal's reason once it aborts.
function untilAborted<T>(p: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) return Promise.reject(signal.reason);
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
    p.then(
      (v) => {
        signal.removeEventListener("abort", onAbort);
        resolve(v);
      },
      (e: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(e);
      },
    );
  });
}

/**
 * fetch() plus reading the body, both under one hard timeout, with request
 * logging. Rejects with RequestTimeoutError on timeout and rethrows the
 * underlying rejection for any other network failure, including a body
 * stream that breaks off.
 */
export async function timedFetch(
  url: string,
  init: RequestInit,
  op: string,
  timeoutMs: number = DEFAULT_TIMEOUT_MS,
): Promise<TimedResponse> {
  const reqId = nextReqId++;
  const startedAt = Date.now();
  const debug = isDebugEnabled();

  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(new RequestTimeoutError(timeoutMs)), timeoutMs);

  if (debug) {
    console.log(`[http][${reqId}] start op=${op} url=${url}`);
  }

  try {
    const resp = await fetch(url, { ...init, signal: controller.signal });
    const text = await untilAborted(resp.text(), controller.signal);
    const ms = Date.now() - startedAt;
    if (debug || !resp.ok || ms > 2000) {
      console.log(`[http][${reqId}] done op=${op} status=${resp.status} ${ms}ms url=${url}`);
    }
    return { resp, text };
  } catch (e) {
    const ms = Date.now() - startedAt;
    console.error(`[http][${reqId}] fail op=${op} ${ms}ms url=${url} err=${errMessage(e)}`);
    if (controller.signal.aborted) throw new RequestTimeoutError(timeoutMs);
    throw e;
  } finally {
    clearTimeout(timeout);
  }
}

/** JSON body, or undefined when it is empty or not JSON. */
export function parseJson(text: string): unknown {
  if (text.length === 0) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}
