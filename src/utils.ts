import axios, { AxiosRequestConfig } from "axios";
import { RequestCancelledError, TimeoutError } from "./errors";

export interface RetryOptions {
  retries?: number;
  initialDelayMs?: number;
  factor?: number;
}

export interface CircuitBreakerOptions {
  failureThreshold?: number;
  cooldownMs?: number;
}

export interface TimeoutOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
  label?: string;
}

interface CircuitBreakerState {
  failures: number;
  openedAt: number | null;
}

export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const { retries = 2, initialDelayMs = 250, factor = 2 } = options;
  let attempt = 0;
  let delay = initialDelayMs;
  while (true) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= retries) {
        throw error;
      }
      await new Promise((resolve) => setTimeout(resolve, delay));
      delay *= factor;
      attempt += 1;
    }
  }
}

/**
 * Runs `task` with its own abort signal, rejecting with `TimeoutError` once
 * `timeoutMs` elapses and with `RequestCancelledError` when the parent signal
 * aborts. Either way the task's signal is aborted too.
 */
export async function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  { timeoutMs, signal, label = "operation" }: TimeoutOptions = {}
): Promise<T> {
  if (signal?.aborted) {
    throw new RequestCancelledError();
  }

  const controller = new AbortController();
  const timers: NodeJS.Timeout[] = [];
  const guards: Array<Promise<never>> = [];

  if (typeof timeoutMs === "number" && timeoutMs > 0) {
    const limitMs = timeoutMs;
    guards.push(
      new Promise<never>((_resolve, reject) => {
        timers.push(
          setTimeout(() => {
            const error = new TimeoutError(label, limitMs);
            controller.abort(error);
            reject(error);
          }, limitMs)
        );
      })
    );
  }

  let rejectOnAbort: (error: Error) => void = () => undefined;
  const onParentAbort = () => {
    const error = new RequestCancelledError();
    controller.abort(error);
    rejectOnAbort(error);
  };
  if (signal) {
    guards.push(
      new Promise<never>((_resolve, reject) => {
        rejectOnAbort = reject;
      })
    );
    signal.addEventListener("abort", onParentAbort, { once: true });
  }

  try {
    return await Promise.race([task(controller.signal), ...guards]);
  } finally {
    timers.forEach((timer) => clearTimeout(timer));
    signal?.removeEventListener("abort", onParentAbort);
  }
}

export class CircuitBreaker {
  private readonly state: CircuitBreakerState = { failures: 0, openedAt: null };

  private readonly failureThreshold: number;

  private readonly cooldownMs: number;

  constructor({ failureThreshold = 3, cooldownMs = 15_000 }: CircuitBreakerOptions = {}) {
    this.failureThreshold = failureThreshold;
    this.cooldownMs = cooldownMs;
  }

  async exec<T>(action: () => Promise<T>): Promise<T> {
    if (this.isOpen()) {
      throw new CircuitOpenError();
    }

    try {
      const result = await action();
      this.reset();
      return result;
    } catch (error) {
      this.recordFailure();
      throw error;
    }
  }

  private recordFailure(): void {
    this.state.failures += 1;
    if (this.state.failures >= this.failureThreshold) {
      this.state.openedAt = Date.now();
    }
  }

  private reset(): void {
    this.state.failures = 0;
    this.state.openedAt = null;
  }

  private isOpen(): boolean {
    if (this.state.openedAt === null) {
      return false;
    }
    const elapsed = Date.now() - this.state.openedAt;
    if (elapsed > this.cooldownMs) {
      this.reset();
      return false;
    }
    return true;
  }
}

export class CircuitOpenError extends Error {
  constructor() {
    super("Circuit breaker is open");
    this.name = "CircuitOpenError";
  }
}

const breakerMap = new Map<string, CircuitBreaker>();

function getCircuitBreaker(host: string, options?: CircuitBreakerOptions): CircuitBreaker {
  const key = host.toLowerCase();
  const existing = breakerMap.get(key);
  if (existing) {
    return existing;
  }
  const breaker = new CircuitBreaker(options);
  breakerMap.set(key, breaker);
  return breaker;
}

export async function fetchJson(
  url: string,
  config: AxiosRequestConfig = {},
  retryOptions?: RetryOptions,
  cbOptions?: CircuitBreakerOptions
): Promise<unknown> {
  const parsed = new URL(url);
  const breaker = getCircuitBreaker(parsed.host, cbOptions);
  const executor = () => axios({ url, ...config }).then((response): unknown => response.data);
  return breaker.exec(() => withRetry(executor, retryOptions));
}

const FENCED_BLOCK_REGEX = /^```[\w-]*[ \t]*\r?\n([\s\S]*?)\r?\n?[ \t]*```$/;
const INLINE_FENCE_REGEX = /^```(?:(?:sql|postgres(?:ql)?|pgsql)\s+)?([\s\S]*?)```$/i;

/** Removes a surrounding markdown code fence (```sql ... ```), if any. */
export function stripCodeFence(value: string): string {
  const trimmed = value.trim();
  const match = FENCED_BLOCK_REGEX.exec(trimmed) ?? INLINE_FENCE_REGEX.exec(trimmed);
  if (!match) {
    return trimmed;
  }
  return (match[1] ?? "").trim();
}

export function uniqueInOrder(values: Iterable<string>): string[] {
  return Array.from(new Set(values));
}
