import { AppError } from "./app-error.js";
import {
  ConsistencyError,
  PermanentProviderError,
  SourceFetchError,
  TransientProviderError,
} from "./errors.js";

export type ErrorKind =
  | "rate_limited"
  | "timeout"
  | "unavailable"
  | "invalid_input"
  | "oversized_chunk"
  | "source_fetch"
  | "consistency"
  | "unknown";

export interface RetryPolicy {
  /** Total attempts including the first call. */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export type RetryDecision = { action: "retry"; delayMs: number } | { action: "giveup" };

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 4,
  baseDelayMs: 1_000,
  maxDelayMs: 10_000,
};

const TRANSIENT_KINDS: ReadonlySet<ErrorKind> = new Set(["rate_limited", "timeout", "unavailable"]);
const TRANSIENT_NETWORK_CODES: ReadonlySet<string> = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "EAI_AGAIN",
  "EPIPE",
  "EOPENBREAKER",
]);

export function isTransientKind(kind: ErrorKind): boolean {
  return TRANSIENT_KINDS.has(kind);
}

function readField(value: unknown, key: string): unknown {
  if (typeof value !== "object" || value === null) {
    return undefined;
  }
  return Reflect.get(value, key);
}

function statusOf(error: unknown): number | undefined {
  for (const key of ["status", "statusCode"]) {
    const direct = readField(error, key);
    if (typeof direct === "number") return direct;
    const nested = readField(readField(error, "response"), key);
    if (typeof nested === "number") return nested;
  }
  return undefined;
}

function kindFromStatus(status: number): ErrorKind | undefined {
  if (status === 429) return "rate_limited";
  if (status === 408) return "timeout";
  if (status >= 500) return "unavailable";
  if (status >= 400) return "invalid_input";
  return undefined;
}

/**
 * Map any thrown value onto the pipeline's error taxonomy.
 */
export function classifyError(error: unknown): ErrorKind {
  if (error instanceof TransientProviderError || error instanceof PermanentProviderError) {
    return error.kind;
  }
  if (error instanceof SourceFetchError) return "source_fetch";
  if (error instanceof ConsistencyError) return "consistency";
  if (AppError.isAppError(error)) {
    return kindFromStatus(error.statusCode) ?? "unknown";
  }

  const status = statusOf(error);
  if (status !== undefined) {
    const kind = kindFromStatus(status);
    if (kind) return kind;
  }

  const code = readField(error, "code");
  if (code === "ETIMEDOUT") return "timeout";
  if (typeof code === "string" && TRANSIENT_NETWORK_CODES.has(code)) return "unavailable";

  const message = error instanceof Error ? error.message.toLowerCase() : "";
  if (message.includes("rate limit")) return "rate_limited";
  if (message.includes("timed out") || message.includes("timeout")) return "timeout";
  if (message.includes("temporarily")) return "unavailable";

  return "unknown";
}

export function retryAfterOf(error: unknown): number | undefined {
  return error instanceof TransientProviderError ? error.retryAfterMs : undefined;
}

/**
 * Pure retry decision. `attempt` is the number of attempts already made
 * (1 after the first failure). Delay doubles per attempt, capped at
 * `maxDelayMs`; a provider-supplied retry-after wins when present.
 */
export function decideRetry(
  attempt: number,
  kind: ErrorKind,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  retryAfterMs?: number,
): RetryDecision {
  if (!isTransientKind(kind) || attempt >= policy.maxAttempts) {
    return { action: "giveup" };
  }
  if (retryAfterMs !== undefined && retryAfterMs > 0) {
    return { action: "retry", delayMs: Math.min(policy.maxDelayMs, retryAfterMs) };
  }
  const exponential = policy.baseDelayMs * Math.pow(2, attempt - 1);
  return { action: "retry", delayMs: Math.min(policy.maxDelayMs, exponential) };
}

export interface RetryAttemptInfo {
  attempt: number;
  maxAttempts: number;
  delayMs: number;
  kind: ErrorKind;
  error: unknown;
}

export interface RetryOptions extends Partial<RetryPolicy> {
  onRetry?: (info: RetryAttemptInfo) => void;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Execute a function, retrying transient failures as {@link decideRetry} directs.
 * The last error is rethrown unchanged once the policy gives up.
 */
export async function withRetry<T>(fn: () => Promise<T>, options?: RetryOptions): Promise<T> {
  const policy: RetryPolicy = {
    maxAttempts: options?.maxAttempts ?? DEFAULT_RETRY_POLICY.maxAttempts,
    baseDelayMs: options?.baseDelayMs ?? DEFAULT_RETRY_POLICY.baseDelayMs,
    maxDelayMs: options?.maxDelayMs ?? DEFAULT_RETRY_POLICY.maxDelayMs,
  };

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error: unknown) {
      const kind = classifyError(error);
      const decision = decideRetry(attempt, kind, policy, retryAfterOf(error));
      if (decision.action === "giveup") {
        throw error;
      }
      options?.onRetry?.({
        attempt,
        maxAttempts: policy.maxAttempts,
        delayMs: decision.delayMs,
        kind,
        error,
      });
      await sleep(decision.delayMs);
    }
  }
}
