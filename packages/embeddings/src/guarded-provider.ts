import type CircuitBreaker from "opossum";
import type { EmbeddingResult } from "@indexloom/types";
import type { Logger } from "@indexloom/logger";
import {
  PermanentProviderError,
  TransientProviderError,
  createCircuitBreaker,
} from "@indexloom/errors";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";

export interface GuardOptions {
  /** Per-call timeout in milliseconds. */
  timeoutMs: number;
  errorThresholdPercentage?: number;
  resetTimeoutMs?: number;
  logger?: Logger;
}

function codeOf(error: unknown): unknown {
  return typeof error === "object" && error !== null ? Reflect.get(error, "code") : undefined;
}

/**
 * Wraps a provider in an opossum breaker: every call gets a bounded timeout,
 * and a provider that keeps failing is short-circuited. Timeouts and an open
 * breaker surface as transient errors so the retry policy applies to them.
 */
export class GuardedEmbeddingProvider implements IEmbeddingProvider {
  readonly name: string;
  readonly dimensions: number;
  private readonly inner: IEmbeddingProvider;
  private readonly embedBreaker: CircuitBreaker<[string], EmbeddingResult>;
  private readonly batchBreaker: CircuitBreaker<[string[]], EmbeddingResult>;

  constructor(inner: IEmbeddingProvider, options: GuardOptions) {
    this.inner = inner;
    this.name = inner.name;
    this.dimensions = inner.dimensions;

    const breakerOptions = {
      timeout: options.timeoutMs,
      errorThresholdPercentage: options.errorThresholdPercentage,
      resetTimeout: options.resetTimeoutMs,
      // Bad input says nothing about provider health.
      errorFilter: (error: unknown) => error instanceof PermanentProviderError,
      logger: options.logger,
    };

    this.embedBreaker = createCircuitBreaker(
      `${inner.name}:embed`,
      (text: string) => inner.embed(text),
      breakerOptions,
    );
    this.batchBreaker = createCircuitBreaker(
      `${inner.name}:batch-embed`,
      (texts: string[]) => inner.batchEmbed(texts),
      breakerOptions,
    );
  }

  async embed(text: string): Promise<EmbeddingResult> {
    try {
      return await this.embedBreaker.fire(text);
    } catch (error: unknown) {
      throw this.translate(error);
    }
  }

  async batchEmbed(texts: string[]): Promise<EmbeddingResult> {
    try {
      return await this.batchBreaker.fire(texts);
    } catch (error: unknown) {
      throw this.translate(error);
    }
  }

  healthCheck(): Promise<boolean> {
    return this.inner.healthCheck();
  }

  shutdown(): void {
    this.embedBreaker.shutdown();
    this.batchBreaker.shutdown();
  }

  private translate(error: unknown): unknown {
    const code = codeOf(error);
    const message = error instanceof Error ? error.message : String(error);
    if (code === "ETIMEDOUT") {
      return new TransientProviderError(message, "timeout", this.name);
    }
    if (code === "EOPENBREAKER") {
      return new TransientProviderError(message, "unavailable", this.name);
    }
    return error;
  }
}
