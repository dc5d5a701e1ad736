import type { IContentSource } from "@indexloom/types";
import { NotFoundError } from "@indexloom/errors";

/**
 * Content sources by `type`, so a run's `options.source` can name one.
 */
export class SourceRegistry {
  private readonly sources = new Map<string, IContentSource>();

  constructor(sources: IContentSource[] = []) {
    for (const source of sources) {
      this.register(source);
    }
  }

  register(source: IContentSource): void {
    this.sources.set(source.type, source);
  }

  get(type: string): IContentSource {
    const source = this.sources.get(type);
    if (!source) {
      throw new NotFoundError(`Unknown content source: ${type}`);
    }
    return source;
  }

  has(type: string): boolean {
    return this.sources.has(type);
  }
}
