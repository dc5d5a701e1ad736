import type { FetchedContent, IContentSource, SourceItem, SourcePage } from "@indexloom/types";
import { SourceFetchError } from "@indexloom/errors";

export interface InMemoryDocument {
  sourceId: string;
  title?: string;
  mimeType?: string;
  version?: string | null;
  content: Uint8Array | string;
}

/**
 * Scriptable content source held in memory. Each user sees its own set of
 * documents; removed documents are listed as deleted until re-added.
 */
export class InMemoryContentSource implements IContentSource {
  readonly type: string;
  private readonly pageSize: number;
  private readonly documents = new Map<string, Map<string, InMemoryDocument>>();
  private readonly removed = new Map<string, Set<string>>();
  private readonly failing = new Set<string>();
  private fetches = 0;

  constructor(options: { type?: string; pageSize?: number } = {}) {
    this.type = options.type ?? "memory";
    this.pageSize = options.pageSize ?? 100;
  }

  /** Number of `fetch` calls served so far. */
  get fetchCount(): number {
    return this.fetches;
  }

  put(userId: string, doc: InMemoryDocument): this {
    this.userDocs(userId).set(doc.sourceId, doc);
    this.removed.get(userId)?.delete(doc.sourceId);
    return this;
  }

  remove(userId: string, sourceId: string): this {
    if (this.userDocs(userId).delete(sourceId)) {
      const gone = this.removed.get(userId) ?? new Set<string>();
      gone.add(sourceId);
      this.removed.set(userId, gone);
    }
    return this;
  }

  /** Make every subsequent fetch of `sourceId` fail. */
  failFetch(sourceId: string): this {
    this.failing.add(sourceId);
    return this;
  }

  async listPage(userId: string, cursor: string | null): Promise<SourcePage> {
    const items: SourceItem[] = [...this.userDocs(userId).values()].map((doc) => ({
      sourceId: doc.sourceId,
      title: doc.title ?? doc.sourceId,
      mimeType: doc.mimeType ?? "text/plain",
      version: doc.version ?? null,
      locator: `memory://${doc.sourceId}`,
    }));
    for (const sourceId of this.removed.get(userId) ?? []) {
      items.push({ sourceId, title: sourceId, mimeType: "text/plain", deleted: true });
    }

    const offset = cursor === null ? 0 : Number(cursor);
    const page = items.slice(offset, offset + this.pageSize);
    const next = offset + page.length;
    return { items: page, nextCursor: next < items.length ? String(next) : null };
  }

  async fetch(userId: string, item: SourceItem): Promise<FetchedContent> {
    this.fetches += 1;
    const doc = this.userDocs(userId).get(item.sourceId);
    if (!doc || this.failing.has(item.sourceId)) {
      throw new SourceFetchError(`Cannot fetch ${item.sourceId}`, item.sourceId);
    }
    return { content: doc.content };
  }

  private userDocs(userId: string): Map<string, InMemoryDocument> {
    let docs = this.documents.get(userId);
    if (!docs) {
      docs = new Map();
      this.documents.set(userId, docs);
    }
    return docs;
  }
}
