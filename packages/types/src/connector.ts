/**
 * One entry of a source listing. `version` is whatever revision marker the
 * source exposes (etag, md5, modified time); it may be absent.
 */
export interface SourceItem {
  sourceId: string;
  title: string;
  mimeType: string;
  version?: string | null;
  locator?: string | null;
  deleted?: boolean;
}

export interface SourcePage {
  items: SourceItem[];
  nextCursor: string | null;
}

export interface FetchedContent {
  content: Uint8Array | string;
  signature?: string;
}

export interface IContentSource {
  readonly type: string;
  listPage(userId: string, cursor: string | null): Promise<SourcePage>;
  fetch(userId: string, item: SourceItem): Promise<FetchedContent>;
}
