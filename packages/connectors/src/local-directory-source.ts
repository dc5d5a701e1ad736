import { readdir, readFile, stat } from "node:fs/promises";
import { basename, join, relative, resolve, sep } from "node:path";
import type { FetchedContent, IContentSource, SourceItem, SourcePage } from "@indexloom/types";
import { SourceFetchError, ValidationError } from "@indexloom/errors";
import { mimeTypeFor } from "./mime.js";

const DEFAULT_PAGE_SIZE = 50;

export interface LocalDirectorySourceOptions {
  /** Each user's documents live under `<rootDir>/<userId>/`. */
  rootDir: string;
  pageSize?: number;
}

/**
 * Content source backed by a directory tree. Source ids are paths relative to
 * the user's directory; the version marker combines mtime and size.
 */
export class LocalDirectorySource implements IContentSource {
  readonly type = "local";
  private readonly rootDir: string;
  private readonly pageSize: number;

  constructor(options: LocalDirectorySourceOptions) {
    this.rootDir = resolve(options.rootDir);
    this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
  }

  async listPage(userId: string, cursor: string | null): Promise<SourcePage> {
    const offset = cursor === null ? 0 : Number.parseInt(cursor, 10);
    if (!Number.isInteger(offset) || offset < 0) {
      throw new ValidationError("Invalid listing cursor", { cursor: String(cursor) });
    }

    const userDir = this.userDir(userId);
    const files = (await walk(userDir)).sort();
    const slice = files.slice(offset, offset + this.pageSize);

    const items: SourceItem[] = [];
    for (const file of slice) {
      const info = await stat(file);
      const sourceId = relative(userDir, file).split(sep).join("/");
      items.push({
        sourceId,
        title: basename(file),
        mimeType: mimeTypeFor(file),
        version: `${Math.trunc(info.mtimeMs)}-${info.size}`,
        locator: sourceId,
      });
    }

    const next = offset + slice.length;
    return { items, nextCursor: next < files.length ? String(next) : null };
  }

  async fetch(userId: string, item: SourceItem): Promise<FetchedContent> {
    const userDir = this.userDir(userId);
    const path = resolve(userDir, item.sourceId);
    if (!path.startsWith(userDir + sep)) {
      throw new SourceFetchError("Source id escapes the user directory", item.sourceId);
    }

    try {
      return { content: await readFile(path) };
    } catch (error: unknown) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new SourceFetchError(`Failed to read ${item.sourceId}: ${reason}`, item.sourceId);
    }
  }

  private userDir(userId: string): string {
    const dir = resolve(this.rootDir, userId);
    if (!dir.startsWith(this.rootDir + sep)) {
      throw new ValidationError("Invalid user id", { userId });
    }
    return dir;
  }
}

async function walk(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true }).catch((error: unknown) => {
    if (isMissing(error)) return null;
    throw error;
  });
  if (!entries) return [];

  const files: string[] = [];
  for (const entry of entries) {
    if (entry.name.startsWith(".")) continue;
    const full = join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await walk(full)));
    } else if (entry.isFile()) {
      files.push(full);
    }
  }
  return files;
}

function isMissing(error: unknown): boolean {
  return typeof error === "object" && error !== null && Reflect.get(error, "code") === "ENOENT";
}
