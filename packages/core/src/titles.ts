import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import path from "node:path";
import { isJsonObject, nonBlankString } from "./utils.js";

export const TITLE_CACHE_FILENAME = "chat-titles.json";
const TITLE_CACHE_VERSION = 1;

export interface CachedTitle {
  title: string;
  updatedMs: number;
}

type WorkspaceTitles = Record<string, Record<string, CachedTitle>>;

/** Title cache file kept beside the config file. */
export function titleCachePath(configPath: string): string {
  return path.join(path.dirname(configPath), TITLE_CACHE_FILENAME);
}

function parseWorkspaces(value: unknown): WorkspaceTitles {
  const workspaces: WorkspaceTitles = {};
  if (!isJsonObject(value)) return workspaces;
  for (const [workspaceHash, chats] of Object.entries(value)) {
    if (!isJsonObject(chats)) continue;
    const titles: Record<string, CachedTitle> = {};
    for (const [chatId, entry] of Object.entries(chats)) {
      if (!isJsonObject(entry)) continue;
      const title = nonBlankString(entry.title);
      if (!title) continue;
      const updatedMs = typeof entry.updatedMs === "number" && Number.isInteger(entry.updatedMs) ? entry.updatedMs : 0;
      titles[chatId] = { title, updatedMs };
    }
    if (Object.keys(titles).length > 0) workspaces[workspaceHash] = titles;
  }
  return workspaces;
}

/**
 * Titles derived from chat history for chats still carrying a placeholder
 * name, keyed by workspace hash and chat id. Saves are atomic (temp file,
 * then rename) so a concurrent reader never sees a partial file.
 */
export class ChatTitleCache {
  readonly filePath: string;
  private readonly workspaces: WorkspaceTitles;
  private changed = false;

  private constructor(filePath: string, workspaces: WorkspaceTitles) {
    this.filePath = filePath;
    this.workspaces = workspaces;
  }

  /** A missing or unreadable file yields an empty cache. */
  static async load(filePath: string): Promise<ChatTitleCache> {
    try {
      const parsed: unknown = JSON.parse(await readFile(filePath, "utf8"));
      return new ChatTitleCache(filePath, parseWorkspaces(isJsonObject(parsed) ? parsed.workspaces : null));
    } catch {
      return new ChatTitleCache(filePath, {});
    }
  }

  get dirty(): boolean {
    return this.changed;
  }

  get(workspaceHash: string, chatId: string): string | null {
    return this.workspaces[workspaceHash]?.[chatId]?.title ?? null;
  }

  set(workspaceHash: string, chatId: string, title: string, now = Date.now()): void {
    const trimmed = title.trim();
    if (!trimmed) return;
    const titles = this.workspaces[workspaceHash] ?? {};
    titles[chatId] = { title: trimmed, updatedMs: now };
    this.workspaces[workspaceHash] = titles;
    this.changed = true;
  }

  async save(): Promise<void> {
    await mkdir(path.dirname(this.filePath), { recursive: true });
    const payload = { version: TITLE_CACHE_VERSION, workspaces: this.workspaces };
    const tmpPath = `${this.filePath}.tmp`;
    await writeFile(tmpPath, `${JSON.stringify(payload, null, 2)}\n`, "utf8");
    await rename(tmpPath, this.filePath);
    this.changed = false;
  }
}
