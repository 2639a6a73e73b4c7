import type { CacheConfig, ContentFingerprint, ExtractedMessage } from "@chatsift/contracts";
import { DEFAULT_CONFIG } from "./defaults.js";
import type { ExtractedHistory } from "./extract.js";
import { normalizeRoles } from "./utils.js";

const ENTRY_OVERHEAD_BYTES = 256;
const MESSAGE_OVERHEAD_BYTES = 32;

interface CacheEntry {
  fingerprint: ContentFingerprint;
  history: ExtractedHistory;
  approxBytes: number;
}

function sameFingerprint(a: ContentFingerprint, b: ContentFingerprint): boolean {
  return a.maxSequence === b.maxSequence && a.totalByteLength === b.totalByteLength;
}

export function estimateHistoryBytes(messages: readonly ExtractedMessage[]): number {
  let total = ENTRY_OVERHEAD_BYTES;
  for (const message of messages) {
    total += message.role.length + message.text.length + MESSAGE_OVERHEAD_BYTES;
  }
  return total;
}

function copyHistory(history: ExtractedHistory): ExtractedHistory {
  return {
    messages: history.messages.map((message) => ({ ...message })),
    blobOrdinals: history.blobOrdinals.slice(),
  };
}

/**
 * LRU of complete message histories, one per store and role set. An entry
 * is only served while the store's fingerprint still matches the one it was
 * built under; a stale entry stays until the next `put` for the same key
 * replaces it or LRU pressure evicts it.
 *
 * Every method updates the map and the byte total together without
 * yielding, so callers on the event loop always see a consistent pair.
 */
export class FullHistoryCache {
  readonly maxEntries: number;
  readonly maxBytes: number;
  private readonly entries = new Map<string, CacheEntry>();
  private bytes = 0;

  constructor(options: Partial<CacheConfig> = {}) {
    this.maxEntries = Math.max(1, options.maxEntries ?? DEFAULT_CONFIG.cache.maxEntries);
    this.maxBytes = Math.max(1, options.maxBytes ?? DEFAULT_CONFIG.cache.maxBytes);
  }

  static keyFor(storeIdentity: string, roles: readonly string[]): string {
    return `${storeIdentity}\u0000${normalizeRoles(roles).join(",")}`;
  }

  get size(): number {
    return this.entries.size;
  }

  get totalBytes(): number {
    return this.bytes;
  }

  get(storeIdentity: string, roles: readonly string[], fingerprint: ContentFingerprint): ExtractedHistory | null {
    const key = FullHistoryCache.keyFor(storeIdentity, roles);
    const entry = this.entries.get(key);
    if (!entry || !sameFingerprint(entry.fingerprint, fingerprint)) return null;
    this.entries.delete(key);
    this.entries.set(key, entry);
    return copyHistory(entry.history);
  }

  /** Like `get`, without touching recency. */
  peek(storeIdentity: string, roles: readonly string[], fingerprint: ContentFingerprint): ExtractedHistory | null {
    const entry = this.entries.get(FullHistoryCache.keyFor(storeIdentity, roles));
    if (!entry || !sameFingerprint(entry.fingerprint, fingerprint)) return null;
    return copyHistory(entry.history);
  }

  put(storeIdentity: string, roles: readonly string[], fingerprint: ContentFingerprint, history: ExtractedHistory): void {
    const key = FullHistoryCache.keyFor(storeIdentity, roles);
    const approxBytes = estimateHistoryBytes(history.messages);
    this.remove(key);
    if (approxBytes > this.maxBytes) return;

    this.entries.set(key, { fingerprint: { ...fingerprint }, history: copyHistory(history), approxBytes });
    this.bytes += approxBytes;
    this.evict();
  }

  clear(): void {
    this.entries.clear();
    this.bytes = 0;
  }

  private remove(key: string): void {
    const existing = this.entries.get(key);
    if (!existing) return;
    this.entries.delete(key);
    this.bytes -= existing.approxBytes;
  }

  private evict(): void {
    while (this.entries.size > this.maxEntries || this.bytes > this.maxBytes) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.remove(oldest.value);
    }
  }
}
