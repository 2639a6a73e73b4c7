import type { Logger } from "pino";
import type {
  AppConfig,
  ChatMetadata,
  ContentFingerprint,
  ExtractedMessage,
  ExtractRequest,
  MessagePreview,
} from "@chatsift/contracts";
import { FullHistoryCache } from "./cache.js";
import { DEFAULT_CONFIG } from "./defaults.js";
import { extractHistory, extractMessages, logExtractionFailure, type ExtractedHistory } from "./extract.js";
import { parseChatMetadata } from "./metadata.js";
import { readLastMessagePreview } from "./preview.js";
import { createScanStats, type ScanStats } from "./scan/common.js";
import type { BlobStore } from "./store/types.js";

export interface ChatStoreReaderOptions {
  cache?: FullHistoryCache;
  config?: Pick<AppConfig, "scanner" | "preview">;
  logger?: Logger;
  stats?: ScanStats;
}

function isUnbounded(request: ExtractRequest): boolean {
  return request.maxMessages === null && request.maxBlobs === null;
}

function isEmptyRequest(request: ExtractRequest): boolean {
  return (
    (request.maxMessages !== null && request.maxMessages <= 0) ||
    (request.maxBlobs !== null && request.maxBlobs <= 0)
  );
}

/** Head of a cached full history restricted to the first `maxBlobs` blobs. */
function headFromHistory(history: ExtractedHistory, request: ExtractRequest): ExtractedMessage[] {
  const head: ExtractedMessage[] = [];
  for (const [index, message] of history.messages.entries()) {
    if (request.maxMessages !== null && head.length >= request.maxMessages) break;
    const ordinal = history.blobOrdinals[index] ?? Number.POSITIVE_INFINITY;
    if (request.maxBlobs !== null && ordinal > request.maxBlobs) break;
    head.push(message);
  }
  return head;
}

/**
 * Entry point for consumers. Owns (or is handed) the full-history cache;
 * construct one per host process and share it between callers.
 */
export class ChatStoreReader {
  readonly cache: FullHistoryCache;
  readonly stats: ScanStats;
  private readonly config: Pick<AppConfig, "scanner" | "preview">;
  private readonly logger: Logger | undefined;

  constructor(options: ChatStoreReaderOptions = {}) {
    this.config = options.config ?? DEFAULT_CONFIG;
    this.cache = options.cache ?? new FullHistoryCache();
    this.stats = options.stats ?? createScanStats();
    this.logger = options.logger;
  }

  private context(): { settings: AppConfig["scanner"]; stats: ScanStats; logger?: Logger } {
    return {
      settings: this.config.scanner,
      stats: this.stats,
      ...(this.logger ? { logger: this.logger } : {}),
    };
  }

  private fingerprint(store: BlobStore): ContentFingerprint | null {
    try {
      return store.fetchFingerprint();
    } catch (error) {
      logExtractionFailure(this.logger, store, error);
      return null;
    }
  }

  extractRecent(store: BlobStore, request: ExtractRequest): ExtractedMessage[] {
    if (isEmptyRequest(request)) return [];
    if (!isUnbounded(request)) {
      return extractMessages(store, "recent", request, this.context());
    }

    const fingerprint = this.fingerprint(store);
    if (!fingerprint) return [];

    const cached = this.cache.get(store.identity, request.roles, fingerprint);
    if (cached) return cached.messages;

    try {
      const history = extractHistory(store, "recent", request, this.context());
      this.cache.put(store.identity, request.roles, fingerprint, history);
      return history.messages;
    } catch (error) {
      logExtractionFailure(this.logger, store, error);
      return [];
    }
  }

  /**
   * Served from a fresh full-history entry when one exists. Never writes to
   * the cache or changes its recency.
   */
  extractInitial(store: BlobStore, request: ExtractRequest): ExtractedMessage[] {
    if (isEmptyRequest(request)) return [];

    if (this.cache.size > 0) {
      const fingerprint = this.fingerprint(store);
      if (!fingerprint) return [];
      const cached = this.cache.peek(store.identity, request.roles, fingerprint);
      if (cached) return headFromHistory(cached, request);
    }

    return extractMessages(store, "initial", request, this.context());
  }

  readMetadata(store: BlobStore): ChatMetadata | null {
    try {
      return parseChatMetadata(store.fetchMetaRows());
    } catch (error) {
      logExtractionFailure(this.logger, store, error);
      return null;
    }
  }

  readLastMessagePreview(
    store: BlobStore,
    latestRootBlobId: string | null,
    roles?: readonly string[],
  ): MessagePreview | null {
    return readLastMessagePreview(store, latestRootBlobId, {
      ...this.context(),
      preview: this.config.preview,
      ...(roles ? { roles } : {}),
    });
  }

  clearCache(): void {
    this.cache.clear();
  }
}
