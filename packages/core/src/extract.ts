import type { Logger } from "pino";
import type {
  ExtractDirection,
  ExtractedMessage,
  ExtractRequest,
  JsonObject,
  ScannerConfig,
} from "@chatsift/contracts";
import { DEFAULT_CONFIG } from "./defaults.js";
import { isStoreError } from "./errors.js";
import { iterRoleAnchoredObjects, isAcceptedMessage } from "./scan/anchored.js";
import { iterBalancedObjects } from "./scan/balanced.js";
import { mayContainMessage, type ScanStats } from "./scan/common.js";
import { isInjectedContext, normalizeMessage } from "./scan/normalize.js";
import type { BlobStore } from "./store/types.js";
import { normalizeRoles, toBuffer } from "./utils.js";

export interface ExtractContext {
  settings?: ScannerConfig;
  stats?: ScanStats;
  logger?: Logger;
}

/**
 * Messages in chronological order, each paired with the 1-based position
 * (ascending) of the blob in the scanned window where it first appeared.
 */
export interface ExtractedHistory {
  messages: ExtractedMessage[];
  blobOrdinals: number[];
}

class MessageCollector {
  readonly messages: ExtractedMessage[] = [];
  readonly blobOrdinals: number[] = [];
  private readonly seen = new Set<string>();

  get size(): number {
    return this.messages.length;
  }

  add(role: string, text: string, blobOrdinal: number): void {
    const trimmed = text.trim();
    const key = `${role}\u0000${trimmed}`;
    if (this.seen.has(key)) return;
    this.seen.add(key);
    this.messages.push({ role, text: trimmed });
    this.blobOrdinals.push(blobOrdinal);
  }

  head(count: number | null): ExtractedHistory {
    if (count === null) return { messages: this.messages, blobOrdinals: this.blobOrdinals };
    return { messages: this.messages.slice(0, count), blobOrdinals: this.blobOrdinals.slice(0, count) };
  }

  tail(count: number | null): ExtractedHistory {
    if (count === null) return { messages: this.messages, blobOrdinals: this.blobOrdinals };
    const start = Math.max(0, this.messages.length - count);
    return { messages: this.messages.slice(start), blobOrdinals: this.blobOrdinals.slice(start) };
  }
}

function* messageObjectsInBlob(
  bytes: Buffer,
  roles: ReadonlySet<string>,
  settings: ScannerConfig,
  stats: ScanStats | undefined,
): Generator<JsonObject> {
  let accepted = 0;
  for (const value of iterRoleAnchoredObjects(bytes, {
    roles,
    backwardWindowBytes: settings.backwardWindowBytes,
    maxCandidates: settings.maxCandidates,
    maxSpanBytes: settings.maxSpanBytes,
    maxObjects: settings.maxObjectsPerBlob,
    ...(stats ? { stats } : {}),
  })) {
    accepted += 1;
    yield value;
  }
  if (accepted > 0) return;

  // Messages larger than the anchored window, or laid out in ways the
  // backward search misses, are still found by the full scan.
  for (const value of iterBalancedObjects(bytes, {
    maxObjects: settings.maxObjectsPerBlob,
    ...(stats ? { stats } : {}),
  })) {
    if (isAcceptedMessage(value, roles)) yield value;
  }
}

function collectFromBlob(
  collector: MessageCollector,
  data: Uint8Array,
  blobOrdinal: number,
  roles: ReadonlySet<string>,
  limit: number | null,
  settings: ScannerConfig,
  stats: ScanStats | undefined,
): void {
  const bytes = toBuffer(data);
  if (!mayContainMessage(bytes)) return;

  for (const value of messageObjectsInBlob(bytes, roles, settings, stats)) {
    const { role, text } = normalizeMessage(value);
    if (!role || !roles.has(role) || !text) continue;
    if (isInjectedContext(role, text, settings.injectedContextMarkers)) continue;
    collector.add(role, text, blobOrdinal);
    if (limit !== null && collector.size >= limit) return;
  }
}

function isExhaustedRequest(request: ExtractRequest): boolean {
  return (
    (request.maxMessages !== null && request.maxMessages <= 0) ||
    (request.maxBlobs !== null && request.maxBlobs <= 0)
  );
}

/**
 * Runs one directional extraction. Store failures propagate to the caller;
 * use `extractMessages` for the variant that reports them as no data.
 */
export function extractHistory(
  store: BlobStore,
  direction: ExtractDirection,
  request: ExtractRequest,
  context: ExtractContext = {},
): ExtractedHistory {
  if (isExhaustedRequest(request)) {
    return { messages: [], blobOrdinals: [] };
  }

  const settings = context.settings ?? DEFAULT_CONFIG.scanner;
  const roles = new Set(normalizeRoles(request.roles));
  const collector = new MessageCollector();

  if (direction === "initial") {
    let blobOrdinal = 0;
    for (const record of store.fetchRowsAscending(request.maxBlobs)) {
      blobOrdinal += 1;
      collectFromBlob(collector, record.bytes, blobOrdinal, roles, request.maxMessages, settings, context.stats);
      if (request.maxMessages !== null && collector.size >= request.maxMessages) break;
    }
    return collector.head(request.maxMessages);
  }

  const window = Array.from(store.fetchRowsDescending(request.maxBlobs)).reverse();
  window.forEach((record, index) => {
    collectFromBlob(collector, record.bytes, index + 1, roles, null, settings, context.stats);
  });
  return collector.tail(request.maxMessages);
}

export function extractMessages(
  store: BlobStore,
  direction: ExtractDirection,
  request: ExtractRequest,
  context: ExtractContext = {},
): ExtractedMessage[] {
  try {
    return extractHistory(store, direction, request, context).messages;
  } catch (error) {
    logExtractionFailure(context.logger, store, error);
    return [];
  }
}

export function logExtractionFailure(logger: Logger | undefined, store: BlobStore, error: unknown): void {
  if (!logger) return;
  if (isStoreError(error)) {
    logger.debug({ err: error, store: store.identity }, "chat store unreadable, treating as empty");
    return;
  }
  logger.warn({ err: error, store: store.identity }, "message extraction failed");
}
