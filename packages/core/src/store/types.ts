import type { BlobRecord, ContentFingerprint, MetaRow } from "@chatsift/contracts";

/**
 * Read-only view of a chat store. Every method may throw
 * `StoreUnavailableError` or `StoreQueryError`; readers turn both into empty
 * results. Row iterables are lazy so a caller that stops early never reads
 * the remaining rows.
 */
export interface BlobStore {
  /** Stable key for caching, normally the resolved database path. */
  readonly identity: string;
  fetchRowsAscending(limit: number | null): Iterable<BlobRecord>;
  fetchRowsDescending(limit: number | null): Iterable<BlobRecord>;
  fetchFingerprint(): ContentFingerprint;
  fetchMetaRows(): MetaRow[];
  fetchBlobById(id: string): Uint8Array | null;
}
