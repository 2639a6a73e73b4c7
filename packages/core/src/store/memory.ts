import type { BlobRecord, ContentFingerprint, MetaRow } from "@chatsift/contracts";
import { StoreQueryError } from "../errors.js";
import type { BlobStore } from "./types.js";

export interface MemoryBlob {
  id: string;
  bytes: Uint8Array;
}

export interface MemoryStoreCounters {
  rowQueries: number;
  rowsRead: number;
  fingerprintQueries: number;
  metaQueries: number;
  blobLookups: number;
}

/**
 * In-process store over plain byte arrays. Used for stores already loaded by
 * the caller and as a stand-in for `store.db` in tests; `counters` records
 * every access.
 */
export class MemoryBlobStore implements BlobStore {
  readonly identity: string;
  readonly counters: MemoryStoreCounters = {
    rowQueries: 0,
    rowsRead: 0,
    fingerprintQueries: 0,
    metaQueries: 0,
    blobLookups: 0,
  };
  private readonly blobs: Array<MemoryBlob & { sequence: number }> = [];
  private meta: MetaRow[] = [];
  private nextSequence = 1;
  private failure: Error | null = null;

  constructor(identity = "memory", blobs: MemoryBlob[] = []) {
    this.identity = identity;
    for (const blob of blobs) this.append(blob.id, blob.bytes);
  }

  append(id: string, bytes: Uint8Array | string): this {
    const data = typeof bytes === "string" ? Buffer.from(bytes, "utf8") : bytes;
    this.blobs.push({ id, bytes: data, sequence: this.nextSequence });
    this.nextSequence += 1;
    return this;
  }

  setMeta(rows: MetaRow[]): this {
    this.meta = rows;
    return this;
  }

  /** Makes every following access throw, as a locked or corrupt file would. */
  failQueries(error: Error | null = new Error("database is locked")): this {
    this.failure = error;
    return this;
  }

  private guard(label: string): void {
    if (this.failure) {
      throw new StoreQueryError(this.identity, label, { cause: this.failure });
    }
  }

  private *iterate(records: Array<MemoryBlob & { sequence: number }>, label: string): Generator<BlobRecord> {
    this.guard(label);
    this.counters.rowQueries += 1;
    for (const record of records) {
      this.counters.rowsRead += 1;
      yield { sequence: record.sequence, bytes: record.bytes };
    }
  }

  fetchRowsAscending(limit: number | null): Iterable<BlobRecord> {
    const rows = limit === null ? this.blobs.slice() : this.blobs.slice(0, Math.max(0, limit));
    return this.iterate(rows, "blobs asc");
  }

  fetchRowsDescending(limit: number | null): Iterable<BlobRecord> {
    const reversed = this.blobs.slice().reverse();
    const rows = limit === null ? reversed : reversed.slice(0, Math.max(0, limit));
    return this.iterate(rows, "blobs desc");
  }

  fetchFingerprint(): ContentFingerprint {
    this.guard("fingerprint");
    this.counters.fingerprintQueries += 1;
    let maxSequence = 0;
    let totalByteLength = 0;
    for (const blob of this.blobs) {
      maxSequence = Math.max(maxSequence, blob.sequence);
      totalByteLength += blob.bytes.byteLength;
    }
    return { maxSequence, totalByteLength };
  }

  fetchMetaRows(): MetaRow[] {
    this.guard("meta");
    this.counters.metaQueries += 1;
    return this.meta.slice();
  }

  fetchBlobById(id: string): Uint8Array | null {
    this.guard("blob by id");
    this.counters.blobLookups += 1;
    return this.blobs.find((blob) => blob.id === id)?.bytes ?? null;
  }
}
