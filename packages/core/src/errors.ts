export class ChatsiftError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The store file is missing or cannot be opened read-only. */
export class StoreUnavailableError extends ChatsiftError {
  readonly storePath: string;

  constructor(storePath: string, options?: { cause?: unknown }) {
    super(`chat store unavailable: ${storePath}`, options);
    this.storePath = storePath;
  }
}

/** A query against an open store failed (lock contention, corruption). */
export class StoreQueryError extends ChatsiftError {
  readonly storePath: string;

  constructor(storePath: string, query: string, options?: { cause?: unknown }) {
    super(`chat store query failed (${query}): ${storePath}`, options);
    this.storePath = storePath;
  }
}

export function isStoreError(error: unknown): error is StoreUnavailableError | StoreQueryError {
  return error instanceof StoreUnavailableError || error instanceof StoreQueryError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
