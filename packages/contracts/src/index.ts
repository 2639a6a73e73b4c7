export type JsonObject = Record<string, unknown>;

export type ExtractDirection = "recent" | "initial";
export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

export interface BlobRecord {
  sequence: number;
  bytes: Uint8Array;
}

export interface ExtractedMessage {
  role: string;
  text: string;
}

export interface ContentFingerprint {
  maxSequence: number;
  totalByteLength: number;
}

export interface MetaRow {
  key: unknown;
  value: unknown;
}

export interface ChatMetadata {
  chatId: string;
  latestRootBlobId: string | null;
  displayName: string;
  mode: string | null;
  createdAtMs: number | null;
}

export interface MessagePreview {
  role: string;
  text: string;
}

export interface ExtractRequest {
  roles: readonly string[];
  /** `null` keeps every message. */
  maxMessages: number | null;
  /** `null` scans every blob in the store. */
  maxBlobs: number | null;
}

export interface DiscoveredChatStore {
  workspaceHash: string;
  chatId: string;
  path: string;
  sizeBytes: number;
  mtimeMs: number;
}

export interface ScannerConfig {
  backwardWindowBytes: number;
  maxCandidates: number;
  maxSpanBytes: number;
  maxObjectsPerBlob: number;
  injectedContextMarkers: string[];
}

export interface CacheConfig {
  maxEntries: number;
  maxBytes: number;
}

export interface StoreConfig {
  busyTimeoutMs: number;
}

export interface PreviewConfig {
  roles: string[];
  fallbackBlobWindow: number;
  maxCharsPerMessage: number;
  rootBlobMaxObjects: number;
}

export interface PathsConfig {
  configDir: string;
  exportDir: string;
}

export interface LoggingConfig {
  level: LogLevel;
}

export interface AppConfig {
  scanner: ScannerConfig;
  cache: CacheConfig;
  store: StoreConfig;
  preview: PreviewConfig;
  paths: PathsConfig;
  logging: LoggingConfig;
}
