import type { AppConfig } from "@chatsift/contracts";
import { DEFAULT_INJECTED_CONTEXT_MARKERS } from "./scan/normalize.js";

export const DEFAULT_ROLES = ["user", "assistant"];

export const DEFAULT_CONFIG: AppConfig = {
  scanner: {
    backwardWindowBytes: 64 * 1024,
    maxCandidates: 16,
    maxSpanBytes: 256 * 1024,
    maxObjectsPerBlob: 500,
    injectedContextMarkers: DEFAULT_INJECTED_CONTEXT_MARKERS,
  },
  cache: {
    maxEntries: 24,
    maxBytes: 32 * 1024 * 1024,
  },
  store: {
    busyTimeoutMs: 200,
  },
  preview: {
    roles: DEFAULT_ROLES,
    fallbackBlobWindow: 200,
    maxCharsPerMessage: 600,
    rootBlobMaxObjects: 200,
  },
  paths: {
    configDir: "~/.cursor",
    exportDir: "~/Downloads",
  },
  logging: {
    level: "warn",
  },
};
