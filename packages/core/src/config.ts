import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import TOML, { type JsonMap } from "@iarna/toml";
import type {
  AppConfig,
  CacheConfig,
  LoggingConfig,
  LogLevel,
  PathsConfig,
  PreviewConfig,
  ScannerConfig,
  StoreConfig,
} from "@chatsift/contracts";
import { DEFAULT_CONFIG } from "./defaults.js";
import { expandHome } from "./utils.js";

export const DEFAULT_CONFIG_PATH = path.join(os.homedir(), ".chatsift", "config.toml");
export const ENV_AGENT_CONFIG_DIR = "CURSOR_AGENT_CONFIG_DIR";

export type PartialAppConfigInput = { [Section in keyof AppConfig]?: Partial<AppConfig[Section]> };

const LOG_LEVELS: readonly LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

function toFiniteNumber(value: unknown): number | null {
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

function positiveIntOrDefault(value: unknown, fallback: number): number {
  const numeric = toFiniteNumber(value);
  if (numeric === null || numeric <= 0) return fallback;
  return Math.max(1, Math.round(numeric));
}

function stringListOrDefault(value: unknown, fallback: string[]): string[] {
  if (!Array.isArray(value)) return [...fallback];
  const dedup = new Set<string>();
  for (const entry of value) {
    const text = String(entry ?? "").trim();
    if (text) dedup.add(text);
  }
  return dedup.size > 0 ? Array.from(dedup) : [...fallback];
}

function nonEmptyStringOrDefault(value: unknown, fallback: string): string {
  return typeof value === "string" && value.trim() ? value.trim() : fallback;
}

function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && LOG_LEVELS.some((level) => level === value);
}

function mergeScanner(input?: Partial<ScannerConfig>): ScannerConfig {
  const defaults = DEFAULT_CONFIG.scanner;
  return {
    backwardWindowBytes: positiveIntOrDefault(input?.backwardWindowBytes, defaults.backwardWindowBytes),
    maxCandidates: positiveIntOrDefault(input?.maxCandidates, defaults.maxCandidates),
    maxSpanBytes: positiveIntOrDefault(input?.maxSpanBytes, defaults.maxSpanBytes),
    maxObjectsPerBlob: positiveIntOrDefault(input?.maxObjectsPerBlob, defaults.maxObjectsPerBlob),
    // An explicit empty list turns the injected-context filter off.
    injectedContextMarkers: Array.isArray(input?.injectedContextMarkers)
      ? input.injectedContextMarkers.map((marker) => String(marker)).filter((marker) => marker.length > 0)
      : [...defaults.injectedContextMarkers],
  };
}

function mergeCache(input?: Partial<CacheConfig>): CacheConfig {
  const defaults = DEFAULT_CONFIG.cache;
  return {
    maxEntries: positiveIntOrDefault(input?.maxEntries, defaults.maxEntries),
    maxBytes: positiveIntOrDefault(input?.maxBytes, defaults.maxBytes),
  };
}

function mergeStore(input?: Partial<StoreConfig>): StoreConfig {
  return {
    busyTimeoutMs: positiveIntOrDefault(input?.busyTimeoutMs, DEFAULT_CONFIG.store.busyTimeoutMs),
  };
}

function mergePreview(input?: Partial<PreviewConfig>): PreviewConfig {
  const defaults = DEFAULT_CONFIG.preview;
  return {
    roles: stringListOrDefault(input?.roles, defaults.roles),
    fallbackBlobWindow: positiveIntOrDefault(input?.fallbackBlobWindow, defaults.fallbackBlobWindow),
    maxCharsPerMessage: positiveIntOrDefault(input?.maxCharsPerMessage, defaults.maxCharsPerMessage),
    rootBlobMaxObjects: positiveIntOrDefault(input?.rootBlobMaxObjects, defaults.rootBlobMaxObjects),
  };
}

function mergePaths(input?: Partial<PathsConfig>): PathsConfig {
  const defaults = DEFAULT_CONFIG.paths;
  return {
    configDir: nonEmptyStringOrDefault(input?.configDir, defaults.configDir),
    exportDir: nonEmptyStringOrDefault(input?.exportDir, defaults.exportDir),
  };
}

function mergeLogging(input?: Partial<LoggingConfig>): LoggingConfig {
  return {
    level: isLogLevel(input?.level) ? input.level : DEFAULT_CONFIG.logging.level,
  };
}

export function mergeConfig(input?: PartialAppConfigInput): AppConfig {
  return {
    scanner: mergeScanner(input?.scanner),
    cache: mergeCache(input?.cache),
    store: mergeStore(input?.store),
    preview: mergePreview(input?.preview),
    paths: mergePaths(input?.paths),
    logging: mergeLogging(input?.logging),
  };
}

export async function loadConfig(configPath = DEFAULT_CONFIG_PATH): Promise<AppConfig> {
  try {
    const raw = await readFile(configPath, "utf8");
    const parsed = TOML.parse(raw) as PartialAppConfigInput;
    return mergeConfig(parsed);
  } catch {
    return mergeConfig();
  }
}

export async function saveConfig(config: AppConfig, configPath = DEFAULT_CONFIG_PATH): Promise<void> {
  const dir = path.dirname(configPath);
  await mkdir(dir, { recursive: true });
  const content = TOML.stringify(config as unknown as JsonMap);
  await writeFile(configPath, content, "utf8");
}

/** The agent's config directory; the environment override wins over the file. */
export function resolveAgentConfigDir(config: AppConfig, env: NodeJS.ProcessEnv = process.env): string {
  const override = env[ENV_AGENT_CONFIG_DIR]?.trim();
  return path.resolve(expandHome(override || config.paths.configDir));
}

export function resolveChatsRoot(config: AppConfig, env: NodeJS.ProcessEnv = process.env): string {
  return path.join(resolveAgentConfigDir(config, env), "chats");
}
