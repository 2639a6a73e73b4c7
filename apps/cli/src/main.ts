#!/usr/bin/env tsx
import path from "node:path";
import { Command } from "commander";
import type { AppConfig, ChatMetadata, DiscoveredChatStore, ExtractRequest } from "@chatsift/contracts";
import {
  ChatStoreReader,
  ChatTitleCache,
  DEFAULT_CONFIG_PATH,
  FullHistoryCache,
  SqliteBlobStore,
  compactText,
  createLogger,
  deriveTitleFromHistory,
  discoverChatStores,
  errorMessage,
  expandHome,
  exportChatMarkdown,
  formatMessagesPreview,
  isGenericChatName,
  loadConfig,
  mergeConfig,
  resolveChatsRoot,
  roleLabel,
  saveConfig,
  titleCachePath,
  type PartialAppConfigInput,
} from "@chatsift/core";

const DEFAULT_CHAT_LIMIT = 50;
const TITLE_SOURCE_MESSAGES = 4;
const UNBOUNDED_KEYWORD = "all";

interface CliContext {
  configPath: string;
  config: AppConfig;
  reader: ChatStoreReader;
}

function printTable(rows: string[][]): void {
  if (rows.length === 0) return;
  const header = rows[0];
  if (!header) return;
  const widths = header.map((_, col) => Math.max(...rows.map((row) => (row[col] ?? "").length)));
  for (const [idx, row] of rows.entries()) {
    const line = row
      .map((cell, col) => (cell ?? "").padEnd(widths[col] ?? 0))
      .join(idx === 0 ? " | " : "   ");
    console.log(line);
    if (idx === 0) {
      console.log(widths.map((width) => "-".repeat(width)).join("-+-"));
    }
  }
}

function fmtTimeCompact(ms: number | null): string {
  if (!ms) return "-";
  const date = new Date(ms);
  if (Number.isNaN(date.getTime())) return "-";
  return date.toISOString().replace(".000Z", "Z");
}

function parseValue(input: string): unknown {
  if (input === "true") return true;
  if (input === "false") return false;
  const numeric = Number(input);
  if (!Number.isNaN(numeric) && input.trim() !== "") return numeric;
  if (input.includes(",")) return input.split(",").map((part) => part.trim());
  return input;
}

function setPath(target: Record<string, unknown>, dottedKey: string, value: unknown): void {
  const parts = dottedKey.split(".").filter(Boolean);
  if (parts.length === 0) return;

  let cursor: Record<string, unknown> = target;
  for (let i = 0; i < parts.length - 1; i += 1) {
    const key = parts[i];
    if (!key) continue;
    const next = cursor[key];
    if (!next || typeof next !== "object" || Array.isArray(next)) {
      cursor[key] = {};
    }
    cursor = cursor[key] as Record<string, unknown>;
  }
  const lastKey = parts[parts.length - 1];
  if (!lastKey) return;
  cursor[lastKey] = value;
}

/** `undefined` and "all" mean unbounded. */
function parseCount(input: string | undefined, label: string): number | null {
  if (input === undefined || input.trim().toLowerCase() === UNBOUNDED_KEYWORD) return null;
  const numeric = Number(input);
  if (!Number.isInteger(numeric)) {
    throw new Error(`invalid ${label}: ${input}`);
  }
  return numeric;
}

function parseRoles(input: string | undefined, fallback: string[]): string[] {
  if (!input) return fallback;
  const roles = input
    .split(",")
    .map((role) => role.trim())
    .filter(Boolean);
  return roles.length > 0 ? roles : fallback;
}

async function loadContext(): Promise<CliContext> {
  const configPath = program.opts<{ config: string }>().config;
  const config = await loadConfig(configPath);
  const reader = new ChatStoreReader({
    cache: new FullHistoryCache(config.cache),
    config,
    logger: createLogger(config.logging),
  });
  return { configPath, config, reader };
}

function openStore(storePath: string, config: AppConfig): SqliteBlobStore {
  return new SqliteBlobStore(expandHome(storePath), { busyTimeoutMs: config.store.busyTimeoutMs });
}

function resolveTitle(
  context: CliContext,
  titles: ChatTitleCache,
  entry: DiscoveredChatStore,
  store: SqliteBlobStore,
  meta: ChatMetadata | null,
): string {
  const name = meta?.displayName ?? "Untitled";
  if (!isGenericChatName(name)) return name;

  const chatId = meta?.chatId ?? entry.chatId;
  const cached = titles.get(entry.workspaceHash, chatId);
  if (cached) return cached;

  const head = context.reader.extractInitial(store, {
    roles: context.config.preview.roles,
    maxMessages: TITLE_SOURCE_MESSAGES,
    maxBlobs: null,
  });
  const derived = deriveTitleFromHistory(formatMessagesPreview(head));
  if (!derived) return name;
  titles.set(entry.workspaceHash, chatId, derived);
  return derived;
}

const program = new Command();
program.name("chatsift").description("Recover chat messages from agent store.db files");
program.option("--config <path>", "Config path", DEFAULT_CONFIG_PATH);
program.addHelpText(
  "after",
  `
Examples:
  $ chatsift chats --limit 20
  $ chatsift messages ~/.cursor/chats/<hash>/<chat>/store.db --limit 10
  $ chatsift messages <store.db> --initial --limit 3 --json
  $ chatsift preview <store.db>
  $ chatsift export <store.db> --out ./exports
`,
);

program
  .command("chats")
  .description("List chat stores under the agent config directory")
  .option("--limit <n>", "Rows to show", String(DEFAULT_CHAT_LIMIT))
  .option("--json", "JSON output")
  .action(async (opts: { limit: string; json?: boolean }) => {
    const context = await loadContext();
    const limit = Math.max(1, Number(opts.limit) || DEFAULT_CHAT_LIMIT);
    const discovered = (await discoverChatStores(resolveChatsRoot(context.config))).slice(0, limit);
    const titles = await ChatTitleCache.load(titleCachePath(context.configPath));

    const rows = discovered.map((entry) => {
      const store = openStore(entry.path, context.config);
      const meta = context.reader.readMetadata(store);
      const last = context.reader.readLastMessagePreview(store, meta?.latestRootBlobId ?? null);
      return {
        chatId: meta?.chatId ?? entry.chatId,
        workspaceHash: entry.workspaceHash,
        title: resolveTitle(context, titles, entry, store, meta),
        mode: meta?.mode ?? null,
        createdAtMs: meta?.createdAtMs ?? null,
        lastRole: last?.role ?? null,
        lastText: last?.text ?? null,
        path: entry.path,
      };
    });
    if (titles.dirty) await titles.save();

    if (opts.json) {
      console.log(JSON.stringify(rows, null, 2));
      return;
    }
    if (rows.length === 0) {
      console.log("no chats found");
      return;
    }
    printTable([
      ["chat", "title", "mode", "created", "last"],
      ...rows.map((row) => [
        row.chatId,
        compactText(row.title, 40),
        row.mode ?? "-",
        fmtTimeCompact(row.createdAtMs),
        row.lastText ? `${roleLabel(row.lastRole ?? "")}: ${compactText(row.lastText, 60)}` : "-",
      ]),
    ]);
  });

program
  .command("meta <store>")
  .description("Show chat metadata")
  .option("--json", "JSON output")
  .action(async (storePath: string, opts: { json?: boolean }) => {
    const context = await loadContext();
    const meta = context.reader.readMetadata(openStore(storePath, context.config));
    if (opts.json) {
      console.log(JSON.stringify(meta, null, 2));
      return;
    }
    if (!meta) {
      console.log("no metadata available");
      return;
    }
    printTable([
      ["field", "value"],
      ["chat", meta.chatId],
      ["title", meta.displayName],
      ["mode", meta.mode ?? "-"],
      ["created", fmtTimeCompact(meta.createdAtMs)],
      ["root_blob", meta.latestRootBlobId ?? "-"],
    ]);
  });

program
  .command("messages <store>")
  .description("Print recovered messages (most recent by default)")
  .option("--initial", "Read from the start of the chat instead of the end")
  .option("--limit <n>", `Messages to keep, or "${UNBOUNDED_KEYWORD}"`)
  .option("--blobs <n>", `Blobs to scan, or "${UNBOUNDED_KEYWORD}"`)
  .option("--roles <list>", "Comma separated roles")
  .option("--json", "JSON output")
  .action(
    async (
      storePath: string,
      opts: { initial?: boolean; limit?: string; blobs?: string; roles?: string; json?: boolean },
    ) => {
      const context = await loadContext();
      const store = openStore(storePath, context.config);
      const request: ExtractRequest = {
        roles: parseRoles(opts.roles, context.config.preview.roles),
        maxMessages: parseCount(opts.limit, "limit"),
        maxBlobs: parseCount(opts.blobs, "blob count"),
      };
      const messages = opts.initial
        ? context.reader.extractInitial(store, request)
        : context.reader.extractRecent(store, request);

      if (opts.json) {
        console.log(JSON.stringify(messages, null, 2));
        return;
      }
      if (messages.length === 0) {
        console.log("no messages found");
        return;
      }
      console.log(formatMessagesPreview(messages, { maxCharsPerMessage: context.config.preview.maxCharsPerMessage }));
    },
  );

program
  .command("preview <store>")
  .description("Show the last message of a chat")
  .option("--json", "JSON output")
  .action(async (storePath: string, opts: { json?: boolean }) => {
    const context = await loadContext();
    const store = openStore(storePath, context.config);
    const meta = context.reader.readMetadata(store);
    const last = context.reader.readLastMessagePreview(store, meta?.latestRootBlobId ?? null);
    if (opts.json) {
      console.log(JSON.stringify(last, null, 2));
      return;
    }
    if (!last) {
      console.log("no preview available");
      return;
    }
    console.log(formatMessagesPreview([last], { maxCharsPerMessage: context.config.preview.maxCharsPerMessage }));
  });

program
  .command("export <store>")
  .description("Write the full chat history as Markdown")
  .option("--out <dir>", "Output directory (defaults to paths.exportDir)")
  .action(async (storePath: string, opts: { out?: string }) => {
    const context = await loadContext();
    const store = openStore(storePath, context.config);
    const meta = context.reader.readMetadata(store);
    const messages = context.reader.extractRecent(store, {
      roles: context.config.preview.roles,
      maxMessages: null,
      maxBlobs: null,
    });
    if (messages.length === 0) {
      throw new Error(`no messages found in ${storePath}`);
    }
    const outDir = path.resolve(expandHome(opts.out ?? context.config.paths.exportDir));
    const written = await exportChatMarkdown(outDir, meta, messages);
    console.log(written);
  });

const configCmd = program.command("config").description("Configuration");

configCmd.command("get").action(async () => {
  const configPath = program.opts<{ config: string }>().config;
  const config = await loadConfig(configPath);
  console.log(JSON.stringify(config, null, 2));
});

configCmd.command("set <key> <value>").action(async (key: string, value: string) => {
  const configPath = program.opts<{ config: string }>().config;
  const config = await loadConfig(configPath);
  const mutable = structuredClone(config) as unknown as Record<string, unknown>;
  setPath(mutable, key, parseValue(value));
  const merged = mergeConfig(mutable as PartialAppConfigInput);
  await saveConfig(merged, configPath);
  console.log(`updated ${key}`);
});

void program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(errorMessage(error));
  process.exitCode = 1;
});
