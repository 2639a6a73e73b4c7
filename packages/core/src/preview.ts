import type { ExtractedMessage, MessagePreview, PreviewConfig, ScannerConfig } from "@chatsift/contracts";
import { DEFAULT_CONFIG } from "./defaults.js";
import { extractMessages, logExtractionFailure, type ExtractContext } from "./extract.js";
import { iterBalancedObjects } from "./scan/balanced.js";
import type { ScanStats } from "./scan/common.js";
import { isInjectedContext, normalizeMessage } from "./scan/normalize.js";
import type { BlobStore } from "./store/types.js";
import { normalizeRoles } from "./utils.js";

export interface PreviewOptions extends ExtractContext {
  roles?: readonly string[];
  preview?: PreviewConfig;
}

const WRAPPER_TAGS = new Set(["<user_query>", "</user_query>", "<user_info>", "</user_info>"]);

/** Last qualifying message in document order within a single blob. */
export function lastMessageInBlob(
  bytes: Uint8Array,
  roles: ReadonlySet<string>,
  options: { settings: ScannerConfig; maxObjects: number; stats?: ScanStats },
): MessagePreview | null {
  let last: MessagePreview | null = null;
  for (const value of iterBalancedObjects(bytes, {
    maxObjects: options.maxObjects,
    ...(options.stats ? { stats: options.stats } : {}),
  })) {
    const { role, text } = normalizeMessage(value);
    if (!role || !roles.has(role) || !text) continue;
    if (isInjectedContext(role, text, options.settings.injectedContextMarkers)) continue;
    last = { role, text: text.trim() };
  }
  return last;
}

/**
 * The root blob named by the store's metadata is tried first; when it holds
 * no message (some agent versions keep a binary tree node there) the most
 * recent blobs are searched instead.
 */
export function readLastMessagePreview(
  store: BlobStore,
  latestRootBlobId: string | null,
  options: PreviewOptions = {},
): MessagePreview | null {
  const preview = options.preview ?? DEFAULT_CONFIG.preview;
  const settings = options.settings ?? DEFAULT_CONFIG.scanner;
  const roles = normalizeRoles(options.roles ?? preview.roles);

  if (latestRootBlobId) {
    try {
      const root = store.fetchBlobById(latestRootBlobId);
      const found = root
        ? lastMessageInBlob(root, new Set(roles), {
            settings,
            maxObjects: preview.rootBlobMaxObjects,
            ...(options.stats ? { stats: options.stats } : {}),
          })
        : null;
      if (found) return found;
    } catch (error) {
      logExtractionFailure(options.logger, store, error);
      return null;
    }
  }

  const recent = extractMessages(
    store,
    "recent",
    { roles, maxMessages: 1, maxBlobs: preview.fallbackBlobWindow },
    options,
  );
  const last = recent[recent.length - 1];
  return last ? { role: last.role, text: last.text } : null;
}

export function roleLabel(role: string): string {
  if (role === "user") return "User";
  if (role === "assistant") return "Assistant";
  return role;
}

export function formatMessagesPreview(
  messages: readonly ExtractedMessage[],
  options: { maxCharsPerMessage?: number } = {},
): string {
  const maxChars = options.maxCharsPerMessage ?? DEFAULT_CONFIG.preview.maxCharsPerMessage;
  const lines: string[] = [];
  for (const message of messages) {
    let text = message.text.trim();
    if (maxChars > 0 && text.length > maxChars) {
      text = `${text.slice(0, maxChars - 1).trimEnd()}…`;
    }
    lines.push(`${roleLabel(message.role)}:`, text, "");
  }
  return lines.join("\n").trimEnd();
}

export function isGenericChatName(name: string): boolean {
  const normalized = name.trim().toLowerCase();
  return normalized === "new agent" || normalized === "untitled";
}

/** First meaningful line of the first `User:` block of a formatted preview. */
export function deriveTitleFromHistory(historyText: string): string | null {
  const lines = historyText.split(/\r?\n/).map((line) => line.trim());
  const userIndex = lines.findIndex((line) => {
    const lower = line.toLowerCase();
    return lower === "user:" || lower === "user";
  });
  if (userIndex === -1) return null;

  for (const line of lines.slice(userIndex + 1)) {
    if (!line) continue;
    if (WRAPPER_TAGS.has(line.toLowerCase())) continue;
    if (line.startsWith("<") && line.endsWith(">")) continue;
    return line;
  }
  return null;
}
