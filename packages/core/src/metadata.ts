import type { ChatMetadata, JsonObject, MetaRow } from "@chatsift/contracts";
import { isJsonObject, nonBlankString } from "./utils.js";

function rowText(value: unknown): string | null {
  if (typeof value === "string") return value;
  if (value instanceof Uint8Array) return Buffer.from(value).toString("utf8");
  return null;
}

function isHex(value: string): boolean {
  return value.length > 0 && value.length % 2 === 0 && /^[\da-f]+$/i.test(value);
}

/**
 * Older stores keep the whole metadata object as hex-encoded JSON in a single
 * row; newer ones may hold plain JSON. Returns null for anything else.
 */
export function decodeStructuredMeta(raw: string): JsonObject | null {
  const trimmed = raw.trim();
  if (!trimmed) return null;
  const text = isHex(trimmed) ? Buffer.from(trimmed, "hex").toString("utf8") : trimmed;
  try {
    const parsed: unknown = JSON.parse(text);
    return isJsonObject(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

function structuredRow(rows: readonly MetaRow[]): MetaRow | undefined {
  return rows.find((row) => String(row.key) === "0") ?? (rows.length === 1 ? rows[0] : undefined);
}

function flatMeta(rows: readonly MetaRow[]): JsonObject {
  const flat: JsonObject = {};
  for (const row of rows) {
    if (typeof row.key !== "string") continue;
    flat[row.key] = rowText(row.value) ?? row.value;
  }
  return flat;
}

// Largest magnitude a Date accepts.
const MAX_TIMESTAMP_MS = 8.64e15;

function isTimestampMs(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && Math.abs(value) <= MAX_TIMESTAMP_MS;
}

export function parseChatMetadata(rows: readonly MetaRow[]): ChatMetadata | null {
  if (rows.length === 0) return null;

  const candidate = structuredRow(rows);
  const candidateText = candidate ? rowText(candidate.value) : null;
  const meta = (candidateText ? decodeStructuredMeta(candidateText) : null) ?? flatMeta(rows);

  const chatId = nonBlankString(meta.agentId);
  if (!chatId) return null;

  const createdAt = meta.createdAt;
  return {
    chatId,
    latestRootBlobId: nonBlankString(meta.latestRootBlobId),
    displayName: nonBlankString(meta.name) ?? "Untitled",
    mode: typeof meta.mode === "string" ? meta.mode : null,
    createdAtMs: isTimestampMs(createdAt) ? createdAt : null,
  };
}
