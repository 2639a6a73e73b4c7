import type { JsonObject } from "@chatsift/contracts";
import { isJsonObject } from "../utils.js";

export const OPEN_BRACE = 0x7b;
export const CLOSE_BRACE = 0x7d;
export const QUOTE = 0x22;
export const BACKSLASH = 0x5c;

export const ROLE_MARKER = Buffer.from('"role"', "utf8");

/** Counts decode attempts so callers can measure how much parsing a scan did. */
export interface ScanStats {
  parseAttempts: number;
}

export function createScanStats(): ScanStats {
  return { parseAttempts: 0 };
}

const strictUtf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Returns the index of the brace closing the object opened at `start`, or -1
 * when the span is truncated or longer than `maxSpan` bytes.
 */
export function findBalancedEnd(bytes: Uint8Array, start: number, maxSpan = Number.POSITIVE_INFINITY): number {
  const limit = Math.min(bytes.length, start + maxSpan);
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let index = start; index < limit; index += 1) {
    const byte = bytes[index];
    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (byte === BACKSLASH) {
        escaped = true;
      } else if (byte === QUOTE) {
        inString = false;
      }
      continue;
    }
    if (byte === QUOTE) {
      inString = true;
    } else if (byte === OPEN_BRACE) {
      depth += 1;
    } else if (byte === CLOSE_BRACE) {
      depth -= 1;
      if (depth === 0) return index;
    }
  }
  return -1;
}

/** Decodes `bytes[start..end)` as a JSON object, or returns null. */
export function decodeObject(bytes: Uint8Array, start: number, end: number, stats?: ScanStats): JsonObject | null {
  if (stats) stats.parseAttempts += 1;
  try {
    const parsed: unknown = JSON.parse(strictUtf8.decode(bytes.subarray(start, end)));
    return isJsonObject(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

export function mayContainMessage(bytes: Buffer): boolean {
  return bytes.includes(OPEN_BRACE) && bytes.includes(ROLE_MARKER);
}
