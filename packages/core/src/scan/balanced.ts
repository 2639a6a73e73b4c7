import type { JsonObject } from "@chatsift/contracts";
import { toBuffer } from "../utils.js";
import { decodeObject, findBalancedEnd, OPEN_BRACE, type ScanStats } from "./common.js";

export interface BalancedScanOptions {
  maxObjects?: number;
  stats?: ScanStats;
}

/**
 * Yields every balanced `{...}` span that decodes to a JSON object, in order of
 * its opening brace. After a failed candidate the scan resumes one byte past
 * that candidate's brace, so an object nested right inside it is still found.
 */
export function* iterBalancedObjects(data: Uint8Array, options: BalancedScanOptions = {}): Generator<JsonObject> {
  const bytes = toBuffer(data);
  const maxObjects = options.maxObjects ?? 200;
  let cursor = 0;
  let found = 0;

  while (cursor < bytes.length && found < maxObjects) {
    const start = bytes.indexOf(OPEN_BRACE, cursor);
    if (start === -1) break;

    const end = findBalancedEnd(bytes, start);
    if (end === -1) {
      cursor = start + 1;
      continue;
    }

    const value = decodeObject(bytes, start, end + 1, options.stats);
    if (!value) {
      cursor = start + 1;
      continue;
    }

    yield value;
    found += 1;
    cursor = end + 1;
  }
}
