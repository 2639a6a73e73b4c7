import type { JsonObject } from "@chatsift/contracts";
import { toBuffer } from "../utils.js";
import { decodeObject, findBalancedEnd, OPEN_BRACE, ROLE_MARKER, type ScanStats } from "./common.js";

export interface AnchoredScanOptions {
  roles: Iterable<string>;
  backwardWindowBytes?: number;
  maxCandidates?: number;
  maxSpanBytes?: number;
  maxObjects?: number;
  stats?: ScanStats;
}

interface AnchoredMatch {
  value: JsonObject;
  end: number;
}

export function isAcceptedMessage(value: JsonObject, roles: ReadonlySet<string>): boolean {
  return typeof value.role === "string" && roles.has(value.role) && "content" in value;
}

function matchAroundMarker(
  bytes: Buffer,
  marker: number,
  floor: number,
  roles: ReadonlySet<string>,
  limits: { backwardWindowBytes: number; maxCandidates: number; maxSpanBytes: number },
  stats: ScanStats | undefined,
): AnchoredMatch | null {
  const lowerBound = Math.max(floor, marker - limits.backwardWindowBytes);
  let searchFrom = marker - 1;
  let tried = 0;

  while (searchFrom >= lowerBound && tried < limits.maxCandidates) {
    const start = bytes.lastIndexOf(OPEN_BRACE, searchFrom);
    if (start < lowerBound) break;
    tried += 1;
    searchFrom = start - 1;

    const end = findBalancedEnd(bytes, start, limits.maxSpanBytes);
    // The candidate has to enclose the marker to be the object carrying it.
    if (end === -1 || end < marker) continue;

    const value = decodeObject(bytes, start, end + 1, stats);
    if (value && isAcceptedMessage(value, roles)) {
      return { value, end };
    }
  }
  return null;
}

/**
 * Finds message objects by locating each `"role"` key first and only then
 * parsing the nearest enclosing object. Buffers dominated by unrelated JSON
 * cost one or two parse attempts per message instead of one per object.
 */
export function* iterRoleAnchoredObjects(data: Uint8Array, options: AnchoredScanOptions): Generator<JsonObject> {
  const bytes = toBuffer(data);
  if (!bytes.includes(ROLE_MARKER)) return;

  const roles = new Set(options.roles);
  const limits = {
    backwardWindowBytes: options.backwardWindowBytes ?? 64 * 1024,
    maxCandidates: options.maxCandidates ?? 16,
    maxSpanBytes: options.maxSpanBytes ?? 256 * 1024,
  };
  const maxObjects = options.maxObjects ?? 500;
  let cursor = 0;
  let found = 0;

  while (found < maxObjects) {
    const marker = bytes.indexOf(ROLE_MARKER, cursor);
    if (marker === -1) break;

    const match = matchAroundMarker(bytes, marker, cursor, roles, limits, options.stats);
    if (!match) {
      cursor = marker + ROLE_MARKER.length;
      continue;
    }

    yield match.value;
    found += 1;
    cursor = match.end + 1;
  }
}
