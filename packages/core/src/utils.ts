import os from "node:os";
import path from "node:path";
import type { JsonObject } from "@chatsift/contracts";

export function expandHome(input: string): string {
  if (input === "~") {
    return os.homedir();
  }
  if (input.startsWith("~/")) {
    return path.join(os.homedir(), input.slice(2));
  }
  return input;
}

export function asRecord(value: unknown): JsonObject {
  if (isJsonObject(value)) {
    return value;
  }
  return {};
}

export function isJsonObject(value: unknown): value is JsonObject {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

export function nonBlankString(value: unknown): string | null {
  if (typeof value === "string" && value.trim()) {
    return value;
  }
  return null;
}

export function toBuffer(bytes: Uint8Array): Buffer {
  if (Buffer.isBuffer(bytes)) {
    return bytes;
  }
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

export function compactText(value: string, maxLen = 220): string {
  const oneLine = value.replace(/\s+/g, " ").trim();
  if (oneLine.length <= maxLen) {
    return oneLine;
  }
  return `${oneLine.slice(0, Math.max(0, maxLen - 1))}…`;
}

export function normalizeRoles(roles: readonly string[]): string[] {
  return Array.from(new Set(roles.map((role) => role.trim()).filter((role) => role.length > 0))).sort();
}
