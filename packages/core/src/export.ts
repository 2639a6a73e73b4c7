import { access, mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import type { ChatMetadata, ExtractedMessage } from "@chatsift/contracts";
import { roleLabel } from "./preview.js";

const INVALID_FILENAME_CHARS = /[/\\:*?"<>|\u0000-\u001f]/g;

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

function trimSeparators(value: string): string {
  return value.replace(/^[ ._]+|[ ._]+$/g, "");
}

export function sanitizeFilenameComponent(input: string, maxLen = 80): string {
  let text = input.trim();
  if (!text) return "";
  text = text.replace(INVALID_FILENAME_CHARS, "_").replace(/\s+/g, "_").replace(/_+/g, "_");
  text = trimSeparators(text);
  if (maxLen > 0 && text.length > maxLen) {
    text = trimSeparators(text.slice(0, maxLen));
  }
  return text;
}

/** `YYYY-MM-DD_HH-MM-SS_<title>.md` in local time. */
export function buildExportFilename(title: string, when: Date = new Date(), ext = ".md"): string {
  const stamp =
    `${when.getFullYear()}-${pad2(when.getMonth() + 1)}-${pad2(when.getDate())}_` +
    `${pad2(when.getHours())}-${pad2(when.getMinutes())}-${pad2(when.getSeconds())}`;
  const safeTitle = sanitizeFilenameComponent(title) || "chat";
  const suffix = ext.startsWith(".") ? ext : `.${ext}`;
  return `${stamp}_${safeTitle}${suffix}`;
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

/** Appends `-2`, `-3`, ... before the extension until the name is free. */
export async function chooseNonConflictingPath(dir: string, filename: string, maxTries = 999): Promise<string> {
  const base = path.join(dir, filename);
  if (!(await exists(base))) return base;
  const ext = path.extname(filename);
  const stem = path.basename(filename, ext);
  for (let attempt = 2; attempt <= maxTries; attempt += 1) {
    const candidate = path.join(dir, `${stem}-${attempt}${ext}`);
    if (!(await exists(candidate))) return candidate;
  }
  return path.join(dir, `${stem}-${maxTries}${ext}`);
}

export function renderMarkdown(meta: ChatMetadata | null, messages: readonly ExtractedMessage[]): string {
  const lines: string[] = [`# ${meta?.displayName ?? "Untitled"}`, ""];
  if (meta) {
    lines.push(`- Chat ID: ${meta.chatId}`);
    if (meta.mode) lines.push(`- Mode: ${meta.mode}`);
    const created = meta.createdAtMs === null ? null : new Date(meta.createdAtMs);
    if (created && !Number.isNaN(created.getTime())) lines.push(`- Created: ${created.toISOString()}`);
    lines.push("");
  }
  for (const message of messages) {
    lines.push(`## ${roleLabel(message.role)}`, "", message.text.trim(), "");
  }
  return `${lines.join("\n").trimEnd()}\n`;
}

export async function exportChatMarkdown(
  dir: string,
  meta: ChatMetadata | null,
  messages: readonly ExtractedMessage[],
  when: Date = new Date(),
): Promise<string> {
  await mkdir(dir, { recursive: true });
  const target = await chooseNonConflictingPath(dir, buildExportFilename(meta?.displayName ?? "chat", when));
  await writeFile(target, renderMarkdown(meta, messages), "utf8");
  return target;
}
