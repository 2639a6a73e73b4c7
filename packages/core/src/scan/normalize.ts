import type { JsonObject } from "@chatsift/contracts";
import { asRecord, nonBlankString } from "../utils.js";

export type MessageBody =
  | { kind: "text"; text: string }
  | { kind: "parts"; parts: readonly unknown[] }
  | { kind: "none" };

export interface NormalizedMessage {
  role: string | null;
  text: string | null;
}

// Part types whose payload may sit in `data` instead of `text`.
const TEXT_PART_TYPES = new Set(["text", "output_text", "input_text"]);

export const DEFAULT_INJECTED_CONTEXT_MARKERS = ["<user_info>"];

export function classifyContent(content: unknown): MessageBody {
  if (typeof content === "string") {
    return { kind: "text", text: content };
  }
  if (Array.isArray(content)) {
    return { kind: "parts", parts: content };
  }
  return { kind: "none" };
}

function textFromPart(part: unknown): string | null {
  const record = asRecord(part);
  const text = nonBlankString(record.text);
  if (text) return text;
  const data = nonBlankString(record.data);
  if (data && typeof record.type === "string" && TEXT_PART_TYPES.has(record.type)) {
    return data;
  }
  return null;
}

export function extractMessageText(message: JsonObject): string | null {
  const body = classifyContent(message.content);
  switch (body.kind) {
    case "text":
      return nonBlankString(body.text);
    case "parts":
      for (const part of body.parts) {
        const text = textFromPart(part);
        if (text) return text;
      }
      return null;
    case "none":
      return null;
  }
}

export function normalizeMessage(message: JsonObject): NormalizedMessage {
  return {
    role: typeof message.role === "string" ? message.role : null,
    text: extractMessageText(message),
  };
}

/** Environment blocks the agent prepends as a user turn are not conversation. */
export function isInjectedContext(role: string, text: string, markers: readonly string[]): boolean {
  if (role !== "user") return false;
  const head = text.trimStart();
  return markers.some((marker) => marker.length > 0 && head.startsWith(marker));
}
