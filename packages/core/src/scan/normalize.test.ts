import { describe, expect, it } from "vitest";
import { classifyContent, extractMessageText, isInjectedContext, normalizeMessage } from "./normalize.js";

describe("extractMessageText", () => {
  it("returns string content as-is when it is not blank", () => {
    expect(extractMessageText({ role: "user", content: "  hello  " })).toBe("  hello  ");
    expect(extractMessageText({ role: "user", content: "   " })).toBeNull();
  });

  it("takes the first part with text", () => {
    const message = {
      role: "assistant",
      content: [{ type: "image", url: "x" }, { type: "text", text: "  " }, { type: "text", text: "second" }, { text: "third" }],
    };
    expect(extractMessageText(message)).toBe("second");
  });

  it("falls back to data on text-like parts only", () => {
    expect(extractMessageText({ role: "assistant", content: [{ type: "output_text", data: "from data" }] })).toBe(
      "from data",
    );
    expect(extractMessageText({ role: "assistant", content: [{ type: "tool_call", data: "ignored" }] })).toBeNull();
    expect(extractMessageText({ role: "assistant", content: [{ data: "untyped" }] })).toBeNull();
  });

  it("skips parts that are not objects", () => {
    expect(extractMessageText({ role: "user", content: ["raw", 3, null, { type: "input_text", text: "ok" }] })).toBe("ok");
  });

  it("returns null for missing or unsupported content", () => {
    expect(extractMessageText({ role: "user" })).toBeNull();
    expect(extractMessageText({ role: "user", content: { text: "object content" } })).toBeNull();
    expect(extractMessageText({ role: "user", content: 42 })).toBeNull();
  });
});

describe("classifyContent", () => {
  it("tags each content shape", () => {
    expect(classifyContent("hi")).toEqual({ kind: "text", text: "hi" });
    expect(classifyContent([1])).toEqual({ kind: "parts", parts: [1] });
    expect(classifyContent(undefined)).toEqual({ kind: "none" });
  });
});

describe("normalizeMessage", () => {
  it("returns a null role when it is not a string", () => {
    expect(normalizeMessage({ role: 7, content: "x" })).toEqual({ role: null, text: "x" });
    expect(normalizeMessage({ role: "assistant", content: [] })).toEqual({ role: "assistant", text: null });
  });
});

describe("isInjectedContext", () => {
  const markers = ["<user_info>"];

  it("flags user turns that open with a marker after whitespace", () => {
    expect(isInjectedContext("user", "\n  <user_info>os: linux</user_info>", markers)).toBe(true);
  });

  it("keeps markers that appear later in the text or on other roles", () => {
    expect(isInjectedContext("user", "see <user_info> above", markers)).toBe(false);
    expect(isInjectedContext("assistant", "<user_info>echo", markers)).toBe(false);
  });

  it("ignores empty markers", () => {
    expect(isInjectedContext("user", "anything", [""])).toBe(false);
  });
});
