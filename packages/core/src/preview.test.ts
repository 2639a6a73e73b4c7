import { describe, expect, it } from "vitest";
import { DEFAULT_CONFIG } from "./defaults.js";
import {
  deriveTitleFromHistory,
  formatMessagesPreview,
  isGenericChatName,
  lastMessageInBlob,
  readLastMessagePreview,
  roleLabel,
} from "./preview.js";
import { MemoryBlobStore } from "./store/memory.js";

function message(role: string, text: string): string {
  return JSON.stringify({ role, content: [{ type: "text", text }] });
}

describe("lastMessageInBlob", () => {
  const roles = new Set(["user", "assistant"]);
  const options = { settings: DEFAULT_CONFIG.scanner, maxObjects: 200 };

  it("returns the last qualifying message in document order", () => {
    const bytes = Buffer.from(
      `\u0000${message("user", "first")}\u0000${message("assistant", " second ")}\u0000${message("tool", "third")}`,
    );
    expect(lastMessageInBlob(bytes, roles, options)).toEqual({ role: "assistant", text: "second" });
  });

  it("skips injected context", () => {
    const bytes = Buffer.from(`${message("user", "question")}${message("user", "<user_info>env</user_info>")}`);
    expect(lastMessageInBlob(bytes, roles, options)).toEqual({ role: "user", text: "question" });
  });

  it("returns null for blobs without messages", () => {
    expect(lastMessageInBlob(Buffer.from([0, 1, 2, 3]), roles, options)).toBeNull();
  });
});

describe("readLastMessagePreview", () => {
  it("prefers the root blob over newer blobs", () => {
    const store = new MemoryBlobStore()
      .append("root", message("user", "from root"))
      .append("later", message("assistant", "newer"));
    expect(readLastMessagePreview(store, "root")).toEqual({ role: "user", text: "from root" });
  });

  it("searches recent blobs when the root blob is missing or empty", () => {
    const store = new MemoryBlobStore()
      .append("a", message("user", "older"))
      .append("b", message("assistant", "latest"))
      .append("root", Buffer.from([0, 1, 2, 3]));
    expect(readLastMessagePreview(store, "root")).toEqual({ role: "assistant", text: "latest" });
    expect(readLastMessagePreview(store, "missing")).toEqual({ role: "assistant", text: "latest" });
    expect(readLastMessagePreview(store, null)).toEqual({ role: "assistant", text: "latest" });
  });

  it("bounds the fallback search by the configured blob window", () => {
    const store = new MemoryBlobStore()
      .append("a", message("user", "too old"))
      .append("b", "no json here")
      .append("c", "nor here");
    const preview = { ...DEFAULT_CONFIG.preview, fallbackBlobWindow: 2 };
    expect(readLastMessagePreview(store, null, { preview })).toBeNull();
    expect(readLastMessagePreview(store, null)).toEqual({ role: "user", text: "too old" });
  });

  it("applies the role filter to the root blob", () => {
    const store = new MemoryBlobStore().append("root", `${message("user", "ask")}${message("assistant", "answer")}`);
    expect(readLastMessagePreview(store, "root", { roles: ["user"] })).toEqual({ role: "user", text: "ask" });
  });

  it("returns null when the store cannot be read", () => {
    const store = new MemoryBlobStore().append("root", message("user", "x")).failQueries();
    expect(readLastMessagePreview(store, "root")).toBeNull();
  });
});

describe("formatMessagesPreview", () => {
  it("labels roles and separates messages with blank lines", () => {
    expect(
      formatMessagesPreview([
        { role: "user", text: " hi " },
        { role: "assistant", text: "hello" },
        { role: "system", text: "note" },
      ]),
    ).toBe("User:\nhi\n\nAssistant:\nhello\n\nsystem:\nnote");
  });

  it("truncates long messages", () => {
    expect(formatMessagesPreview([{ role: "user", text: "abcdef ghij" }], { maxCharsPerMessage: 8 })).toBe(
      "User:\nabcdef…",
    );
  });
});

describe("titles", () => {
  it("recognizes placeholder chat names", () => {
    expect(isGenericChatName(" New Agent ")).toBe(true);
    expect(isGenericChatName("untitled")).toBe(true);
    expect(isGenericChatName("Fix login")).toBe(false);
  });

  it("takes the first real line of the first user block", () => {
    const history = "Assistant:\nready\n\nUser:\n<user_query>\nFix the login flow\nplease\n</user_query>";
    expect(deriveTitleFromHistory(history)).toBe("Fix the login flow");
    expect(deriveTitleFromHistory("Assistant:\nonly me")).toBeNull();
  });

  it("maps known roles to labels", () => {
    expect(roleLabel("assistant")).toBe("Assistant");
    expect(roleLabel("tool")).toBe("tool");
  });
});
