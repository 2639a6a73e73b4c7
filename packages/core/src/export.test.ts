import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { ChatMetadata } from "@chatsift/contracts";
import {
  buildExportFilename,
  chooseNonConflictingPath,
  exportChatMarkdown,
  renderMarkdown,
  sanitizeFilenameComponent,
} from "./export.js";

const META: ChatMetadata = {
  chatId: "c1",
  latestRootBlobId: null,
  displayName: "T",
  mode: "agent",
  createdAtMs: 0,
};

const MESSAGES = [
  { role: "user", text: "hi" },
  { role: "assistant", text: " yo \n" },
];

let root = "";

beforeEach(async () => {
  root = await mkdtemp(path.join(os.tmpdir(), "chatsift-export-"));
});

afterEach(async () => {
  await rm(root, { recursive: true, force: true });
});

describe("export", () => {
  it("sanitizes filename components", () => {
    expect(sanitizeFilenameComponent("Fix: the/login flow?")).toBe("Fix_the_login_flow");
    expect(sanitizeFilenameComponent("   ")).toBe("");
    expect(sanitizeFilenameComponent("abcdefghij", 4)).toBe("abcd");
  });

  it("builds timestamped filenames in local time", () => {
    const when = new Date(2024, 0, 2, 3, 4, 5);
    expect(buildExportFilename("My Chat", when)).toBe("2024-01-02_03-04-05_My_Chat.md");
    expect(buildExportFilename("???", when, "txt")).toBe("2024-01-02_03-04-05_chat.txt");
  });

  it("renders Markdown with metadata and role headings", () => {
    expect(renderMarkdown(META, MESSAGES)).toBe(
      "# T\n\n- Chat ID: c1\n- Mode: agent\n- Created: 1970-01-01T00:00:00.000Z\n\n## User\n\nhi\n\n## Assistant\n\nyo\n",
    );
    expect(renderMarkdown(null, [{ role: "user", text: "hi" }])).toBe("# Untitled\n\n## User\n\nhi\n");
  });

  it("omits a creation time a Date cannot represent", () => {
    const meta = { ...META, mode: null, createdAtMs: 9_000_000_000_000_000 };
    expect(renderMarkdown(meta, [{ role: "user", text: "hi" }])).toBe("# T\n\n- Chat ID: c1\n\n## User\n\nhi\n");
  });

  it("picks a free path when the name is taken", async () => {
    await writeFile(path.join(root, "chat.md"), "x", "utf8");
    expect(await chooseNonConflictingPath(root, "chat.md")).toBe(path.join(root, "chat-2.md"));
    expect(await chooseNonConflictingPath(root, "other.md")).toBe(path.join(root, "other.md"));
  });

  it("writes the export into a created directory", async () => {
    const outDir = path.join(root, "nested", "out");
    const when = new Date(2024, 0, 2, 3, 4, 5);
    const first = await exportChatMarkdown(outDir, META, MESSAGES, when);
    const second = await exportChatMarkdown(outDir, META, MESSAGES, when);

    expect(first).toBe(path.join(outDir, "2024-01-02_03-04-05_T.md"));
    expect(second).toBe(path.join(outDir, "2024-01-02_03-04-05_T-2.md"));
    expect(await readFile(first, "utf8")).toBe(renderMarkdown(META, MESSAGES));
  });
});
