import { describe, expect, it } from "vitest";
import type { ContentFingerprint } from "@chatsift/contracts";
import { estimateHistoryBytes, FullHistoryCache } from "./cache.js";
import type { ExtractedHistory } from "./extract.js";

const ROLES = ["user", "assistant"];
const FP: ContentFingerprint = { maxSequence: 3, totalByteLength: 120 };

function history(...texts: string[]): ExtractedHistory {
  return {
    messages: texts.map((text) => ({ role: "user", text })),
    blobOrdinals: texts.map((_, index) => index + 1),
  };
}

describe("FullHistoryCache", () => {
  it("serves an entry only while the fingerprint matches", () => {
    const cache = new FullHistoryCache();
    cache.put("a", ROLES, FP, history("one"));
    expect(cache.get("a", ROLES, FP)?.messages).toEqual([{ role: "user", text: "one" }]);
    expect(cache.get("a", ROLES, { maxSequence: 4, totalByteLength: 120 })).toBeNull();
    expect(cache.get("a", ROLES, { maxSequence: 3, totalByteLength: 121 })).toBeNull();
  });

  it("keys entries by store and normalized role set", () => {
    const cache = new FullHistoryCache();
    cache.put("a", ["assistant", " user", "user"], FP, history("one"));
    expect(cache.get("a", ["user", "assistant"], FP)).not.toBeNull();
    expect(cache.get("a", ["user"], FP)).toBeNull();
    expect(cache.get("b", ROLES, FP)).toBeNull();
    expect(FullHistoryCache.keyFor("a", ["user", "assistant"])).toBe("a\u0000assistant,user");
  });

  it("evicts the least recently used entry past maxEntries", () => {
    const cache = new FullHistoryCache({ maxEntries: 2 });
    cache.put("a", ROLES, FP, history("a"));
    cache.put("b", ROLES, FP, history("b"));
    cache.get("a", ROLES, FP);
    cache.put("c", ROLES, FP, history("c"));

    expect(cache.size).toBe(2);
    expect(cache.get("b", ROLES, FP)).toBeNull();
    expect(cache.get("a", ROLES, FP)).not.toBeNull();
    expect(cache.get("c", ROLES, FP)).not.toBeNull();
  });

  it("does not refresh recency on peek", () => {
    const cache = new FullHistoryCache({ maxEntries: 2 });
    cache.put("a", ROLES, FP, history("a"));
    cache.put("b", ROLES, FP, history("b"));
    expect(cache.peek("a", ROLES, FP)?.messages).toEqual([{ role: "user", text: "a" }]);
    cache.put("c", ROLES, FP, history("c"));

    expect(cache.peek("a", ROLES, FP)).toBeNull();
    expect(cache.peek("b", ROLES, FP)).not.toBeNull();
  });

  it("evicts by approximate byte size", () => {
    const text = "x".repeat(100);
    expect(estimateHistoryBytes(history(text).messages)).toBe(392);

    const cache = new FullHistoryCache({ maxBytes: 1000 });
    cache.put("a", ROLES, FP, history(text));
    cache.put("b", ROLES, FP, history(text));
    expect(cache.totalBytes).toBe(784);
    cache.put("c", ROLES, FP, history(text));

    expect(cache.size).toBe(2);
    expect(cache.totalBytes).toBe(784);
    expect(cache.get("a", ROLES, FP)).toBeNull();
  });

  it("never stores an entry larger than the whole budget", () => {
    const cache = new FullHistoryCache({ maxBytes: 300 });
    cache.put("a", ROLES, FP, history("x".repeat(100)));
    expect(cache.size).toBe(0);
    expect(cache.totalBytes).toBe(0);
  });

  it("replaces the entry for a key on put", () => {
    const cache = new FullHistoryCache();
    cache.put("a", ROLES, FP, history("old"));
    const next = { maxSequence: 4, totalByteLength: 150 };
    cache.put("a", ROLES, next, history("old", "new"));

    expect(cache.size).toBe(1);
    expect(cache.totalBytes).toBe(estimateHistoryBytes(history("old", "new").messages));
    expect(cache.get("a", ROLES, FP)).toBeNull();
    expect(cache.get("a", ROLES, next)?.messages.map((message) => message.text)).toEqual(["old", "new"]);
  });

  it("hands out copies", () => {
    const cache = new FullHistoryCache();
    const source = history("one");
    cache.put("a", ROLES, FP, source);
    source.messages.push({ role: "user", text: "mutated" });
    const first = cache.get("a", ROLES, FP);
    first?.messages.push({ role: "user", text: "mutated" });

    expect(cache.get("a", ROLES, FP)?.messages).toEqual([{ role: "user", text: "one" }]);
  });

  it("keeps cached messages intact when a caller edits a returned message", () => {
    const cache = new FullHistoryCache();
    const source = history("one");
    cache.put("a", ROLES, FP, source);
    const firstSource = source.messages[0];
    if (firstSource) firstSource.text = "edited";

    const served = cache.get("a", ROLES, FP);
    const first = served?.messages[0];
    if (first) first.text = "edited";
    const peeked = cache.peek("a", ROLES, FP)?.messages[0];
    if (peeked) peeked.role = "assistant";

    expect(cache.get("a", ROLES, FP)?.messages).toEqual([{ role: "user", text: "one" }]);
  });

  it("clears entries and byte total", () => {
    const cache = new FullHistoryCache();
    cache.put("a", ROLES, FP, history("one"));
    cache.clear();
    expect(cache.size).toBe(0);
    expect(cache.totalBytes).toBe(0);
  });
});
