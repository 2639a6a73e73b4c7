import { stat } from "node:fs/promises";
import path from "node:path";
import fg from "fast-glob";
import type { DiscoveredChatStore } from "@chatsift/contracts";

const CHAT_STORE_GLOB = "*/*/store.db";

/**
 * Lists `<chatsRoot>/<workspace hash>/<chat id>/store.db`, newest first.
 */
export async function discoverChatStores(chatsRoot: string): Promise<DiscoveredChatStore[]> {
  const matches = await fg([CHAT_STORE_GLOB], {
    cwd: chatsRoot,
    absolute: true,
    onlyFiles: true,
    dot: true,
    suppressErrors: true,
    unique: true,
    followSymbolicLinks: false,
  });

  const stores: DiscoveredChatStore[] = [];
  for (const filePath of matches) {
    const chatDir = path.dirname(filePath);
    try {
      const fileStat = await stat(filePath);
      stores.push({
        workspaceHash: path.basename(path.dirname(chatDir)),
        chatId: path.basename(chatDir),
        path: path.resolve(filePath),
        sizeBytes: fileStat.size,
        mtimeMs: fileStat.mtimeMs,
      });
    } catch {
      // removed between glob and stat
    }
  }

  stores.sort((a, b) => b.mtimeMs - a.mtimeMs || a.path.localeCompare(b.path));
  return stores;
}
