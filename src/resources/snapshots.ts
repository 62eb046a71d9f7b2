import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { listSnapshots } from "../backup.js";
import type { Store } from "../store.js";
import { jsonContents } from "./json.js";

export function registerSnapshotResources(server: McpServer, store: Store): void {
  server.registerResource(
    "snapshots",
    "quests://snapshots",
    {
      title: "Snapshots",
      description: "Dates of the retained daily snapshots, newest first.",
      mimeType: "application/json",
    },
    async (uri) => jsonContents(uri, { dates: await listSnapshots(store) }),
  );
}
