#!/usr/bin/env node

/**
 * tag-scout MCP Server
 *
 * Serves tag recommendations built from a game catalog export. The build
 * runs on demand (rebuild_data, or the tag-scout CLI); queries read the
 * last published snapshot, loaded from .tag-scout/state.db on first use.
 *
 * Tools:
 *   - recommend_tags: Ranked tags for a team size and tag preferences
 *   - get_tag_timeseries: Monthly releases and success rate for one tag
 *   - list_tags: Every tag in the summary table
 *   - rebuild_data: Re-run the build from a JSON / JSON Lines export
 *   - get_data_status: Build stages, served snapshot, call metrics
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { closeDb } from "./db.js";
import { log } from "./logger.js";
import { register as registerRecommendTools } from "./tools-recommend.js";
import { register as registerDataTools } from "./tools-data.js";

const VERSION = "0.1.0";

const server = new McpServer({
  name: "tag-scout",
  version: VERSION,
});

registerRecommendTools(server);
registerDataTools(server);

// ─── MAIN ───────────────────────────────────────────────

const ALL_TOOLS = [
  "recommend_tags",
  "get_tag_timeseries",
  "list_tags",
  "rebuild_data",
  "get_data_status",
];

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  log("info", `tag-scout MCP server v${VERSION} running on stdio`);
  log("info", `Tools: ${ALL_TOOLS.join(", ")}`);
}

process.on("SIGINT", async () => {
  log("info", "Shutting down tag-scout MCP server...");
  await server.close();
  closeDb();
  process.exit(0);
});

main().catch((error) => {
  log("error", "Fatal error in tag-scout MCP server", {
    error: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
});
