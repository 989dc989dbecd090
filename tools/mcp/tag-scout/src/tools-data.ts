import { isAbsolute, join } from "node:path";
import { z } from "zod";
import { getDataHome } from "./config.js";
import { getOperationMetrics } from "./logger.js";
import { buildAll, getDataStatus } from "./pipeline.js";
import { jsonFileSource } from "./sources.js";
import { McpServer, toolResponse, wrapTool } from "./tool-helpers.js";

export function register(server: McpServer) {
  server.registerTool(
    "rebuild_data",
    {
      title: "Rebuild Tag Data",
      description:
        "Re-run the whole build from a JSON or JSON Lines export of game records: normalize games, aggregate monthly tag stats, " +
        "summarize rolling windows, and swap in the new snapshot. Queries already running finish on the previous snapshot.",
      inputSchema: {
        path: z
          .string()
          .min(1)
          .describe("Path to the games export (relative paths resolve against TAG_SCOUT_HOME)"),
      },
    },
    wrapTool("rebuild_data", async ({ path }) => {
      const resolved = isAbsolute(path) ? path : join(getDataHome(), path);
      const { stages, snapshot } = await buildAll(jsonFileSource(resolved));
      return toolResponse({
        stages,
        snapshot: {
          builtAt: snapshot.builtAt,
          maxMonth: snapshot.maxMonth,
          tags: snapshot.summaries.length,
        },
      });
    })
  );

  server.registerTool(
    "get_data_status",
    {
      title: "Data Status",
      description:
        "Which build stages have run, when, and on what source; the snapshot being served; and per-tool call metrics.",
      inputSchema: {},
    },
    wrapTool("get_data_status", async () => {
      return toolResponse({
        ...getDataStatus(),
        metrics: getOperationMetrics(),
      });
    })
  );
}
