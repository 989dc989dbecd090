import { z } from "zod";
import { getSettings, REQUEST_LIMITS } from "./config.js";
import { getSnapshot } from "./pipeline.js";
import { recommendTags } from "./recommend.js";
import { roundScore, scoringOptionsFrom } from "./score.js";
import { getTagTimeseries, listTags } from "./tags.js";
import { McpServer, toolResponse, wrapTool } from "./tool-helpers.js";

export function register(server: McpServer) {
  server.registerTool(
    "recommend_tags",
    {
      title: "Recommend Tags",
      description:
        "Rank game tags for a team: recent success rate, trend, market saturation, and a complexity penalty scaled to team size. " +
        "Prefer tags get a small bonus, avoid tags are excluded (avoid wins over prefer), and allow tags restrict the candidates. " +
        "Returns each tag's score, its component terms, and the reasons behind it.",
      inputSchema: {
        teamSize: z
          .number()
          .int()
          .positive()
          .max(REQUEST_LIMITS.maxTeamSize)
          .describe("Number of people on the team"),
        topN: z
          .number()
          .int()
          .positive()
          .max(REQUEST_LIMITS.maxTopN)
          .optional()
          .describe(`How many tags to return (default ${REQUEST_LIMITS.defaultTopN})`),
        preferTags: z
          .array(z.string())
          .optional()
          .describe("Tags to favour (case-insensitive)"),
        avoidTags: z
          .array(z.string())
          .optional()
          .describe("Tags to exclude (case-insensitive)"),
        allowTags: z
          .array(z.string())
          .optional()
          .describe("Only consider these tags (case-insensitive)"),
      },
    },
    wrapTool("recommend_tags", async (inputs) => {
      const snapshot = await getSnapshot();
      const options = scoringOptionsFrom(await getSettings());
      const result = recommendTags(snapshot, inputs, options);
      return toolResponse({
        generatedAt: new Date().toISOString(),
        inputs,
        ...result,
      });
    })
  );

  server.registerTool(
    "get_tag_timeseries",
    {
      title: "Tag Timeseries",
      description:
        "Monthly releases and success rate for one tag, oldest month first. Unknown tags return an empty list.",
      inputSchema: {
        tag: z.string().min(1).describe("Tag name (case-insensitive)"),
      },
    },
    wrapTool("get_tag_timeseries", async ({ tag }) => {
      const snapshot = await getSnapshot();
      const points = getTagTimeseries(tag, snapshot.buckets).map((p) => ({
        ...p,
        successRate: p.successRate === null ? null : roundScore(p.successRate),
      }));
      return toolResponse({ tag, points });
    })
  );

  server.registerTool(
    "list_tags",
    {
      title: "List Tags",
      description: "All tags present in the current tag summary, sorted.",
      inputSchema: {},
    },
    wrapTool("list_tags", async () => {
      const snapshot = await getSnapshot();
      return toolResponse({ tags: listTags(snapshot) });
    })
  );
}
