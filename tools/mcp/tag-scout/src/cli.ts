#!/usr/bin/env node

/**
 * tag-scout CLI — build tag stats and query recommendations from the terminal.
 *
 * Commands:
 *   tag-scout ingest <file>        Normalize a games export into the local store
 *   tag-scout build-months         Aggregate stored games into monthly tag buckets
 *   tag-scout build-summary        Summarize buckets into rolling tag stats
 *   tag-scout build <file>         All three stages in order
 *   tag-scout recommend ...        Ranked tags for a team
 *   tag-scout tags                 List known tags
 *   tag-scout timeseries <tag>     Monthly releases and success rate for a tag
 *   tag-scout status               Build stages and store location
 */

import { isAbsolute, resolve } from "node:path";
import { getSettings, REQUEST_LIMITS } from "./config.js";
import { closeDb, getStateDir, type StageState } from "./db.js";
import { InvalidRequestError } from "./errors.js";
import {
  buildAll,
  buildMonthStats,
  buildSummary,
  getDataStatus,
  getSnapshot,
  ingest,
} from "./pipeline.js";
import { recommendTags } from "./recommend.js";
import { scoringOptionsFrom } from "./score.js";
import { jsonFileSource } from "./sources.js";
import { getTagTimeseries, listTags } from "./tags.js";

// ─── ANSI Colors ─────────────────────────────────────────

const c = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
};

// ─── Argument Helpers ────────────────────────────────────

/** Value after --name, or undefined */
function readFlag(args: string[], name: string): string | undefined {
  const index = args.indexOf(`--${name}`);
  if (index === -1) return undefined;
  const value = args[index + 1];
  if (value === undefined || value.startsWith("--")) {
    throw new InvalidRequestError([`--${name} needs a value`]);
  }
  return value;
}

function readList(args: string[], name: string): string[] | undefined {
  const value = readFlag(args, name);
  if (value === undefined) return undefined;
  return value.split(",").map((t) => t.trim()).filter(Boolean);
}

/** Numbers are passed through as parsed; validation happens in recommendTags */
function readNumber(args: string[], name: string): number | undefined {
  const value = readFlag(args, name);
  return value === undefined ? undefined : Number(value);
}

function sourceFrom(args: string[], command: string) {
  const file = args[0];
  if (!file) {
    throw new Error(`Usage: tag-scout ${command} <games.json|games.jsonl>`);
  }
  return jsonFileSource(isAbsolute(file) ? file : resolve(file));
}

function formatPercent(value: number | null): string {
  return value === null ? "—" : `${(value * 100).toFixed(1)}%`;
}

function formatSigned(value: number): string {
  return `${value >= 0 ? "+" : ""}${value.toFixed(4)}`;
}

function printStage(state: StageState): void {
  console.log(
    `  ${c.green}${state.stage.padEnd(8)}${c.reset} ${String(state.rowCount).padStart(7)} rows` +
      `  ${c.dim}max month ${state.maxMonth ?? "—"} | ${state.builtAt}${c.reset}`
  );
}

// ─── Commands ────────────────────────────────────────────

async function cmdIngest(args: string[]): Promise<void> {
  printStage(await ingest(sourceFrom(args, "ingest")));
}

async function cmdBuildMonths(): Promise<void> {
  printStage(await buildMonthStats());
}

async function cmdBuildSummary(): Promise<void> {
  printStage(await buildSummary());
}

async function cmdBuild(args: string[]): Promise<void> {
  const { stages, snapshot } = await buildAll(sourceFrom(args, "build"));
  console.log(`${c.bold}Build complete${c.reset}`);
  for (const stage of stages) printStage(stage);
  console.log(
    `\n  ${snapshot.summaries.length} tags, data through ${snapshot.maxMonth ?? "—"}`
  );
}

async function cmdRecommend(args: string[]): Promise<void> {
  const teamSize = readNumber(args, "team-size");
  if (teamSize === undefined) {
    throw new InvalidRequestError(["--team-size is required"]);
  }

  const snapshot = await getSnapshot();
  const options = scoringOptionsFrom(await getSettings());
  const { recommendations, meta } = recommendTags(
    snapshot,
    {
      teamSize,
      topN: readNumber(args, "top"),
      preferTags: readList(args, "prefer"),
      avoidTags: readList(args, "avoid"),
      allowTags: readList(args, "allow"),
    },
    options
  );

  console.log(
    `\n${c.bold}Top tags for a team of ${teamSize}${c.reset}  ` +
      `${c.dim}(${meta.uniqueTags} candidates, data through ${meta.dataLastMonth ?? "—"})${c.reset}\n`
  );

  if (recommendations.length === 0) {
    console.log(`  ${c.yellow}No tags match these filters.${c.reset}`);
    return;
  }

  recommendations.forEach((rec, i) => {
    const rank = String(i + 1).padStart(2);
    console.log(
      `${rank}. ${c.bold}${rec.tag.padEnd(28)}${c.reset} ${c.cyan}${formatSigned(rec.score)}${c.reset}` +
        `  ${c.dim}success ${formatPercent(rec.recentSuccessRate24m)} | trend ${formatSigned(rec.trendScore)}` +
        ` | 6m releases ${rec.releasedLast6m} | complexity ${rec.complexity}${c.reset}`
    );
    console.log(`    ${c.dim}${rec.reasons.join("; ")}${c.reset}`);
  });
}

async function cmdTags(): Promise<void> {
  const tags = listTags(await getSnapshot());
  for (const tag of tags) console.log(tag);
  console.error(`${c.dim}${tags.length} tags${c.reset}`);
}

async function cmdTimeseries(args: string[]): Promise<void> {
  const tag = args.join(" ").trim();
  if (!tag) throw new Error("Usage: tag-scout timeseries <tag>");

  const points = getTagTimeseries(tag, (await getSnapshot()).buckets);
  if (points.length === 0) {
    console.log(`${c.yellow}No data for tag "${tag}".${c.reset}`);
    return;
  }

  console.log(`\n${c.bold}${tag}${c.reset}\n`);
  console.log(`  ${c.dim}month     released  success${c.reset}`);
  for (const p of points) {
    console.log(
      `  ${p.yearMonth}  ${String(p.releasedCount).padStart(8)}  ${formatPercent(p.successRate).padStart(7)}`
    );
  }
}

async function cmdStatus(): Promise<void> {
  const status = getDataStatus();
  console.log(`\n${c.bold}tag-scout status${c.reset}  ${c.dim}${getStateDir()}${c.reset}\n`);
  if (status.stages.length === 0) {
    console.log(`  ${c.yellow}Nothing built yet.${c.reset} Run 'tag-scout build <file>'.`);
    return;
  }
  for (const stage of status.stages) printStage(stage);
  const source = status.stages[0]?.source;
  if (source) console.log(`\n  ${c.dim}source: ${source}${c.reset}`);
}

// ─── Main ────────────────────────────────────────────────

async function main(): Promise<void> {
  const [command, ...args] = process.argv.slice(2);

  try {
    switch (command) {
      case "ingest":
        await cmdIngest(args);
        break;
      case "build-months":
        await cmdBuildMonths();
        break;
      case "build-summary":
        await cmdBuildSummary();
        break;
      case "build":
        await cmdBuild(args);
        break;
      case "recommend":
        await cmdRecommend(args);
        break;
      case "tags":
        await cmdTags();
        break;
      case "timeseries":
        await cmdTimeseries(args);
        break;
      case "status":
        await cmdStatus();
        break;
      default:
        printUsage();
    }
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`${c.red}Error:${c.reset} ${message}`);
    process.exitCode = 1;
  } finally {
    closeDb();
  }
}

function printUsage(): void {
  console.log(`
${c.bold}tag-scout${c.reset} — tag success analytics and recommendations

${c.bold}Build:${c.reset}
  ${c.cyan}tag-scout build${c.reset} <file>            ingest + build-months + build-summary
  ${c.cyan}tag-scout ingest${c.reset} <file>           Normalize a JSON / JSON Lines games export
  ${c.cyan}tag-scout build-months${c.reset}            Monthly tag buckets from stored games
  ${c.cyan}tag-scout build-summary${c.reset}           Rolling 24m / 6m tag summary

${c.bold}Query:${c.reset}
  ${c.cyan}tag-scout recommend${c.reset} --team-size N [--top N] [--prefer a,b] [--avoid a,b] [--allow a,b]
  ${c.cyan}tag-scout tags${c.reset}                    List known tags
  ${c.cyan}tag-scout timeseries${c.reset} <tag>        Monthly releases and success rate
  ${c.cyan}tag-scout status${c.reset}                  Build stages

${c.dim}Team size 1-${REQUEST_LIMITS.maxTeamSize}, top 1-${REQUEST_LIMITS.maxTopN}.
Data stored in .tag-scout/state.db under TAG_SCOUT_HOME (default: current directory).${c.reset}
`);
}

void main();
