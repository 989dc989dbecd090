import { describe, it, expect, beforeEach, afterAll } from "vitest";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { z } from "zod";
import {
  COMPLEXITY_TIERS,
  DEFAULT_COMPLEXITY,
  DEFAULT_WEIGHTS,
  PREFER_BONUS,
  REQUEST_LIMITS,
  SETTINGS_FILE,
  SUCCESS_REVIEW_THRESHOLD,
  SUMMARY_WINDOWS,
  getSettings,
  getTagComplexity,
  resetSettings,
} from "../config.js";

const homes: string[] = [];

function freshHome(settings?: unknown): string {
  const home = mkdtempSync(join(tmpdir(), "tag-scout-config-"));
  homes.push(home);
  if (settings !== undefined) {
    writeFileSync(join(home, SETTINGS_FILE), JSON.stringify(settings));
  }
  process.env.TAG_SCOUT_HOME = home;
  return home;
}

beforeEach(() => {
  resetSettings();
  delete process.env.TAG_SCOUT_W_SUCCESS;
  delete process.env.TAG_SCOUT_PREFER_BONUS;
});

afterAll(() => {
  for (const home of homes) rmSync(home, { recursive: true, force: true });
});

describe("scoring constants", () => {
  it("uses the documented default weights", () => {
    expect(DEFAULT_WEIGHTS).toEqual({ success: 1.0, trend: 0.7, saturation: 0.15 });
    expect(PREFER_BONUS).toBe(0.05);
    expect(SUCCESS_REVIEW_THRESHOLD).toBe(100);
    expect(DEFAULT_COMPLEXITY).toBe(3);
  });

  it("orders complexity tiers by team size", () => {
    expect(COMPLEXITY_TIERS.map((t) => [t.maxTeamSize, t.coefficient, t.threshold])).toEqual([
      [1, 0.35, 2],
      [3, 0.22, 3],
      [5, 0.12, 4],
      [Number.POSITIVE_INFINITY, 0, 5],
    ]);
  });

  it("has 24/6/6/12 month windows", () => {
    expect(SUMMARY_WINDOWS).toEqual({
      successMonths: 24,
      volumeMonths: 6,
      trendRecentMonths: 6,
      trendPriorMonths: 12,
    });
  });

  it("caps requests like the recommendation API", () => {
    expect(REQUEST_LIMITS).toEqual({ maxTeamSize: 100, maxTopN: 50, defaultTopN: 10 });
  });
});

describe("getSettings()", () => {
  it("falls back to defaults without a settings file", async () => {
    freshHome();
    const settings = await getSettings();
    expect(settings).toEqual({
      weights: { success: 1.0, trend: 0.7, saturation: 0.15 },
      preferBonus: 0.05,
      successThreshold: 100,
      defaultComplexity: 3,
      complexityFile: null,
    });
  });

  it("merges the settings file over defaults", async () => {
    freshHome({ weights: { trend: 0.5 }, successThreshold: 250, defaultComplexity: 2 });
    const settings = await getSettings();
    expect(settings.weights).toEqual({ success: 1.0, trend: 0.5, saturation: 0.15 });
    expect(settings.successThreshold).toBe(250);
    expect(settings.defaultComplexity).toBe(2);
  });

  it("lets environment variables win over the file", async () => {
    freshHome({ weights: { success: 2 }, preferBonus: 0.1 });
    process.env.TAG_SCOUT_W_SUCCESS = "1.5";
    process.env.TAG_SCOUT_PREFER_BONUS = "0.2";
    const settings = await getSettings();
    expect(settings.weights.success).toBe(1.5);
    expect(settings.preferBonus).toBe(0.2);
  });

  it("rejects an invalid settings file", async () => {
    freshHome({ defaultComplexity: 9 });
    await expect(getSettings()).rejects.toThrow(/Invalid \.tag-scout\.json: defaultComplexity/);
  });

  it("rejects a non-numeric environment override", async () => {
    freshHome();
    process.env.TAG_SCOUT_W_SUCCESS = "lots";
    await expect(getSettings()).rejects.toThrow(/TAG_SCOUT_W_SUCCESS/);
  });
});

describe("getTagComplexity()", () => {
  it("loads the bundled map", async () => {
    freshHome();
    const map = await getTagComplexity();
    expect(map["MMO"]).toBe(5);
    expect(map["Puzzle"]).toBe(1);
  });

  it("uses complexityFile relative to the data home", async () => {
    const home = freshHome({ complexityFile: "complexity.json" });
    writeFileSync(join(home, "complexity.json"), JSON.stringify({ Roguelike: 2 }));
    expect(await getTagComplexity()).toEqual({ Roguelike: 2 });
  });

  it("rejects values outside 1-5", async () => {
    const home = freshHome({ complexityFile: "complexity.json" });
    writeFileSync(join(home, "complexity.json"), JSON.stringify({ Roguelike: 7 }));
    await expect(getTagComplexity()).rejects.toThrow(/Invalid complexity map/);
  });
});

describe("package engines", () => {
  // the bundled map loads through a JSON import attribute, which Node 20 takes from 20.10
  it("requires a Node release that reads JSON import attributes", () => {
    const manifest = z
      .object({ engines: z.object({ node: z.string() }) })
      .parse(JSON.parse(readFileSync(new URL("../../../../../package.json", import.meta.url), "utf8")));
    expect(manifest.engines.node).toBe(">=20.10");
  });
});
