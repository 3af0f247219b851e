import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { CategoryClassifier, type CatalogEntry } from "../categories/category-classifier.js";
import { setLogSink } from "../infra/logger.js";
import { InMemoryCategoryStore } from "../infra/memory-stores.js";
import { ScriptedUsageSource } from "../infra/scripted-usage-source.js";
import { UsageSampler } from "../usage/usage-sampler.js";
import { Detector, type DetectorLimits } from "./detector.js";

const MINUTE = 60_000;
const NOW = new Date(2026, 1, 5, 15, 0, 0).getTime();
const CATALOG: CatalogEntry[] = [
  { appIdentifier: "com.instagram.android", category: "SOCIAL_MEDIA" },
  { appIdentifier: "com.notion.id", category: "PRODUCTIVITY" },
  { appIdentifier: "com.example.afterdark", category: "ADULT_CONTENT" },
  { appIdentifier: "com.supercell.clashofclans", category: "GAMES" },
];

function setup(overrides: Partial<DetectorLimits> = {}) {
  const source = new ScriptedUsageSource();
  const classifier = new CategoryClassifier({ store: new InMemoryCategoryStore(), catalog: CATALOG });
  const detector = new Detector(new UsageSampler(source), classifier, {
    deviceWindowMs: 60 * MINUTE,
    deviceThresholdMs: 48 * MINUTE,
    dailyGoalMs: 2 * 60 * MINUTE,
    endlessScrollMs: 5 * MINUTE,
    watchedCategories: ["SOCIAL_MEDIA", "GAMES", "ADULT_CONTENT"],
    ...overrides,
  });
  return { source, classifier, detector };
}

describe("detector", () => {
  let restoreLogs: () => void;

  beforeEach(() => {
    restoreLogs = setLogSink(() => {}, "silent");
  });

  afterEach(() => {
    restoreLogs();
  });

  it("emits nothing below the threshold and exactly one event from the threshold on", async () => {
    const { source, detector } = setup();
    source.setForeground({ appIdentifier: "com.instagram.android", appName: "Instagram" }, NOW);

    const seen = await detector.tick(NOW);
    const below = await detector.tick(NOW + 30 * MINUTE - 1);
    const at = await detector.tick(NOW + 30 * MINUTE);
    const after = await detector.tick(NOW + 45 * MINUTE);

    expect(seen.events).toEqual([]);
    expect(below.events).toEqual([]);
    expect(at.events).toEqual([
      {
        kind: "app-threshold",
        subjectAppIdentifier: "com.instagram.android",
        subjectName: "Instagram",
        category: "SOCIAL_MEDIA",
        observedDurationMs: 30 * MINUTE,
        severity: "MEDIUM",
        message: "Instagram has been open for 30m (limit 30m).",
        detectedAt: NOW + 30 * MINUTE,
      },
    ]);
    expect(after.events).toEqual([]);
  });

  it("rates a breach shorter than the endless-scroll duration as LOW", async () => {
    const { source, classifier, detector } = setup();
    await classifier.setCustomThreshold("com.supercell.clashofclans", 2 * MINUTE);
    source.setForeground({ appIdentifier: "com.supercell.clashofclans" }, NOW);

    await detector.tick(NOW);
    const result = await detector.tick(NOW + 2 * MINUTE);

    expect(result.events.map((event) => [event.kind, event.severity])).toEqual([["app-threshold", "LOW"]]);
  });

  it("flags blocked apps and adult content as HIGH on the first tick", async () => {
    const { source, classifier, detector } = setup();
    await classifier.setBlocked("com.notion.id", true);

    source.setForeground({ appIdentifier: "com.notion.id" }, NOW);
    const blocked = await detector.tick(NOW);
    source.setForeground({ appIdentifier: "com.example.afterdark" }, NOW);
    const adult = await detector.tick(NOW + 2_000);

    expect(blocked.events.map((event) => [event.kind, event.severity])).toEqual([["blocked-app", "HIGH"]]);
    expect(adult.events.map((event) => [event.kind, event.severity])).toEqual([["adult-content", "HIGH"]]);
  });

  it("ignores categories that are not watched", async () => {
    const { source, detector } = setup();
    source.setForeground({ appIdentifier: "com.notion.id" }, NOW);

    await detector.tick(NOW);
    const result = await detector.tick(NOW + 10 * 60 * MINUTE);

    expect(result.events).toEqual([]);
  });

  it("starts a new breach when the app returns to the foreground", async () => {
    const { source, detector } = setup();
    source.setForeground({ appIdentifier: "com.instagram.android" }, NOW);
    await detector.tick(NOW);
    const first = await detector.tick(NOW + 30 * MINUTE);

    source.setForeground(null);
    await detector.tick(NOW + 31 * MINUTE);
    source.setForeground({ appIdentifier: "com.instagram.android" }, NOW);
    await detector.tick(NOW + 32 * MINUTE);
    const early = await detector.tick(NOW + 61 * MINUTE);
    const second = await detector.tick(NOW + 62 * MINUTE);

    expect(first.events).toHaveLength(1);
    expect(early.events).toEqual([]);
    expect(second.events).toHaveLength(1);
  });

  it("reports device-wide continuous use once per breach and re-arms after it clears", async () => {
    const { source, detector } = setup();
    source.setForeground({ appIdentifier: "com.notion.id" }, NOW);
    source.record("com.notion.id", NOW - 50 * MINUTE, NOW);

    const breach = await detector.tick(NOW);
    const latched = await detector.tick(NOW + 2_000);
    const cleared = await detector.tick(NOW + 20 * MINUTE);
    source.record("com.notion.id", NOW + 10 * MINUTE, NOW + 60 * MINUTE);
    const again = await detector.tick(NOW + 60 * MINUTE);

    expect(breach.events).toEqual([
      {
        kind: "continuous-use",
        subjectAppIdentifier: null,
        subjectName: "device",
        category: "PRODUCTIVITY",
        observedDurationMs: 50 * MINUTE,
        severity: "MEDIUM",
        message: "50m of screen time in the last 1h.",
        detectedAt: NOW,
      },
    ]);
    expect(latched.events).toEqual([]);
    expect(cleared.events).toEqual([]);
    expect(again.events.map((event) => event.kind)).toEqual(["continuous-use"]);
  });

  it("lets a per-app event take the tick and keeps the device breach pending", async () => {
    const { source, classifier, detector } = setup();
    await classifier.setBlocked("com.supercell.clashofclans", true);
    source.setForeground({ appIdentifier: "com.supercell.clashofclans" }, NOW);
    source.record("com.supercell.clashofclans", NOW - 50 * MINUTE, NOW);

    const first = await detector.tick(NOW);
    const second = await detector.tick(NOW + 2_000);

    expect(first.events.map((event) => event.kind)).toEqual(["blocked-app"]);
    expect(first.status === "active" ? first.pending : []).toEqual(["continuous-use"]);
    expect(second.events.map((event) => [event.kind, event.subjectAppIdentifier])).toEqual([
      ["continuous-use", null],
    ]);
  });

  it("reports the daily goal when today's total reaches it", async () => {
    const { source, detector } = setup({ deviceThresholdMs: 59 * MINUTE });
    detector.setDailyGoal(45 * MINUTE);
    source.record("com.instagram.android", NOW - 50 * MINUTE, NOW);

    const result = await detector.tick(NOW);

    expect(result.events.map((event) => [event.kind, event.message])).toEqual([
      ["daily-goal", "50m of screen time today passed the 45m goal."],
    ]);
  });

  it("reports inactive without usage permission", async () => {
    const { source, detector } = setup();
    source.setForeground({ appIdentifier: "com.example.afterdark" }, NOW);
    source.permission = false;

    await expect(detector.tick(NOW)).resolves.toEqual({ status: "inactive", events: [], foreground: null });
  });
});
