import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from "vitest";
import { setLogSink } from "../infra/logger.js";
import { InMemoryAgreementStore } from "../infra/memory-stores.js";
import { ScriptedUsageSource } from "../infra/scripted-usage-source.js";
import type { AgreementNotice, PresentationSink, SubjectControl } from "../orchestrator/ports.js";
import { UsageSampler } from "../usage/usage-sampler.js";
import { AgreementEnforcer } from "./agreement-enforcer.js";
import { AgreementLifecycle, type AgreementSubject } from "./agreement-lifecycle.js";

const MINUTE = 60_000;
const GRACE = 30_000;
const START = Date.UTC(2026, 1, 5, 9, 0, 0);
const INSTAGRAM: AgreementSubject = {
  appIdentifier: "com.instagram.android",
  appName: "Instagram",
  category: "SOCIAL_MEDIA",
};

describe("agreement enforcer", () => {
  let restoreLogs: () => void;
  let now: number;
  let source: ScriptedUsageSource;
  let lifecycle: AgreementLifecycle;
  let notices: AgreementNotice[];
  let closeSubject: Mock<SubjectControl["closeSubject"]>;
  let enforcer: AgreementEnforcer;

  beforeEach(() => {
    restoreLogs = setLogSink(() => {}, "silent");
    now = START;
    let counter = 0;
    source = new ScriptedUsageSource();
    lifecycle = new AgreementLifecycle({
      store: new InMemoryAgreementStore(),
      nowMs: () => now,
      createId: () => {
        counter += 1;
        return `agr-${counter}`;
      },
    });
    notices = [];
    closeSubject = vi.fn<SubjectControl["closeSubject"]>(async () => ({ ok: true }));
    const presentation: PresentationSink = {
      presentIntervention: async () => {},
      notify: async (notice) => {
        notices.push(notice);
      },
    };
    enforcer = new AgreementEnforcer({
      lifecycle,
      sampler: new UsageSampler(source),
      control: { closeSubject },
      presentation,
      timings: () => ({ warningLeadMs: MINUTE, gracePeriodMs: GRACE, maxCloseAttempts: 3 }),
    });
  });

  afterEach(() => {
    restoreLogs();
  });

  async function tickAt(at: number) {
    now = at;
    return enforcer.tick(at);
  }

  it("warns once inside the lead time", async () => {
    const agreement = await lifecycle.create({ subject: INSTAGRAM, durationMs: 10 * MINUTE, conversationId: "neg-1" });
    source.setForeground({ appIdentifier: "com.instagram.android" }, START);

    const early = await tickAt(agreement.expiresAt - MINUTE - 1);
    const warned = await tickAt(agreement.expiresAt - MINUTE);
    const repeat = await tickAt(agreement.expiresAt - 30_000);

    expect(early.warned).toEqual([]);
    expect(warned.warned).toEqual(["agr-1"]);
    expect(repeat.warned).toEqual([]);
    expect(notices.map((notice) => [notice.kind, notice.message])).toEqual([["warning", "1m left on Instagram."]]);
  });

  it("violates and closes exactly once when the grace period runs out in front", async () => {
    const agreement = await lifecycle.create({ subject: INSTAGRAM, durationMs: 10 * MINUTE, conversationId: "neg-1" });
    source.setForeground({ appIdentifier: "com.instagram.android" }, START);

    const expired = await tickAt(agreement.expiresAt);
    const waiting = await tickAt(agreement.expiresAt + GRACE - 1);
    const violated = await tickAt(agreement.expiresAt + GRACE + 1);
    const after = await tickAt(agreement.expiresAt + GRACE + 2_000);

    expect(expired.graceStarted).toEqual(["agr-1"]);
    expect(waiting.violated).toEqual([]);
    expect(violated.violated).toEqual(["agr-1"]);
    expect(after.violated).toEqual([]);
    expect(closeSubject).toHaveBeenCalledTimes(1);
    expect(closeSubject).toHaveBeenCalledWith("com.instagram.android");
    await expect(lifecycle.get("agr-1")).resolves.toMatchObject({
      status: "VIOLATED",
      violatedAt: agreement.expiresAt + GRACE + 1,
    });
    expect(notices.map((notice) => notice.kind)).toEqual(["times-up", "violated"]);
    expect(notices[0]?.message).toBe("Time's up for Instagram. It closes in 30s.");
  });

  it("measures the grace period from the deadline when ticks fall between seconds", async () => {
    const agreement = await lifecycle.create({ subject: INSTAGRAM, durationMs: 10 * MINUTE, conversationId: "neg-1" });
    source.setForeground({ appIdentifier: "com.instagram.android" }, START);

    for (let at = agreement.expiresAt - 500; at <= agreement.expiresAt + GRACE - 500; at += 1_000) {
      await tickAt(at);
    }
    await expect(lifecycle.get("agr-1")).resolves.toMatchObject({ status: "ACTIVE" });
    expect(notices.map((notice) => notice.message)).toEqual([
      "1s left on Instagram.",
      "Time's up for Instagram. It closes in 30s.",
    ]);

    const violated = await tickAt(agreement.expiresAt + GRACE + 500);

    expect(violated.violated).toEqual(["agr-1"]);
    expect(closeSubject).toHaveBeenCalledTimes(1);
    await expect(lifecycle.get("agr-1")).resolves.toMatchObject({
      status: "VIOLATED",
      violatedAt: agreement.expiresAt + GRACE + 500,
    });
  });

  it("violates on a late tick once the grace period has already passed", async () => {
    const agreement = await lifecycle.create({ subject: INSTAGRAM, durationMs: 10 * MINUTE, conversationId: "neg-1" });
    source.setForeground({ appIdentifier: "com.instagram.android" }, START);

    await tickAt(agreement.expiresAt - 1_000);
    const late = await tickAt(agreement.expiresAt + GRACE + 1);

    expect(late.graceStarted).toEqual(["agr-1"]);
    expect(late.violated).toEqual(["agr-1"]);
    expect(notices.map((notice) => [notice.kind, notice.message])).toEqual([
      ["warning", "1s left on Instagram."],
      ["times-up", "Time's up for Instagram. It closes in 0s."],
      ["violated", "Instagram was closed: the agreed time ran out."],
    ]);
    expect(closeSubject).toHaveBeenCalledTimes(1);
  });

  it("completes the agreement when the subject is no longer in front", async () => {
    const agreement = await lifecycle.create({ subject: INSTAGRAM, durationMs: 10 * MINUTE, conversationId: "neg-1" });
    source.setForeground({ appIdentifier: "com.notion.id" }, START);

    const report = await tickAt(agreement.expiresAt + 1);

    expect(report.completed).toEqual(["agr-1"]);
    expect(closeSubject).not.toHaveBeenCalled();
    await expect(lifecycle.get("agr-1")).resolves.toMatchObject({ status: "COMPLETED", completedAt: agreement.expiresAt + 1 });
  });

  it("closes whatever app is in front for a device agreement", async () => {
    const agreement = await lifecycle.create({
      subject: { appIdentifier: null, appName: "device", category: "UNKNOWN" },
      durationMs: 5 * MINUTE,
      conversationId: "neg-1",
    });
    source.setForeground({ appIdentifier: "com.reddit.frontpage" }, START);

    await tickAt(agreement.expiresAt);
    await tickAt(agreement.expiresAt + GRACE);

    expect(closeSubject).toHaveBeenCalledWith("com.reddit.frontpage");
  });

  it("retries a failed close up to the attempt limit", async () => {
    closeSubject.mockImplementation(async () => ({ ok: false, detail: "not allowed" }));
    const agreement = await lifecycle.create({ subject: INSTAGRAM, durationMs: 10 * MINUTE, conversationId: "neg-1" });
    source.setForeground({ appIdentifier: "com.instagram.android" }, START);

    await tickAt(agreement.expiresAt);
    const first = await tickAt(agreement.expiresAt + GRACE);
    const second = await tickAt(agreement.expiresAt + GRACE + 1_000);
    const third = await tickAt(agreement.expiresAt + GRACE + 2_000);
    const fourth = await tickAt(agreement.expiresAt + GRACE + 3_000);

    expect([first, second, third, fourth].map((report) => report.closeFailures)).toEqual([
      ["agr-1"],
      ["agr-1"],
      ["agr-1"],
      [],
    ]);
    expect(closeSubject).toHaveBeenCalledTimes(3);
  });

  it("holds expired agreements while usage permission is missing", async () => {
    const agreement = await lifecycle.create({ subject: INSTAGRAM, durationMs: 10 * MINUTE, conversationId: "neg-1" });
    source.setForeground({ appIdentifier: "com.instagram.android" }, START);
    source.permission = false;

    const report = await tickAt(agreement.expiresAt + 60 * MINUTE);

    expect(report).toEqual({ warned: [], graceStarted: [], completed: [], violated: [], closeFailures: [] });
    await expect(lifecycle.get("agr-1")).resolves.toMatchObject({ status: "ACTIVE" });
  });

  it("cancels the grace period when the agreement is extended", async () => {
    const agreement = await lifecycle.create({ subject: INSTAGRAM, durationMs: 10 * MINUTE, conversationId: "neg-1" });
    source.setForeground({ appIdentifier: "com.instagram.android" }, START);

    await tickAt(agreement.expiresAt);
    now = agreement.expiresAt + 10_000;
    await lifecycle.extend("agr-1", 5 * MINUTE, "neg-2");
    const report = await tickAt(agreement.expiresAt + GRACE + 1);

    expect(report.violated).toEqual([]);
    expect(enforcer.graceStartedFor("agr-1")).toBeUndefined();
    expect(closeSubject).not.toHaveBeenCalled();
  });

  it("starts a fresh grace period after a reset", async () => {
    const agreement = await lifecycle.create({ subject: INSTAGRAM, durationMs: 10 * MINUTE, conversationId: "neg-1" });
    source.setForeground({ appIdentifier: "com.instagram.android" }, START);

    await tickAt(agreement.expiresAt);
    enforcer.reset();
    const restarted = await tickAt(agreement.expiresAt + 5 * MINUTE);
    const stillWaiting = await tickAt(agreement.expiresAt + 5 * MINUTE + GRACE - 1);
    const violated = await tickAt(agreement.expiresAt + 5 * MINUTE + GRACE);

    expect(restarted.graceStarted).toEqual(["agr-1"]);
    expect(stillWaiting.violated).toEqual([]);
    expect(violated.violated).toEqual(["agr-1"]);
  });
});
