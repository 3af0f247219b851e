import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from "vitest";
import { resolveMonitorConfig } from "../src/config/config.js";
import { setLogSink } from "../src/infra/logger.js";
import { InMemoryAgreementStore, InMemoryCategoryStore } from "../src/infra/memory-stores.js";
import { ScriptedUsageSource } from "../src/infra/scripted-usage-source.js";
import { createMemoryTraceSink } from "../src/infra/trace.js";
import { createTemplateOracle } from "../src/negotiation/template-oracle.js";
import { Monitor } from "../src/orchestrator/monitor.js";
import type { AgreementNotice, InterventionPresentation, SubjectControl } from "../src/orchestrator/ports.js";

const MINUTE = 60_000;
const START = new Date(2026, 1, 5, 14, 0, 0).getTime();
const INSTAGRAM = { appIdentifier: "com.instagram.android", appName: "Instagram" };

describe("control loop", () => {
  let restoreLogs: () => void;
  let source: ScriptedUsageSource;
  let agreements: InMemoryAgreementStore;
  let presented: InterventionPresentation[];
  let notices: AgreementNotice[];
  let closeSubject: Mock<SubjectControl["closeSubject"]>;
  let traceSink: ReturnType<typeof createMemoryTraceSink>;
  let monitor: Monitor;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(START);
    restoreLogs = setLogSink(() => {}, "silent");
    source = new ScriptedUsageSource();
    agreements = new InMemoryAgreementStore();
    presented = [];
    notices = [];
    closeSubject = vi.fn<SubjectControl["closeSubject"]>(async () => ({ ok: true }));
    traceSink = createMemoryTraceSink();
    monitor = new Monitor({
      usageSource: source,
      oracle: createTemplateOracle(),
      presentation: {
        presentIntervention: async (presentation) => {
          presented.push(presentation);
        },
        notify: async (notice) => {
          notices.push(notice);
        },
      },
      control: { closeSubject },
      categoryStore: new InMemoryCategoryStore(),
      agreementStore: agreements,
      traceSink,
      config: resolveMonitorConfig(),
      catalog: [{ appIdentifier: "com.instagram.android", category: "SOCIAL_MEDIA" }],
    });
  });

  afterEach(() => {
    monitor.stop();
    restoreLogs();
    vi.useRealTimers();
  });

  async function reply(sessionId: string, text: string) {
    await vi.advanceTimersByTimeAsync(1_000);
    return monitor.submitUserReply(sessionId, text);
  }

  it("detects, negotiates, warns and enforces through the running loops", async () => {
    source.setForeground(INSTAGRAM, START);
    monitor.start();

    await vi.advanceTimersByTimeAsync(30 * MINUTE + 2_000);
    expect(presented.map((presentation) => presentation.action)).toEqual(["NEGOTIATE"]);
    const sessionId = presented[0]?.sessionId ?? "";

    await reply(sessionId, "15 minutes");
    const agreed = await reply(sessionId, "deal");
    const agreement = agreed.ok ? agreed.value.agreement : undefined;
    expect(agreement?.agreedDurationMs).toBe(15 * MINUTE);

    await vi.advanceTimersByTimeAsync(15 * MINUTE + 31_000);

    await expect(agreements.get(agreement?.id ?? "")).resolves.toMatchObject({ status: "VIOLATED" });
    expect(closeSubject).toHaveBeenCalledTimes(1);
    expect(closeSubject).toHaveBeenCalledWith("com.instagram.android");
    expect(notices.map((notice) => notice.kind)).toEqual(["created", "warning", "times-up", "violated"]);
    expect(monitor.getInterventionHistory().map((record) => [record.action, record.outcome])).toEqual([
      ["NEGOTIATE", "agreed"],
    ]);
    expect(traceSink.entries).toHaveLength(1);
  });

  it("gives an agreement that expired while stopped a fresh grace period", async () => {
    source.setForeground(INSTAGRAM, START);
    monitor.start();
    const started = await monitor.startNegotiation({ ...INSTAGRAM, reason: "Quick check." });
    const sessionId = started.ok ? started.value.id : "";
    await reply(sessionId, "10 minutes");
    const agreed = await reply(sessionId, "ok");
    const agreementId = agreed.ok && agreed.value.agreement ? agreed.value.agreement.id : "";

    monitor.stop();
    await vi.advanceTimersByTimeAsync(20 * MINUTE);
    await expect(agreements.get(agreementId)).resolves.toMatchObject({ status: "ACTIVE" });

    monitor.start();
    await vi.advanceTimersByTimeAsync(1_000);
    expect(notices.at(-1)?.kind).toBe("times-up");

    await vi.advanceTimersByTimeAsync(29_000);
    await expect(agreements.get(agreementId)).resolves.toMatchObject({ status: "ACTIVE" });

    await vi.advanceTimersByTimeAsync(1_000);
    await expect(agreements.get(agreementId)).resolves.toMatchObject({ status: "VIOLATED" });
    expect(closeSubject).toHaveBeenCalledTimes(1);
  });

  it("stays inactive and leaves agreements alone without usage permission", async () => {
    source.permission = false;
    monitor.start();

    await vi.advanceTimersByTimeAsync(10_000);

    await expect(monitor.status()).resolves.toMatchObject({ monitoring: "inactive" });
    expect(presented).toEqual([]);
    expect(closeSubject).not.toHaveBeenCalled();
  });
});
