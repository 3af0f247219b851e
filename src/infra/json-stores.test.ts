import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { Agreement } from "../contracts.js";
import { JsonFileAgreementStore, normalizeAgreement, normalizeCategoryMapping } from "./json-stores.js";

const START = Date.UTC(2026, 1, 5, 9, 0, 0);

function agreement(id: string, overrides: Partial<Agreement> = {}): Agreement {
  return {
    id,
    appIdentifier: "com.instagram.android",
    appName: "Instagram",
    appCategory: "SOCIAL_MEDIA",
    agreedDurationMs: 600_000,
    createdAt: START,
    expiresAt: START + 600_000,
    status: "ACTIVE",
    violatedAt: null,
    completedAt: null,
    originatingConversationId: "neg-1",
    extensions: [],
    ...overrides,
  };
}

describe("json file agreement store", () => {
  let stateDir: string;

  beforeEach(async () => {
    stateDir = await fs.mkdtemp(path.join(os.tmpdir(), "screenpact-agreements-"));
  });

  afterEach(async () => {
    await fs.rm(stateDir, { recursive: true, force: true });
  });

  it("persists agreements across instances", async () => {
    const extended = agreement("agr-1", {
      expiresAt: START + 900_000,
      agreedDurationMs: 900_000,
      extensions: [
        { at: START + 500_000, previousExpiresAt: START + 600_000, newExpiresAt: START + 900_000, addedMs: 300_000, conversationId: "neg-2" },
      ],
    });
    await JsonFileAgreementStore.inStateDir(stateDir).upsert(extended);

    const reloaded = JsonFileAgreementStore.inStateDir(stateDir);

    await expect(reloaded.get("agr-1")).resolves.toEqual(extended);
    await expect(reloaded.listByStatus("ACTIVE")).resolves.toHaveLength(1);
  });

  it("deletes only finished agreements older than the cutoff", async () => {
    const store = JsonFileAgreementStore.inStateDir(stateDir);
    await store.upsert(agreement("agr-old", { status: "COMPLETED", completedAt: START + 600_000 }));
    await store.upsert(agreement("agr-new", { status: "VIOLATED", violatedAt: START + 2_000_000 }));
    await store.upsert(agreement("agr-active"));

    const removed = await store.deleteOlderThan(START + 1_000_000);
    const reloaded = JsonFileAgreementStore.inStateDir(stateDir);

    expect(removed).toBe(1);
    expect((await reloaded.list()).map((entry) => entry.id).sort()).toEqual(["agr-active", "agr-new"]);
  });

  it("keeps the last written state in memory when a write fails", async () => {
    const store = JsonFileAgreementStore.inStateDir(stateDir);
    await store.upsert(agreement("agr-1"));
    await fs.rm(stateDir, { recursive: true, force: true });
    await fs.writeFile(stateDir, "not a directory\n", "utf-8");

    await expect(
      store.upsert(agreement("agr-1", { status: "COMPLETED", completedAt: START + 600_000 })),
    ).rejects.toThrow();
    await expect(store.upsert(agreement("agr-2"))).rejects.toThrow();

    await expect(store.get("agr-1")).resolves.toMatchObject({ status: "ACTIVE", completedAt: null });
    await expect(store.get("agr-2")).resolves.toBeUndefined();
    await expect(store.listByStatus("ACTIVE")).resolves.toHaveLength(1);
  });

  it("writes a versioned document", async () => {
    await JsonFileAgreementStore.inStateDir(stateDir).upsert(agreement("agr-1"));

    const stored: unknown = JSON.parse(await fs.readFile(path.join(stateDir, "agreements.json"), "utf-8"));

    expect(stored).toMatchObject({ version: 1, agreements: [{ id: "agr-1", status: "ACTIVE" }] });
  });
});

describe("record normalization", () => {
  it("drops agreements without an id, timestamps or a known status", () => {
    expect(normalizeAgreement({ id: "agr-1", createdAt: START, expiresAt: START + 1, status: "PAUSED" })).toBeUndefined();
    expect(normalizeAgreement({ createdAt: START, expiresAt: START + 1, status: "ACTIVE" })).toBeUndefined();
    expect(normalizeAgreement({ id: "agr-1", createdAt: START, expiresAt: START + 60_000, status: "ACTIVE" })).toEqual({
      id: "agr-1",
      appIdentifier: null,
      appName: "device",
      appCategory: "UNKNOWN",
      agreedDurationMs: 60_000,
      createdAt: START,
      expiresAt: START + 60_000,
      status: "ACTIVE",
      violatedAt: null,
      completedAt: null,
      originatingConversationId: "",
      extensions: [],
    });
  });

  it("fills category mapping defaults", () => {
    expect(normalizeCategoryMapping({ appIdentifier: "com.reddit.frontpage", category: "SOCIAL", customThresholdMs: 0 })).toEqual({
      appIdentifier: "com.reddit.frontpage",
      category: "UNKNOWN",
      isBlocked: false,
      addedBy: "SYSTEM",
    });
    expect(normalizeCategoryMapping({ appIdentifier: "  " })).toBeUndefined();
  });
});
