import crypto from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";

export type TraceEntry = Record<string, unknown> & { traceId: string };

export type TraceSink = {
  append(entry: TraceEntry): Promise<void>;
};

export function canonicalStringify(value: unknown): string {
  if (value === null || typeof value !== "object") {
    return JSON.stringify(value) ?? "null";
  }
  if (Array.isArray(value)) {
    return `[${value.map((entry) => canonicalStringify(entry)).join(",")}]`;
  }
  const entries = Object.entries(value)
    .filter(([, entry]) => entry !== undefined)
    .sort(([a], [b]) => a.localeCompare(b));
  return `{${entries.map(([key, entry]) => `${JSON.stringify(key)}:${canonicalStringify(entry)}`).join(",")}}`;
}

export function createTraceId(payload: unknown): string {
  return crypto.createHash("sha256").update(canonicalStringify(payload)).digest("hex").slice(0, 16);
}

export function createJsonlTraceSink(filePath: string): TraceSink {
  return {
    async append(entry) {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.appendFile(filePath, `${JSON.stringify(entry)}\n`, "utf-8");
    },
  };
}

export function createMemoryTraceSink(): TraceSink & { entries: TraceEntry[] } {
  const entries: TraceEntry[] = [];
  return {
    entries,
    async append(entry) {
      entries.push(entry);
    },
  };
}

export async function readTraceEntries(filePath: string): Promise<TraceEntry[]> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    if (isMissingFile(error)) {
      return [];
    }
    throw error;
  }
  const entries: TraceEntry[] = [];
  for (const line of raw.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed) {
      continue;
    }
    const parsed: unknown = JSON.parse(trimmed);
    if (parsed && typeof parsed === "object" && "traceId" in parsed && typeof parsed.traceId === "string") {
      entries.push({ ...parsed, traceId: parsed.traceId });
    }
  }
  return entries;
}

export function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
