import { RateLimitedError } from "../errors.js";
import type { DialogueOracle, OracleRequest } from "../orchestrator/ports.js";

const HOUR_MS = 3_600_000;

export type OracleRateLimitOptions = {
  minIntervalMs: number;
  maxCallsPerHour: number;
  nowMs?: () => number;
};

/** Rejects calls that come too soon after the previous one or exceed the rolling hourly cap. */
export class RateLimitedOracle implements DialogueOracle {
  private readonly calls: number[] = [];
  private readonly nowMs: () => number;

  constructor(
    private readonly inner: DialogueOracle,
    private readonly options: OracleRateLimitOptions,
  ) {
    this.nowMs = options.nowMs ?? Date.now;
  }

  async send(request: OracleRequest): Promise<string> {
    this.reserve(this.nowMs());
    return this.inner.send(request);
  }

  private reserve(now: number): void {
    while (this.calls.length > 0 && (this.calls[0] ?? now) <= now - HOUR_MS) {
      this.calls.shift();
    }
    const last = this.calls.at(-1);
    if (last !== undefined && now - last < this.options.minIntervalMs) {
      throw new RateLimitedError("Dialogue requests are too frequent", this.options.minIntervalMs - (now - last));
    }
    const oldest = this.calls[0];
    if (oldest !== undefined && this.calls.length >= this.options.maxCallsPerHour) {
      throw new RateLimitedError("Hourly dialogue limit reached", oldest + HOUR_MS - now);
    }
    this.calls.push(now);
  }
}
