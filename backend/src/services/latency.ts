// Simulated cost of the uncached path
import { sleep } from "../utils/sleep";
import { simulatedDelayHistogram } from "../config/metrics";

function assertNonNegativeInt(name: string, value: number) {
  if (!Number.isInteger(value) || value < 0) {
    throw new RangeError(`${name} must be a non-negative integer, got: ${value}`);
  }
}

/**
 * Delay = base + uniform integer in [0, jitter]. Waiting suspends only the
 * calling request.
 */
export class LatencySimulator {
  constructor(
    readonly baseMs: number,
    readonly jitterMs: number,
    private random: () => number = Math.random,
    private wait: (ms: number) => Promise<void> = sleep
  ) {
    assertNonNegativeInt("SIM_LATENCY_MS", baseMs);
    assertNonNegativeInt("SIM_JITTER_MS", jitterMs);
  }

  nextDelayMs(): number {
    return this.baseMs + Math.floor(this.random() * (this.jitterMs + 1));
  }

  async delay(): Promise<number> {
    const ms = this.nextDelayMs();
    simulatedDelayHistogram.observe(ms / 1000);
    await this.wait(ms);
    return ms;
  }
}
