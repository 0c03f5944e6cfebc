import type { ClockPort, SleeperPort } from "../../core/ports/outboundPorts";

/**
 * Adapts wall-clock access so window arithmetic remains deterministic in tests.
 */
export class SystemClock implements ClockPort {
  now(): Date {
    return new Date();
  }
}

/**
 * Suspends the single control flow for a fixed duration; no jitter, no backoff.
 */
export class TimerSleeper implements SleeperPort {
  async sleep(ms: number): Promise<void> {
    if (ms <= 0) {
      return;
    }

    await new Promise((resolve) => {
      setTimeout(resolve, ms);
    });
  }
}
