import { performance } from "node:perf_hooks";

/** Returns the current time as an ISO 8601 string. */
export function nowIso(): string {
  return new Date().toISOString();
}

/** Milliseconds elapsed since `start` (a `Date.now()` value). */
export function durationMs(start: number): number {
  return Date.now() - start;
}

// ---------------------------------------------------------------------------
// Step timer
// ---------------------------------------------------------------------------

export interface StepTiming {
  step: string;
  durationMs: number;
}

export interface TimerResult {
  label: string;
  totalMs: number;
  steps: StepTiming[];
}

function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}

/**
 * Measures consecutive pipeline steps. Each `step()` call records the time
 * spent since the previous step (or since the timer started).
 *
 * @example
 * ```ts
 * const timer = StepTimer.start("custom-report");
 * const metrics = extractMetrics(text);
 * timer.step("metrics");
 * const result = timer.finish();
 * ```
 */
export class StepTimer {
  readonly label: string;
  private readonly origin: number;
  private last: number;
  private readonly steps: StepTiming[] = [];
  private finished = false;

  private constructor(label: string) {
    this.label = label;
    this.origin = performance.now();
    this.last = this.origin;
  }

  static start(label: string): StepTimer {
    return new StepTimer(label);
  }

  step(name: string): StepTiming {
    if (this.finished) {
      throw new Error(`Timer "${this.label}" is already finished`);
    }
    const now = performance.now();
    const timing = { step: name, durationMs: round3(now - this.last) };
    this.last = now;
    this.steps.push(timing);
    return timing;
  }

  finish(): TimerResult {
    if (this.finished) {
      throw new Error(`Timer "${this.label}" is already finished`);
    }
    this.finished = true;
    return {
      label: this.label,
      totalMs: round3(performance.now() - this.origin),
      steps: this.steps.slice()
    };
  }
}
