import { IClock } from "./IClock";
import { PipelineInterruptedError } from "../errors";

/**
 * Manually driven clock for tests. `sleep` advances time instead of waiting
 * and records every requested delay.
 */
export class FixedClock implements IClock {
  private date: Date;
  private readonly sleeps: number[] = [];

  constructor(date: Date = new Date("2024-01-01T00:00:00.000Z")) {
    this.date = date;
  }

  now(): Date {
    return this.date;
  }

  setNow(date: Date): void {
    this.date = date;
  }

  advance(ms: number): void {
    this.date = new Date(this.date.getTime() + ms);
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw new PipelineInterruptedError();
    }
    this.sleeps.push(ms);
    this.advance(ms);
  }

  getSleeps(): number[] {
    return [...this.sleeps];
  }
}
