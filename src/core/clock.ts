/**
 * Clock
 *
 * Time source and sleep capability, injected so polling can be driven
 * step by step in tests.
 */

/**
 * Clock interface (for dependency injection).
 */
export interface Clock {
  /**
   * Current time in milliseconds since the Unix epoch.
   */
  now(): number;

  /**
   * Wait for the given number of milliseconds.
   */
  sleep(ms: number): Promise<void>;
}

/**
 * Wall-clock implementation.
 */
export class SystemClock implements Clock {
  now(): number {
    return Date.now();
  }

  sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

/**
 * Virtual clock for testing. `sleep` advances time immediately.
 */
export class MockClock implements Clock {
  private current: number;
  private sleepHistory: number[] = [];

  constructor(startMs: number = 0) {
    this.current = startMs;
  }

  now(): number {
    return this.current;
  }

  async sleep(ms: number): Promise<void> {
    this.sleepHistory.push(ms);
    this.current += ms;
  }

  /**
   * Move time forward without recording a sleep.
   */
  advance(ms: number): this {
    this.current += ms;
    return this;
  }

  /**
   * Get every sleep duration requested so far.
   */
  getSleeps(): number[] {
    return [...this.sleepHistory];
  }
}

/**
 * Shared wall clock.
 */
export const systemClock: Clock = new SystemClock();

/**
 * Create mock clock for testing.
 */
export function createMockClock(startMs?: number): MockClock {
  return new MockClock(startMs);
}
