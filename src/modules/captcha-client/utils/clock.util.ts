/**
 * Time source used by the polling loop. Injected so that tests can drive
 * decode timing deterministically.
 */
export interface Clock {
  /** Current time in milliseconds */
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms: number) =>
    new Promise<void>((resolve) => setTimeout(resolve, Math.max(0, ms))),
};
