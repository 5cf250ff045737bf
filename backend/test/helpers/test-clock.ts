/**
 * Manually driven clock shared by every time-aware component in a test.
 * Nothing in the suite sleeps; tests move time with advance().
 */
export type TestClock = {
  now: () => number;
  advance: (seconds: number) => void;
  set: (ms: number) => void;
};

export function createTestClock(startMs = Date.UTC(2030, 0, 15, 9, 0, 0)): TestClock {
  let current = startMs;

  return {
    now: () => current,
    advance: (seconds: number) => {
      current += seconds * 1000;
    },
    set: (ms: number) => {
      current = ms;
    },
  };
}
