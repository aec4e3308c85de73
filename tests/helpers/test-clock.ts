export interface TestClock {
  now: () => Date;
  advance(milliseconds: number): void;
}

export function createTestClock(start = '2026-01-01T00:00:00.000Z'): TestClock {
  let current = new Date(start).getTime();

  return {
    now: () => new Date(current),
    advance(milliseconds: number) {
      current += milliseconds;
    }
  };
}
