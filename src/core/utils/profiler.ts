// src/core/utils/profiler.ts

export interface ProfileTiming {
  name: string;
  /** Total milliseconds across every run. */
  duration: number;
  count: number;
}

const timings = new Map<string, ProfileTiming>();

/**
 * Runs `fn` and adds its wall-clock time to the section `name`. The time is
 * recorded even if `fn` throws.
 */
export function timeSection<T>(name: string, fn: () => T): T {
  const start = performance.now();
  try {
    return fn();
  } finally {
    const duration = performance.now() - start;
    const timing = timings.get(name);
    if (timing) {
      timing.duration += duration;
      timing.count++;
    } else {
      timings.set(name, { name, duration, count: 1 });
    }
  }
}

export function getTiming(name: string): ProfileTiming | undefined {
  const timing = timings.get(name);
  return timing ? { ...timing } : undefined;
}

/** One line per section, slowest first. */
export function formatTimings(): string {
  const lines = [...timings.values()]
    .sort((a, b) => b.duration - a.duration)
    .map(
      ({ name, duration, count }) =>
        `${name}: ${duration.toFixed(2)}ms total, ${(duration / count).toFixed(2)}ms avg (${count} calls)`,
    );
  return ["=== Interface Draw Report ===", ...lines].join("\n");
}

export function resetTimings(): void {
  timings.clear();
}

/** Logs the report and starts over. */
export function logTimings(): void {
  console.log(formatTimings());
  resetTimings();
}
