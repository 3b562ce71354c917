// rubify/profiling - Performance instrumentation
// Enable with: RUBIFY_PROFILE=1 or RUBIFY_PROFILE=true

const ENABLE_PROFILING = process.env.RUBIFY_PROFILE === '1' || process.env.RUBIFY_PROFILE === 'true';

export const PERF_COUNTERS = {
  analyze: { calls: 0, time: 0 },
  tokenize: { calls: 0, time: 0 },
  annotate: { calls: 0, time: 0 },
  buildUserDictionary: { calls: 0, time: 0 },
  loadKuromoji: { calls: 0, time: 0 }
};

export type PerfCounter = keyof typeof PERF_COUNTERS;

// No-op when profiling is disabled
export function startTimer(counter: PerfCounter): () => void {
  if (!ENABLE_PROFILING) return () => {};

  const start = performance.now();
  PERF_COUNTERS[counter].calls++;

  return () => {
    PERF_COUNTERS[counter].time += performance.now() - start;
  };
}

export function resetPerfCounters(): void {
  for (const stats of Object.values(PERF_COUNTERS)) {
    stats.calls = 0;
    stats.time = 0;
  }
}

export function printPerfCountersAndReset(): void {
  if (!ENABLE_PROFILING) return;

  console.log('\n' + '='.repeat(80));
  console.log('PERFORMANCE COUNTERS');
  console.log('='.repeat(80));

  const sorted = Object.entries(PERF_COUNTERS)
    .filter(([, stats]) => stats.calls > 0)
    .sort((a, b) => b[1].time - a[1].time);

  for (const [name, stats] of sorted) {
    const avg = stats.time / stats.calls;
    console.log(`${name.padEnd(25)} ${stats.calls.toString().padEnd(8)} calls  ${stats.time.toFixed(2).padStart(10)}ms total  ${avg.toFixed(3).padStart(8)}ms avg`);
  }
  console.log('='.repeat(80) + '\n');

  resetPerfCounters();
}

export function isProfilingEnabled(): boolean {
  return ENABLE_PROFILING;
}
