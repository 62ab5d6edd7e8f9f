export function wait(ms: number): Promise<void> {
  return ms > 0
    ? new Promise((resolve) => setTimeout(resolve, ms))
    : Promise.resolve();
}

// Keeps the first occurrence of every value.
export function dedupe<T>(values: Iterable<T>): T[] {
  return Array.from(new Set(values));
}

export function formatElapsed(ms: number): string {
  if (!Number.isFinite(ms) || ms < 0) return "-";
  if (ms < 1000) return `${Math.round(ms)} ms`;
  const s = ms / 1000;
  if (s < 60) return `${s.toFixed(2)} s`;
  const totalSeconds = Math.floor(s);
  const h = Math.floor(totalSeconds / 3600);
  const m = Math.floor((totalSeconds % 3600) / 60);
  const rs = totalSeconds % 60;
  return h > 0 ? `${h}h ${m}m ${rs}s` : `${m}m ${rs}s`;
}
