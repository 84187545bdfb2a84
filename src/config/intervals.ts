export const DEFAULT_REPORT_INTERVAL_MS = 60_000;
const MIN_REPORT_INTERVAL_MS = 100;
export const DEFAULT_POLL_MS = 50;
const MIN_POLL_MS = 10;
export const DEFAULT_RETRY_MS = 200;
/** Age after which a throughput sample no longer counts as current */
export const DEFAULT_STALE_MS = 300_000;
export const DEFAULT_TIMEOUT_MS = 300_000;

function parseFinite(raw: string | undefined): number {
  return raw === undefined || raw.trim() === "" ? Number.NaN : Number(raw);
}

/** STEAMWATCH_INTERVAL_SEC is fractional seconds; bad or non-positive values fall back */
export function resolveReportIntervalMs(env: NodeJS.ProcessEnv = process.env): number {
  const seconds = parseFinite(env.STEAMWATCH_INTERVAL_SEC);
  if (!Number.isFinite(seconds) || seconds <= 0) return DEFAULT_REPORT_INTERVAL_MS;
  return Math.max(MIN_REPORT_INTERVAL_MS, Math.round(seconds * 1000));
}

export function resolvePollMs(env: NodeJS.ProcessEnv = process.env): number {
  const parsed = parseFinite(env.STEAMWATCH_POLL_MS);
  const value = Number.isFinite(parsed) ? parsed : DEFAULT_POLL_MS;
  // Keep tailing responsive but avoid a busy loop.
  return Math.max(MIN_POLL_MS, value);
}

export function resolveStaleMs(env: NodeJS.ProcessEnv = process.env): number {
  const seconds = parseFinite(env.STEAMWATCH_STALE_SEC);
  if (!Number.isFinite(seconds) || seconds <= 0) return DEFAULT_STALE_MS;
  return Math.round(seconds * 1000);
}

/** 0 disables the timeout */
export function resolveTimeoutMs(env: NodeJS.ProcessEnv = process.env): number {
  const seconds = parseFinite(env.STEAMWATCH_TIMEOUT_SEC);
  if (!Number.isFinite(seconds) || seconds < 0) return DEFAULT_TIMEOUT_MS;
  return Math.round(seconds * 1000);
}
