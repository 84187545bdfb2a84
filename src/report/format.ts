import { DEFAULT_STALE_MS } from "../config/intervals.js";
import type { MetricSample, StatusLabel } from "../monitor/types.js";

export const NOTHING_ACTIVE = "nothing active";

const pad2 = (value: number): string => String(value).padStart(2, "0");

/** Local time as YYYY-MM-DD HH:MM:SS */
export function formatLocalTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
  const time = `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
  return `${day} ${time}`;
}

export function formatReportLine(date: Date, message: string): string {
  return `[${formatLocalTimestamp(date)}] ${message}`;
}

export function isMetricFresh(
  sample: MetricSample | undefined,
  now: number,
  staleMs: number = DEFAULT_STALE_MS
): sample is MetricSample {
  return sample !== undefined && now - sample.receivedAt <= staleMs;
}

export function describeSubject(
  name: string,
  status: StatusLabel | "unknown",
  sample: MetricSample | undefined,
  now: number,
  staleMs: number = DEFAULT_STALE_MS
): string {
  if (status === "Paused") return `${name} | ${status}`;
  if (!isMetricFresh(sample, now, staleMs)) return `${name} | ${status} | speed: ?`;
  return `${name} | ${status} | speed: ${sample.value.toFixed(3)} Mbps`;
}
