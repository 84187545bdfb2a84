import type { StatusLabel } from "./types.js";

const STATUS_RULES: ReadonlyArray<readonly [string, StatusLabel]> = [
  ["suspended", "Paused"],
  ["downloading", "Downloading"],
  ["staging", "Staging"],
  ["committing", "Committing"],
  ["verifying", "Verifying"],
  ["reconfiguring", "Preparing"],
  ["preallocating", "Allocating"],
];

// Raw "update changed" phases that make a subject the one worth reporting.
const ACTIVE_KEYWORDS = [
  "downloading",
  "staging",
  "committing",
  "verifying",
  "preallocating",
  "reconfiguring",
] as const;

export function isNoneStatus(raw: string): boolean {
  return raw.trim().toLowerCase() === "none";
}

export function normalizeStatus(raw: string): StatusLabel {
  if (isNoneStatus(raw)) return "Idle";
  const lower = raw.toLowerCase();
  for (const [needle, label] of STATUS_RULES) {
    if (lower.includes(needle)) return label;
  }
  return "Idle";
}

export function hasActiveKeyword(raw: string): boolean {
  const lower = raw.toLowerCase();
  return ACTIVE_KEYWORDS.some((keyword) => lower.includes(keyword));
}

export function isSuspendedStatus(raw: string): boolean {
  return raw.toLowerCase().includes("suspended");
}

/** Idle and Done subjects are never picked when inferring the active one */
export function isReportableStatus(status: StatusLabel): boolean {
  return status !== "Idle" && status !== "Done";
}
