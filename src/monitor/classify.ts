import type { ContentEvent, ContentEventKind } from "./types.js";

const LOG_TS = String.raw`^\[(\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2})\]`;
const LOG_TS_RE = new RegExp(LOG_TS);

interface ClassifyRule {
  readonly kind: ContentEventKind;
  readonly pattern: RegExp;
  readonly build: (match: RegExpExecArray, logTs: string | undefined) => ContentEvent | undefined;
}

function parseRate(raw: string): number | undefined {
  const value = Number(raw);
  return Number.isFinite(value) ? value : undefined;
}

function metric(
  kind: "metric.rate" | "metric.delta" | "metric.stats",
  raw: string,
  logTs: string
): ContentEvent | undefined {
  const value = parseRate(raw);
  return value === undefined ? undefined : { kind, value, logTs };
}

/**
 * Ordered rule list. The first rule whose pattern matches wins, so the
 * order matters where patterns overlap (an "update changed" line may also
 * carry "state changed" text).
 */
export const CLASSIFY_RULES: ReadonlyArray<ClassifyRule> = [
  {
    kind: "update.changed",
    pattern: /AppID\s+(\d+)\s+.*update changed\s*:\s*(.*)/,
    build: (m, logTs) => ({ kind: "update.changed", subject: m[1], rawStatus: m[2], logTs }),
  },
  {
    kind: "update.started",
    pattern: /AppID\s+(\d+)\s+update started\s*:/,
    build: (m, logTs) => ({ kind: "update.started", subject: m[1], logTs }),
  },
  {
    kind: "update.canceled",
    pattern: /AppID\s+(\d+)\s+update canceled\s*:/,
    build: (m, logTs) => ({ kind: "update.canceled", subject: m[1], logTs }),
  },
  {
    kind: "update.finished",
    pattern: /AppID\s+(\d+)\s+finished update/,
    build: (m, logTs) => ({ kind: "update.finished", subject: m[1], logTs }),
  },
  {
    kind: "state.changed",
    pattern: /AppID\s+(\d+)\s+state changed\s*:\s*(.*)/,
    build: (m, logTs) => ({ kind: "state.changed", subject: m[1], rawStatus: m[2], logTs }),
  },
  {
    kind: "metric.rate",
    pattern: new RegExp(`${LOG_TS}.*Current download rate:\\s*([0-9.]+)\\s*Mbps`),
    build: (m) => metric("metric.rate", m[2], m[1]),
  },
  {
    kind: "metric.delta",
    pattern: new RegExp(`${LOG_TS}.*\\(rate was\\s*[0-9.]+,\\s*now\\s*([0-9.]+)\\)`),
    build: (m) => metric("metric.delta", m[2], m[1]),
  },
  {
    kind: "metric.stats",
    pattern: new RegExp(
      `${LOG_TS}.*stats:\\s*\\(Invalid,\\s*0\\)\\s*:\\s*([0-9]+)\\s*Bytes,\\s*([0-9]+)\\s*sec\\s*\\(([0-9.]+)\\s*Mbps\\)\\.`
    ),
    build: (m) => metric("metric.stats", m[4], m[1]),
  },
];

export function extractLogTimestamp(line: string): string | undefined {
  const match = LOG_TS_RE.exec(line);
  return match ? match[1] : undefined;
}

/** Map one trimmed content-log line to at most one event */
export function classifyLine(line: string): ContentEvent | undefined {
  if (!line) return undefined;
  for (const rule of CLASSIFY_RULES) {
    const match = rule.pattern.exec(line);
    if (!match) continue;
    const event = rule.build(match, extractLogTimestamp(line));
    if (event) return event;
  }
  return undefined;
}
