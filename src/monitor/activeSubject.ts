import type { LastSeen, StatusLabel, SubjectKey, TrackerState } from "./types.js";
import { isReportableStatus } from "./status.js";

const compareSubjectKeys = (a: SubjectKey, b: SubjectKey): number =>
  a.localeCompare(b, "en", { numeric: true });

const compareLastSeen = (a: LastSeen, b: LastSeen): number => a.at - b.at || a.order - b.order;

/**
 * Pick the subject worth reporting. An explicitly assigned active subject
 * wins; otherwise the most recently seen subject that is neither idle nor
 * done. Recency compares the apply time, then the position within the
 * batch; a remaining tie goes to the lower AppID.
 */
export function resolveActiveSubject(state: TrackerState): SubjectKey | undefined {
  if (state.active) return state.active.subject;

  let best: { subject: SubjectKey; seen: LastSeen } | undefined;
  for (const [subject, status] of state.statusBySubject) {
    if (!isReportableStatus(status)) continue;
    const seen = state.lastSeenBySubject.get(subject);
    if (seen === undefined) continue;
    const recency = best ? compareLastSeen(seen, best.seen) : 1;
    if (
      !best ||
      recency > 0 ||
      (recency === 0 && compareSubjectKeys(subject, best.subject) < 0)
    ) {
      best = { subject, seen };
    }
  }
  return best?.subject;
}

export function effectiveStatus(
  state: TrackerState,
  subject: SubjectKey
): StatusLabel | "unknown" {
  if (state.active?.subject === subject) return state.active.status;
  return state.statusBySubject.get(subject) ?? "unknown";
}
