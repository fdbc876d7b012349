// services/TimeAccounting/SessionPairer.ts

import {
  Anomaly,
  AnomalyKind,
  Direction,
  EmployeeDayEvents,
  PairingResult,
  WorkSession,
} from '../../types/access';

/**
 * Walks one employee-day in timestamp order. An ENTRY opens a pending
 * session and the next EXIT closes it. A second ENTRY leaves the pending
 * session open for good; an EXIT with nothing pending is discarded.
 */
export function pairSessions(day: EmployeeDayEvents): PairingResult {
  const sessions: WorkSession[] = [];
  const anomalies: Anomaly[] = [];
  let pending: Date | null = null;

  const toSession = (entry: Date, exit: Date | null): WorkSession => ({
    employeeCode: day.employeeCode,
    date: day.date,
    entry,
    exit,
  });

  for (const event of day.events) {
    if (event.direction === Direction.ENTRY) {
      if (pending) sessions.push(toSession(pending, null));
      pending = event.instant;
      continue;
    }

    if (!pending) {
      anomalies.push({
        kind: AnomalyKind.ORPHAN_EXIT,
        at: event.instant,
        direction: event.direction,
      });
      continue;
    }

    if (event.instant.getTime() <= pending.getTime()) {
      anomalies.push({
        kind: AnomalyKind.ZERO_LENGTH_SESSION,
        at: event.instant,
        direction: event.direction,
      });
      continue;
    }

    sessions.push(toSession(pending, event.instant));
    pending = null;
  }

  if (pending) sessions.push(toSession(pending, null));

  return { sessions, anomalies };
}
