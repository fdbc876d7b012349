// types/access/events.ts

export enum Direction {
  ENTRY = 'ENTRY',
  EXIT = 'EXIT',
  UNKNOWN = 'UNKNOWN',
}

export type ResolvedDirection = Direction.ENTRY | Direction.EXIT;

export interface RawEvent {
  employeeCode: string;
  timestamp: Date | string;
  direction: Direction | string | null;
  /** Zone used for a timestamp string that carries no offset */
  sourceTimezone?: string;
  employeeId?: string;
  employeeName?: string | null;
  workplace?: string | null;
}

export interface NormalizedEvent {
  employeeCode: string;
  instant: Date;
  /** Local calendar date the event is attributed to (yyyy-MM-dd) */
  date: string;
  /** Local wall-clock time (HH:mm:ss) */
  localTime: string;
  direction: ResolvedDirection;
  inferred: boolean;
}

export enum AnomalyKind {
  DUPLICATE_DIRECTION = 'DUPLICATE_DIRECTION',
  ORPHAN_EXIT = 'ORPHAN_EXIT',
  ZERO_LENGTH_SESSION = 'ZERO_LENGTH_SESSION',
}

export interface Anomaly {
  kind: AnomalyKind;
  at: Date;
  direction: ResolvedDirection;
}

export interface InvalidEventReport {
  index: number;
  employeeCode: string | null;
  reason: string;
}

export interface EmployeeDayEvents {
  employeeCode: string;
  date: string;
  events: NormalizedEvent[];
  anomalies: Anomaly[];
}

export interface NormalizationResult {
  days: EmployeeDayEvents[];
  rejected: InvalidEventReport[];
}
