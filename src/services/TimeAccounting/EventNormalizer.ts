// services/TimeAccounting/EventNormalizer.ts

import {
  AnomalyKind,
  Direction,
  EmployeeDayEvents,
  EngineConfig,
  InvalidEventReport,
  NormalizationResult,
  RawEvent,
  ResolvedDirection,
} from '../../types/access';
import {
  addDaysToKey,
  parseInstant,
  toLocalDateKey,
  toLocalTime,
} from '../../utils/dateUtils';
import { elapsedSeconds } from '../../utils/timeUtils';
import { DirectionNormalizers } from './utils/DirectionNormalizers';

interface ValidatedEvent {
  employeeCode: string;
  instant: Date;
  direction: Direction;
}

interface FoldState {
  lastDirection: ResolvedDirection | null;
  lastDate: string | null;
  lastInstant: Date | null;
}

function validateRow(
  row: RawEvent,
  index: number,
  config: EngineConfig,
): ValidatedEvent | InvalidEventReport {
  const employeeCode =
    typeof row.employeeCode === 'string' ? row.employeeCode.trim() : '';
  if (!employeeCode) {
    return { index, employeeCode: null, reason: 'Missing employee code' };
  }

  const instant = parseInstant(
    row.timestamp,
    row.sourceTimezone ?? config.timezone,
  );
  if (!instant) {
    return {
      index,
      employeeCode,
      reason: `Unparseable timestamp: ${String(row.timestamp)}`,
    };
  }

  const direction = DirectionNormalizers.normalizeDirection(row.direction);
  if (!direction) {
    return {
      index,
      employeeCode,
      reason: `Unrecognised direction: ${String(row.direction)}`,
    };
  }

  return { employeeCode, instant, direction };
}

function sortAndDeduplicate(events: ValidatedEvent[]): ValidatedEvent[] {
  const seen = new Set<string>();

  return [...events]
    .sort((a, b) => a.instant.getTime() - b.instant.getTime())
    .filter((event) => {
      const key = `${event.instant.getTime()}|${event.direction}`;
      if (seen.has(key)) return false;
      seen.add(key);
      return true;
    });
}

function groupByInstant(events: ValidatedEvent[]): ValidatedEvent[][] {
  return events.reduce<ValidatedEvent[][]>((groups, event) => {
    const current = groups[groups.length - 1];
    if (current && current[0].instant.getTime() === event.instant.getTime()) {
      current.push(event);
    } else {
      groups.push([event]);
    }
    return groups;
  }, []);
}

/** Local day the event is attributed to, carrying a late exit over midnight */
function attributeDay(
  state: FoldState,
  event: ValidatedEvent,
  config: EngineConfig,
): { date: string; carriesOver: boolean } {
  const localDate = toLocalDateKey(event.instant, config.timezone);
  const carriesOver =
    event.direction !== Direction.ENTRY &&
    state.lastDirection === Direction.ENTRY &&
    state.lastDate !== null &&
    state.lastInstant !== null &&
    localDate === addDaysToKey(state.lastDate, 1) &&
    elapsedSeconds(state.lastInstant, event.instant) <= config.maxShiftSeconds;

  return {
    date: carriesOver && state.lastDate !== null ? state.lastDate : localDate,
    carriesOver,
  };
}

// An entry is pending when an exit at this instant would close it
function hasPendingEntry(
  state: FoldState,
  at: Date,
  config: EngineConfig,
): boolean {
  if (state.lastDirection !== Direction.ENTRY) return false;
  const closingExit: ValidatedEvent = {
    employeeCode: '',
    instant: at,
    direction: Direction.EXIT,
  };
  return attributeDay(state, closingExit, config).date === state.lastDate;
}

/**
 * Resolves directions and attributes each event of one employee to a local
 * day. Runs as a fold carrying the last resolved direction; an exit that
 * closes the previous day's open entry within `maxShiftSeconds` stays on the
 * entry's day.
 */
function foldEmployeeEvents(
  employeeCode: string,
  events: ValidatedEvent[],
  config: EngineConfig,
): EmployeeDayEvents[] {
  const days = new Map<string, EmployeeDayEvents>();
  const initial: FoldState = {
    lastDirection: null,
    lastDate: null,
    lastInstant: null,
  };

  const step = (state: FoldState, event: ValidatedEvent): FoldState => {
    const { date, carriesOver } = attributeDay(state, event, config);
    const sameDay = state.lastDate === date;

    let direction: ResolvedDirection;
    if (event.direction !== Direction.UNKNOWN) {
      direction = event.direction;
    } else if (carriesOver) {
      direction = Direction.EXIT;
    } else if (sameDay && state.lastDirection) {
      direction = DirectionNormalizers.opposite(state.lastDirection);
    } else {
      direction = Direction.ENTRY;
    }

    let day = days.get(date);
    if (!day) {
      day = { employeeCode, date, events: [], anomalies: [] };
      days.set(date, day);
    }

    if (sameDay && state.lastDirection === direction) {
      day.anomalies.push({
        kind: AnomalyKind.DUPLICATE_DIRECTION,
        at: event.instant,
        direction,
      });
    }

    day.events.push({
      employeeCode,
      instant: event.instant,
      date,
      localTime: toLocalTime(event.instant, config.timezone),
      direction,
      inferred: event.direction === Direction.UNKNOWN,
    });

    return {
      lastDirection: direction,
      lastDate: date,
      lastInstant: event.instant,
    };
  };

  // Events sharing an instant are applied so that they alternate with the
  // direction already resolved
  groupByInstant(events).reduce<FoldState>((state, group) => {
    const entryPending = hasPendingEntry(state, group[0].instant, config);
    const ordered = [...group].sort(
      (a, b) =>
        DirectionNormalizers.tieWeight(a.direction, entryPending) -
        DirectionNormalizers.tieWeight(b.direction, entryPending),
    );
    return ordered.reduce(step, state);
  }, initial);

  return [...days.values()];
}

export function normalizeEvents(
  rows: readonly RawEvent[],
  config: EngineConfig,
): NormalizationResult {
  const rejected: InvalidEventReport[] = [];
  const byEmployee = new Map<string, ValidatedEvent[]>();

  rows.forEach((row, index) => {
    const result = validateRow(row, index, config);
    if ('reason' in result) {
      rejected.push(result);
      return;
    }

    const events = byEmployee.get(result.employeeCode) ?? [];
    events.push(result);
    byEmployee.set(result.employeeCode, events);
  });

  const days = [...byEmployee.entries()].flatMap(([employeeCode, events]) =>
    foldEmployeeEvents(employeeCode, sortAndDeduplicate(events), config),
  );

  return { days, rejected };
}
