// services/AccessLogRepository.ts

import { Pool, RowDataPacket } from 'mysql2/promise';
import {
  AccessRecord,
  AppError,
  ConfigurationEntry,
  DateRange,
  Employee,
  EmployeeFilters,
  ErrorCode,
  PayRates,
  RawEvent,
  RecordFilters,
  WorkplaceRecordCounts,
} from '../types/access';
import { createLogger } from '../utils/loggers';
import {
  isTransientDbError,
  query,
  QueryParams,
} from '../utils/mysqlConnection';
import { PayrollUtils } from '../utils/payrollUtils';
import { retry } from '../utils/retry';

const logger = createLogger('AccessLogRepository');

const SEARCH_LIMIT = 20;

export interface EventQuery extends DateRange {
  employeeCode?: string | null;
  workplace?: string | null;
}

export interface RecordCounts {
  byWorkplace: WorkplaceRecordCounts[];
  uniqueEmployees: number;
}

/** Data-access capability the report services depend on */
export interface AccessLogRepository {
  listEmployees(filters: EmployeeFilters): Promise<Employee[]>;
  searchEmployees(term: string): Promise<Employee[]>;
  /** Matches an id, an exact code, or a code/name fragment */
  fetchEmployee(codeOrName: string): Promise<Employee>;
  fetchEvents(params: EventQuery): Promise<RawEvent[]>;
  fetchRecords(range: DateRange, filters: RecordFilters): Promise<AccessRecord[]>;
  fetchLastRecord(employeeId: string): Promise<AccessRecord | null>;
  fetchRecordCounts(
    range: DateRange,
    workplace?: string | null,
  ): Promise<RecordCounts>;
  fetchConfigurationEntries(key?: string | null): Promise<ConfigurationEntry[]>;
  fetchPayRates(): Promise<PayRates>;
}

interface EmployeeRow extends RowDataPacket {
  id: string;
  codigo_empleado: string;
  nombre: string;
  apellido: string;
  email: string | null;
  telefono: string | null;
  departamento: string | null;
  cargo: string | null;
  liquida_dominical: number | null;
  dia_descanso: string | null;
  punto_trabajo: string | null;
  activo: number;
}

interface EventRow extends RowDataPacket {
  empleado_id: string;
  codigo_empleado: string;
  empleado_nombre: string;
  tipo_registro: string | null;
  punto_trabajo: string | null;
  fecha_registro: string;
  hora_registro: string;
  timestamp_registro: Date | null;
}

interface RecordRow extends RowDataPacket {
  id: string;
  empleado_id: string;
  codigo_empleado: string;
  empleado_nombre: string;
  tipo_registro: string;
  punto_trabajo: string | null;
  fecha_registro: string;
  hora_registro: string;
  confianza_reconocimiento: string | number | null;
  observaciones: string | null;
}

interface CountRow extends RowDataPacket {
  punto_trabajo: string | null;
  total_registros: number;
  empleados_unicos: number;
  entradas: string | number | null;
  salidas: string | number | null;
  forzados: string | number | null;
}

interface ConfigurationRow extends RowDataPacket {
  clave: string;
  valor: string;
  descripcion: string | null;
  tipo_dato: string | null;
}

const EMPLOYEE_COLUMNS = `
  id, codigo_empleado, nombre, apellido, email, telefono, departamento,
  cargo, liquida_dominical, dia_descanso, punto_trabajo, activo
`;

const RECORD_COLUMNS = `
  r.id, r.empleado_id, e.codigo_empleado,
  CONCAT(e.nombre, ' ', e.apellido) AS empleado_nombre,
  r.tipo_registro, r.punto_trabajo, r.fecha_registro, r.hora_registro,
  r.confianza_reconocimiento, r.observaciones
`;

function mapEmployee(row: EmployeeRow): Employee {
  return {
    id: String(row.id),
    code: row.codigo_empleado,
    firstName: row.nombre,
    lastName: row.apellido,
    fullName: `${row.nombre} ${row.apellido}`,
    email: row.email,
    phone: row.telefono,
    department: row.departamento,
    position: row.cargo,
    workplace: row.punto_trabajo,
    paysSundaySurcharge: Boolean(row.liquida_dominical),
    restDay: row.dia_descanso,
    active: Boolean(row.activo),
  };
}

function mapRecord(row: RecordRow): AccessRecord {
  const confidence =
    row.confianza_reconocimiento === null
      ? null
      : Number(row.confianza_reconocimiento);
  return {
    id: String(row.id),
    employeeId: String(row.empleado_id),
    employeeCode: row.codigo_empleado,
    employeeName: row.empleado_nombre,
    direction: row.tipo_registro,
    workplace: row.punto_trabajo,
    date: row.fecha_registro,
    time: row.hora_registro,
    observations: row.observaciones,
    confidence: Number.isFinite(confidence) ? confidence : null,
  };
}

function mapEvent(row: EventRow): RawEvent {
  return {
    employeeCode: row.codigo_empleado,
    // Older rows only carry the device's local date and time
    timestamp: row.timestamp_registro ?? `${row.fecha_registro}T${row.hora_registro}`,
    direction: row.tipo_registro,
    employeeId: String(row.empleado_id),
    employeeName: row.empleado_nombre,
    workplace: row.punto_trabajo,
  };
}

export class MySqlAccessLogRepository implements AccessLogRepository {
  constructor(private pool: Pool) {}

  private async run<T extends RowDataPacket>(
    sql: string,
    params: QueryParams = {},
  ): Promise<T[]> {
    try {
      return await retry(
        () => query<T>(this.pool, sql, params),
        2,
        500,
        2,
        isTransientDbError,
      );
    } catch (error) {
      throw new AppError({
        code: ErrorCode.DATA_FETCH_ERROR,
        message: 'Access log query failed',
        originalError: error,
      });
    }
  }

  async listEmployees(filters: EmployeeFilters): Promise<Employee[]> {
    const rows = await this.run<EmployeeRow>(
      `SELECT ${EMPLOYEE_COLUMNS}
       FROM empleados
       WHERE (:activeOnly = FALSE OR activo = TRUE)
         AND (:workplace IS NULL OR punto_trabajo LIKE CONCAT('%', :workplace, '%'))
         AND (:department IS NULL OR departamento = :department)
       ORDER BY apellido, nombre`,
      {
        activeOnly: filters.activeOnly ?? true,
        workplace: filters.workplace ?? null,
        department: filters.department ?? null,
      },
    );
    return rows.map(mapEmployee);
  }

  async searchEmployees(term: string): Promise<Employee[]> {
    const rows = await this.run<EmployeeRow>(
      `SELECT ${EMPLOYEE_COLUMNS}
       FROM empleados
       WHERE codigo_empleado LIKE CONCAT('%', :term, '%')
          OR nombre LIKE CONCAT('%', :term, '%')
          OR apellido LIKE CONCAT('%', :term, '%')
          OR CONCAT(nombre, ' ', apellido) LIKE CONCAT('%', :term, '%')
       ORDER BY
         CASE WHEN codigo_empleado = :term THEN 0 ELSE 1 END,
         apellido, nombre
       LIMIT ${SEARCH_LIMIT}`,
      { term },
    );
    return rows.map(mapEmployee);
  }

  async fetchEmployee(codeOrName: string): Promise<Employee> {
    const term = codeOrName.trim();
    const exact = await this.run<EmployeeRow>(
      `SELECT ${EMPLOYEE_COLUMNS}
       FROM empleados
       WHERE id = :term OR codigo_empleado = :term
       LIMIT 1`,
      { term },
    );
    const employee =
      exact.length > 0
        ? mapEmployee(exact[0])
        : term
          ? (await this.searchEmployees(term))[0]
          : undefined;

    if (!employee) {
      logger.warn(`No employee matches "${term}"`);
      throw new AppError({
        code: ErrorCode.EMPLOYEE_NOT_FOUND,
        message: `Employee ${term} not found`,
        details: { term },
      });
    }

    return employee;
  }

  async fetchEvents(params: EventQuery): Promise<RawEvent[]> {
    const rows = await this.run<EventRow>(
      `SELECT r.empleado_id, e.codigo_empleado,
              CONCAT(e.nombre, ' ', e.apellido) AS empleado_nombre,
              r.tipo_registro, r.punto_trabajo, r.fecha_registro,
              r.hora_registro, r.timestamp_registro
       FROM registros r
       JOIN empleados e ON r.empleado_id = e.id
       WHERE r.fecha_registro BETWEEN :startDate AND :endDate
         AND (:employeeCode IS NULL OR e.codigo_empleado = :employeeCode)
         AND (:workplace IS NULL OR r.punto_trabajo LIKE CONCAT('%', :workplace, '%'))
         AND e.activo = TRUE
       ORDER BY e.apellido, e.nombre, r.fecha_registro, r.hora_registro`,
      {
        startDate: params.startDate,
        endDate: params.endDate,
        employeeCode: params.employeeCode ?? null,
        workplace: params.workplace ?? null,
      },
    );

    logger.info(
      `Fetched ${rows.length} events for ${params.startDate}..${params.endDate}`,
      { employeeCode: params.employeeCode ?? null },
    );

    return rows.map(mapEvent);
  }

  async fetchRecords(
    range: DateRange,
    filters: RecordFilters,
  ): Promise<AccessRecord[]> {
    const rows = await this.run<RecordRow>(
      `SELECT ${RECORD_COLUMNS}
       FROM registros r
       JOIN empleados e ON r.empleado_id = e.id
       WHERE r.fecha_registro BETWEEN :startDate AND :endDate
         AND (:employeeId IS NULL OR r.empleado_id = :employeeId)
         AND (:workplace IS NULL OR r.punto_trabajo LIKE CONCAT('%', :workplace, '%'))
         AND (:direction IS NULL OR r.tipo_registro = :direction)
       ORDER BY r.fecha_registro, r.hora_registro`,
      {
        startDate: range.startDate,
        endDate: range.endDate,
        employeeId: filters.employeeId ?? null,
        workplace: filters.workplace ?? null,
        direction: filters.direction ?? null,
      },
    );
    return rows.map(mapRecord);
  }

  async fetchLastRecord(employeeId: string): Promise<AccessRecord | null> {
    const rows = await this.run<RecordRow>(
      `SELECT ${RECORD_COLUMNS}
       FROM registros r
       JOIN empleados e ON r.empleado_id = e.id
       WHERE r.empleado_id = :employeeId
       ORDER BY r.fecha_registro DESC, r.hora_registro DESC
       LIMIT 1`,
      { employeeId },
    );
    return rows.length > 0 ? mapRecord(rows[0]) : null;
  }

  async fetchRecordCounts(
    range: DateRange,
    workplace: string | null = null,
  ): Promise<RecordCounts> {
    const params = {
      startDate: range.startDate,
      endDate: range.endDate,
      workplace,
    };
    const scope = `fecha_registro BETWEEN :startDate AND :endDate
      AND (:workplace IS NULL OR punto_trabajo LIKE CONCAT('%', :workplace, '%'))`;

    const [rows, unique] = await Promise.all([
      this.run<CountRow>(
        `SELECT punto_trabajo,
                COUNT(*) AS total_registros,
                COUNT(DISTINCT empleado_id) AS empleados_unicos,
                SUM(tipo_registro = 'ENTRADA') AS entradas,
                SUM(tipo_registro = 'SALIDA') AS salidas,
                SUM(observaciones LIKE '%FORZADO%') AS forzados
         FROM registros
         WHERE ${scope}
         GROUP BY punto_trabajo
         ORDER BY punto_trabajo`,
        params,
      ),
      this.run<RowDataPacket & { total: number }>(
        `SELECT COUNT(DISTINCT empleado_id) AS total
         FROM registros
         WHERE ${scope}`,
        params,
      ),
    ]);

    return {
      byWorkplace: rows.map((row) => ({
        workplace: row.punto_trabajo,
        records: Number(row.total_registros),
        employees: Number(row.empleados_unicos),
        entries: Number(row.entradas ?? 0),
        exits: Number(row.salidas ?? 0),
        forced: Number(row.forzados ?? 0),
      })),
      uniqueEmployees: unique.length > 0 ? Number(unique[0].total) : 0,
    };
  }

  async fetchConfigurationEntries(
    key: string | null = null,
  ): Promise<ConfigurationEntry[]> {
    const rows = await this.run<ConfigurationRow>(
      `SELECT clave, valor, descripcion, tipo_dato
       FROM configuracion
       WHERE (:key IS NULL OR clave = :key)
       ORDER BY clave`,
      { key },
    );
    return rows.map((row) => ({
      key: row.clave,
      value: row.valor,
      description: row.descripcion,
      dataType: row.tipo_dato,
    }));
  }

  async fetchPayRates(): Promise<PayRates> {
    const entries = await this.fetchConfigurationEntries();
    return PayrollUtils.parseRates(
      Object.fromEntries(entries.map((entry) => [entry.key, entry.value])),
    );
  }
}
