// lib/tools.ts

import {
  attendanceStatisticsSchema,
  configurationSchema,
  dailyHoursSchema,
  lastRecordSchema,
  listEmployeesSchema,
  monthlyReportSchema,
  payrollSummarySchema,
  pendingExitsSchema,
  recordsByDateSchema,
  recordsByRangeSchema,
  searchEmployeeSchema,
  weeklyReportSchema,
} from '../schemas/tools';
import { AccessReportService } from '../services/AccessReportService';
import { AppError, ErrorCode } from '../types/access';
import { defineTool, RegisteredTool, ToolRegistry } from './toolRegistry';

export interface ToolContext {
  reports: AccessReportService;
}

export const accessTools: RegisteredTool<ToolContext>[] = [
  defineTool({
    name: 'consultar_empleados',
    description: 'Lists employees, optionally by workplace and department',
    tags: ['empleados'],
    parameters: listEmployeesSchema,
    handler: (params, { reports }: ToolContext) =>
      reports.listEmployees({
        activeOnly: params.activos_solo,
        workplace: params.restaurante,
        department: params.departamento,
      }),
  }),
  defineTool({
    name: 'buscar_empleado',
    description: 'Finds employees by code or name fragment (20 at most)',
    tags: ['empleados'],
    parameters: searchEmployeeSchema,
    handler: (params, { reports }: ToolContext) =>
      reports.searchEmployees(params.termino),
  }),
  defineTool({
    name: 'consultar_registros_fecha',
    description: 'Access records of one date',
    tags: ['registros'],
    parameters: recordsByDateSchema,
    handler: (params, { reports }: ToolContext) =>
      reports.getRecordsForDate(params.fecha, {
        employeeId: params.empleado_id,
        workplace: params.restaurante,
        direction: params.tipo,
      }),
  }),
  defineTool({
    name: 'consultar_registros_rango',
    description: 'Access records between two dates',
    tags: ['registros'],
    parameters: recordsByRangeSchema,
    handler: (params, { reports }: ToolContext) =>
      reports.getRecordsForRange(
        { startDate: params.fecha_inicio, endDate: params.fecha_fin },
        { employeeId: params.empleado_id, workplace: params.restaurante },
      ),
  }),
  defineTool({
    name: 'obtener_ultimo_registro',
    description: 'Last record of an employee and the action expected next',
    tags: ['registros'],
    parameters: lastRecordSchema,
    handler: (params, { reports }: ToolContext) =>
      reports.getLastRecord(params.empleado_id),
  }),
  defineTool({
    name: 'empleados_sin_salida',
    description: 'Employees still clocked in on a date (today by default)',
    tags: ['registros'],
    parameters: pendingExitsSchema,
    handler: (params, { reports }: ToolContext) =>
      reports.getPendingExits(params.fecha),
  }),
  defineTool({
    name: 'calcular_horas_trabajadas_dia',
    description: 'Worked, regular and overtime hours of one employee-day',
    tags: ['horas'],
    parameters: dailyHoursSchema,
    handler: (params, { reports }: ToolContext) =>
      reports.calculateDailyHours(params.empleado_id, params.fecha),
  }),
  defineTool({
    name: 'reporte_horas_semanal',
    description: 'Per-employee hours for the Monday-Sunday week of a date',
    tags: ['reportes'],
    parameters: weeklyReportSchema,
    handler: (params, { reports }: ToolContext) =>
      reports.weeklyReport({
        date: params.fecha_semana,
        employee: params.empleado_id,
        workplace: params.restaurante,
      }),
  }),
  defineTool({
    name: 'reporte_horas_mensual',
    description: 'Per-employee hours for a calendar month',
    tags: ['reportes'],
    parameters: monthlyReportSchema,
    handler: (params, { reports }: ToolContext) =>
      reports.monthlyReport({
        year: params.anio,
        month: params.mes,
        employee: params.empleado_id,
        workplace: params.restaurante,
      }),
  }),
  defineTool({
    name: 'estadisticas_asistencia',
    description: 'Record counts per workplace and attendance statistics',
    tags: ['reportes'],
    parameters: attendanceStatisticsSchema,
    handler: (params, { reports }: ToolContext) =>
      reports.attendanceStatistics(
        { startDate: params.fecha_inicio, endDate: params.fecha_fin },
        params.restaurante,
      ),
  }),
  defineTool({
    name: 'obtener_configuracion',
    description: 'Engine settings and configuracion table entries',
    tags: ['reportes'],
    parameters: configurationSchema,
    handler: (params, { reports }: ToolContext) =>
      reports.getConfiguration(params.clave),
  }),
  defineTool({
    name: 'resumen_nomina_quincenal',
    description: 'Payroll hours and values per employee for a fortnight',
    tags: ['nomina'],
    parameters: payrollSummarySchema,
    handler: async (params, { reports }: ToolContext) => {
      const { fecha_inicio: startDate, fecha_fin: endDate } = params;
      if ((startDate === undefined) !== (endDate === undefined)) {
        throw new AppError({
          code: ErrorCode.INVALID_INPUT,
          message: 'fecha_inicio and fecha_fin must be given together',
        });
      }

      return reports.payrollSummary({
        year: params.anio,
        month: params.mes,
        fortnight: params.quincena,
        date: params.fecha,
        range: startDate && endDate ? { startDate, endDate } : null,
        employee: params.empleado_id,
        workplace: params.restaurante,
      });
    },
  }),
];

export function createToolRegistry(): ToolRegistry<ToolContext> {
  return new ToolRegistry(accessTools);
}
