// schemas/tools.ts
import { z } from 'zod';
import { isValidDateKey } from '../utils/dateUtils';

const dateKey = z
  .string()
  .trim()
  .refine(isValidDateKey, 'Expected a yyyy-MM-dd date');

const text = z.string().trim().min(1);

const year = z.coerce.number().int().min(2000).max(2100);
const month = z.coerce.number().int().min(1).max(12);
const fortnight = z.coerce
  .number()
  .pipe(z.union([z.literal(1), z.literal(2)]));

const direction = z
  .string()
  .trim()
  .toUpperCase()
  .pipe(z.enum(['ENTRADA', 'SALIDA']));

export const listEmployeesSchema = z.object({
  activos_solo: z.boolean().default(true),
  restaurante: text.optional(),
  departamento: text.optional(),
});

export const searchEmployeeSchema = z.object({
  termino: text,
});

export const recordsByDateSchema = z.object({
  fecha: dateKey,
  empleado_id: text.optional(),
  restaurante: text.optional(),
  tipo: direction.optional(),
});

export const recordsByRangeSchema = z.object({
  fecha_inicio: dateKey,
  fecha_fin: dateKey,
  empleado_id: text.optional(),
  restaurante: text.optional(),
});

export const lastRecordSchema = z.object({
  empleado_id: text,
});

export const pendingExitsSchema = z.object({
  fecha: dateKey.optional(),
});

export const dailyHoursSchema = z.object({
  empleado_id: text,
  fecha: dateKey,
});

export const weeklyReportSchema = z.object({
  empleado_id: text.optional(),
  fecha_semana: dateKey.optional(),
  restaurante: text.optional(),
});

export const monthlyReportSchema = z.object({
  anio: year,
  mes: month,
  empleado_id: text.optional(),
  restaurante: text.optional(),
});

export const attendanceStatisticsSchema = z.object({
  fecha_inicio: dateKey,
  fecha_fin: dateKey,
  restaurante: text.optional(),
});

export const configurationSchema = z.object({
  clave: text.optional(),
});

export const payrollSummarySchema = z.object({
  anio: year.optional(),
  mes: month.optional(),
  quincena: fortnight.optional(),
  fecha: dateKey.optional(),
  fecha_inicio: dateKey.optional(),
  fecha_fin: dateKey.optional(),
  empleado_id: text.optional(),
  restaurante: text.optional(),
});

export type PayrollSummaryParams = z.infer<typeof payrollSummarySchema>;
