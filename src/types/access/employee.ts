// types/access/employee.ts

export interface Employee {
  id: string;
  code: string;
  firstName: string;
  lastName: string;
  fullName: string;
  email: string | null;
  phone: string | null;
  department: string | null;
  position: string | null;
  workplace: string | null;
  paysSundaySurcharge: boolean;
  restDay: string | null;
  active: boolean;
}

export interface EmployeeFilters {
  activeOnly?: boolean;
  workplace?: string | null;
  department?: string | null;
}

export interface AccessRecord {
  id: string;
  employeeId: string;
  employeeCode: string;
  employeeName: string;
  direction: string;
  workplace: string | null;
  date: string;
  time: string;
  observations: string | null;
  confidence: number | null;
}

export interface RecordFilters {
  employeeId?: string | null;
  workplace?: string | null;
  direction?: 'ENTRADA' | 'SALIDA' | null;
}

export interface WorkplaceRecordCounts {
  workplace: string | null;
  records: number;
  employees: number;
  entries: number;
  exits: number;
  forced: number;
}

export interface ConfigurationEntry {
  key: string;
  value: string;
  description: string | null;
  dataType: string | null;
}
