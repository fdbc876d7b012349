// types/access/index.ts
export * from './config';
export * from './employee';
export * from './error';
export * from './events';
export * from './hours';
export * from './payroll';
