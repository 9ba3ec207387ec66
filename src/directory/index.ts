export type { ClockEventKind, EmployeeDirectory, ManualIdentity } from './types.js';
export { SqliteEmployeeDirectory, toEmployee } from './sqlite.js';
export { loadEmployeeSeed, seedEmployees, upsertEmployees, type EmployeeSeed, type SeedLoadResult } from './seed.js';
