import type { Employee } from '../models/employee.js';

export type ClockEventKind = 'in' | 'out';

export interface ManualIdentity {
  identifier: string;
  displayName: string;
}

/**
 * Read-only view of the employee directory plus the two notifications the
 * kiosk sends back on login and logout.
 */
export interface EmployeeDirectory {
  /** Matches a card id or a manual login name. */
  lookupEmployee(identifier: string): Promise<Employee | null>;
  recordLastLogin(employeeId: number, at: Date): Promise<void>;
  recordClockEvent(employeeId: number, kind: ClockEventKind, at: Date): Promise<void>;
  listManualIdentities(): Promise<ManualIdentity[]>;
}
