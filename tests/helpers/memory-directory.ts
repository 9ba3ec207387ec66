import { setTimeout as delay } from 'timers/promises';
import type { ClockEventKind, EmployeeDirectory, ManualIdentity } from '../../src/directory/types.js';
import { resolvePermissions, type Employee, type Role } from '../../src/models/employee.js';

export interface EmployeeFixture {
  id: number;
  cardId: string;
  firstName: string;
  lastName: string;
  role?: Role;
  loginName?: string;
  active?: boolean;
  permissions?: string[];
}

export function makeEmployee(fixture: EmployeeFixture): Employee {
  const role = fixture.role ?? 'worker';
  return {
    id: fixture.id,
    cardId: fixture.cardId,
    loginName: fixture.loginName ?? null,
    firstName: fixture.firstName,
    lastName: fixture.lastName,
    displayName: `${fixture.firstName} ${fixture.lastName}`,
    role,
    department: null,
    language: 'de',
    active: fixture.active ?? true,
    permissions: resolvePermissions(role, fixture.permissions ?? []),
    lastLogin: null,
  };
}

export const WORKER = makeEmployee({ id: 1, cardId: '0001000003', firstName: 'Robin', lastName: 'Picker' });
export const MANAGER = makeEmployee({
  id: 2,
  cardId: '0001000002',
  firstName: 'Sam',
  lastName: 'Lead',
  role: 'manager',
  loginName: 'sam.lead',
});
export const ADMIN = makeEmployee({
  id: 3,
  cardId: '0001000001',
  firstName: 'Alex',
  lastName: 'Admin',
  role: 'admin',
  loginName: 'admin',
});
export const FORMER = makeEmployee({
  id: 4,
  cardId: '0001000004',
  firstName: 'Kim',
  lastName: 'Former',
  active: false,
});

export class MemoryDirectory implements EmployeeDirectory {
  lookups: string[] = [];
  lastLogins: Array<{ employeeId: number; at: Date }> = [];
  clockEvents: Array<{ employeeId: number; kind: ClockEventKind }> = [];
  lookupError: Error | null = null;
  notifyError: Error | null = null;
  lookupDelayMs = 0;
  private employees: Employee[];

  constructor(employees: Employee[] = [WORKER, MANAGER, ADMIN, FORMER]) {
    this.employees = [...employees];
  }

  add(employee: Employee): void {
    this.employees.push(employee);
  }

  async lookupEmployee(identifier: string): Promise<Employee | null> {
    this.lookups.push(identifier);
    if (this.lookupDelayMs > 0) {
      await delay(this.lookupDelayMs);
    }
    if (this.lookupError) throw this.lookupError;
    return (
      this.employees.find((e) => e.cardId === identifier) ??
      this.employees.find((e) => e.loginName === identifier) ??
      null
    );
  }

  async recordLastLogin(employeeId: number, at: Date): Promise<void> {
    if (this.notifyError) throw this.notifyError;
    this.lastLogins.push({ employeeId, at });
  }

  async recordClockEvent(employeeId: number, kind: ClockEventKind): Promise<void> {
    if (this.notifyError) throw this.notifyError;
    this.clockEvents.push({ employeeId, kind });
  }

  async listManualIdentities(): Promise<ManualIdentity[]> {
    return this.employees
      .filter((e) => e.active && e.loginName !== null)
      .map((e) => ({ identifier: e.loginName ?? '', displayName: e.displayName }));
  }
}
