import { and, asc, desc, eq, isNotNull, isNull, sql } from 'drizzle-orm';
import type { Logger } from 'pino';
import type { KioskDb } from '../db/index.js';
import { employees, timeTracking, type SelectEmployee } from '../db/schema.js';
import { isLanguage, isRole, resolvePermissions, type Employee } from '../models/employee.js';
import type { ClockEventKind, EmployeeDirectory, ManualIdentity } from './types.js';

function parsePermissions(raw: string | null): string[] {
  if (!raw) return [];
  try {
    const parsed: unknown = JSON.parse(raw);
    if (Array.isArray(parsed)) {
      return parsed.filter((p): p is string => typeof p === 'string');
    }
  } catch {
    // malformed column falls back to role defaults
  }
  return [];
}

function roleLabel(role: string): string {
  return role.charAt(0).toUpperCase() + role.slice(1);
}

export function toEmployee(row: SelectEmployee): Employee {
  const role = isRole(row.role) ? row.role : 'worker';
  return {
    id: row.id,
    cardId: row.cardId,
    loginName: row.loginName,
    firstName: row.firstName,
    lastName: row.lastName,
    displayName: `${row.firstName} ${row.lastName}`,
    role,
    department: row.department,
    language: isLanguage(row.language) ? row.language : 'de',
    active: row.active,
    permissions: resolvePermissions(role, parsePermissions(row.permissions)),
    lastLogin: row.lastLogin ? new Date(row.lastLogin) : null,
  };
}

/**
 * Employee directory on the kiosk's local SQLite database.
 * Card ids take precedence over manual login names when both could match.
 */
export class SqliteEmployeeDirectory implements EmployeeDirectory {
  private db: KioskDb;
  private station: string;
  private logger: Logger;

  constructor(db: KioskDb, station: string, logger: Logger) {
    this.db = db;
    this.station = station;
    this.logger = logger;
  }

  async lookupEmployee(identifier: string): Promise<Employee | null> {
    const byCard = this.db.select().from(employees).where(eq(employees.cardId, identifier)).limit(1).get();
    if (byCard) return toEmployee(byCard);

    const byLogin = this.db
      .select()
      .from(employees)
      .where(eq(employees.loginName, identifier))
      .limit(1)
      .get();
    return byLogin ? toEmployee(byLogin) : null;
  }

  async recordLastLogin(employeeId: number, at: Date): Promise<void> {
    this.db
      .update(employees)
      .set({
        lastLogin: at.toISOString(),
        loginCount: sql`${employees.loginCount} + 1`,
        updatedAt: at.toISOString(),
      })
      .where(eq(employees.id, employeeId))
      .run();
  }

  async recordClockEvent(employeeId: number, kind: ClockEventKind, at: Date): Promise<void> {
    const open = this.db
      .select()
      .from(timeTracking)
      .where(and(eq(timeTracking.employeeId, employeeId), isNull(timeTracking.clockOut)))
      .orderBy(desc(timeTracking.clockIn))
      .limit(1)
      .get();

    if (kind === 'in') {
      if (open) {
        this.logger.debug({ employeeId, since: open.clockIn }, 'Employee already clocked in');
        return;
      }
      this.db
        .insert(timeTracking)
        .values({ employeeId, station: this.station, clockIn: at.toISOString() })
        .run();
      this.logger.info({ employeeId, station: this.station }, 'Clocked in');
      return;
    }

    if (!open) {
      this.logger.debug({ employeeId }, 'Clock-out without open time entry');
      return;
    }
    this.db.update(timeTracking).set({ clockOut: at.toISOString() }).where(eq(timeTracking.id, open.id)).run();
    this.logger.info({ employeeId, station: this.station }, 'Clocked out');
  }

  async listManualIdentities(): Promise<ManualIdentity[]> {
    const rows = this.db
      .select()
      .from(employees)
      .where(and(eq(employees.active, true), isNotNull(employees.loginName)))
      .orderBy(asc(employees.lastName), asc(employees.firstName))
      .all();

    const identities: ManualIdentity[] = [];
    for (const row of rows) {
      if (!row.loginName) continue;
      identities.push({
        identifier: row.loginName,
        displayName: `${row.firstName} ${row.lastName} (${roleLabel(row.role)})`,
      });
    }
    return identities;
  }
}
