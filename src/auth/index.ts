import type { Logger } from 'pino';
import { systemClock, type Clock } from '../models/clock.js';
import { grants, type Employee } from '../models/employee.js';
import type { ClockEventKind, EmployeeDirectory } from '../directory/types.js';
import { LoginAttemptTracker } from './attempts.js';
import {
  DEFAULT_AUTH_OPTIONS,
  PermissionDeniedError,
  type AuthOptions,
  type AuthResult,
  type LoginStatistics,
  type SessionInfo,
  type SessionState,
  type UnlockResult,
} from './types.js';

export * from './types.js';
export { LoginAttemptTracker } from './attempts.js';

export interface AuthServiceDeps {
  directory: EmployeeDirectory;
  logger: Logger;
  clock?: Clock;
  options?: Partial<AuthOptions>;
}

interface Session {
  employee: Employee;
  startedAt: Date;
  lastActivityAt: Date;
  state: SessionState;
}

const MINUTE_MS = 60 * 1000;

/**
 * Turns card scans and manual identifiers into the kiosk's single login session.
 *
 * Failed identifiers are counted over a rolling window; once an identifier hits
 * maxAttempts it is answered with `locked` without touching the directory.
 * Session idle timeout is evaluated lazily whenever the session is read.
 */
export class AuthenticationService {
  private directory: EmployeeDirectory;
  private logger: Logger;
  private clock: Clock;
  private options: AuthOptions;
  private attempts: LoginAttemptTracker;
  private session: Session | null = null;
  // serializes authenticate(); the lookup is async and the lock check must not interleave
  private pending: Promise<unknown> = Promise.resolve();

  constructor(deps: AuthServiceDeps) {
    this.directory = deps.directory;
    this.logger = deps.logger;
    this.clock = deps.clock ?? systemClock;
    this.options = { ...DEFAULT_AUTH_OPTIONS, ...deps.options };
    this.attempts = new LoginAttemptTracker(this.options.lockoutWindowMs);
  }

  authenticate(identifier: string): Promise<AuthResult> {
    const run = this.pending.then(() => this.attempt(identifier));
    this.pending = run.catch(() => undefined);
    return run;
  }

  getCurrentUser(): Employee | null {
    const session = this.session;
    if (!session || session.state !== 'active') {
      return null;
    }

    const now = this.clock.now();
    if (now.getTime() - session.lastActivityAt.getTime() > this.options.sessionTimeoutMs) {
      session.state = 'expired';
      this.logger.info(
        { employeeId: session.employee.id, idleMinutes: this.minutesBetween(session.lastActivityAt, now) },
        'Session expired'
      );
      this.notifyClock(session.employee.id, 'out', now);
      this.session = null;
      return null;
    }

    return session.employee;
  }

  updateActivity(): void {
    // an idle session past its timeout is torn down here rather than revived
    if (!this.getCurrentUser() || !this.session) return;
    this.session.lastActivityAt = this.clock.now();
  }

  hasPermission(permission: string): boolean {
    const user = this.getCurrentUser();
    if (!user) return false;
    return grants(user.permissions, permission);
  }

  requirePermission(permission: string): void {
    if (!this.getCurrentUser()) {
      throw new PermissionDeniedError('not_authenticated', permission);
    }
    if (!this.hasPermission(permission)) {
      throw new PermissionDeniedError('missing_permission', permission);
    }
  }

  isAuthenticated(): boolean {
    return this.getCurrentUser() !== null;
  }

  getUserPermissions(): string[] {
    const user = this.getCurrentUser();
    return user ? [...user.permissions].sort() : [];
  }

  logout(): void {
    const session = this.session;
    if (!session) return;

    const now = this.clock.now();
    const wasActive = session.state === 'active';
    session.state = 'closed';
    this.logger.info(
      { employeeId: session.employee.id, sessionMinutes: this.minutesBetween(session.startedAt, now) },
      'Employee logged out'
    );
    if (wasActive) {
      this.notifyClock(session.employee.id, 'out', now);
    }
    this.session = null;
  }

  sessionInfo(): SessionInfo {
    if (!this.getCurrentUser() || !this.session) {
      return { state: 'none' };
    }
    return {
      state: 'active',
      employeeId: this.session.employee.id,
      startedAt: this.session.startedAt,
      lastActivityAt: this.session.lastActivityAt,
    };
  }

  getRemainingLockoutMs(identifier: string): number {
    const id = identifier.trim();
    const now = this.clock.now();
    if (this.attempts.count(id, now) < this.options.maxAttempts) {
      return 0;
    }
    return this.attempts.remainingLockoutMs(id, now);
  }

  /**
   * Clears the failure history of an identifier. Needs `manage_users`.
   */
  unlockAccount(identifier: string): UnlockResult {
    if (!this.hasPermission('manage_users')) {
      return 'forbidden';
    }
    const id = identifier.trim();
    if (!this.attempts.clear(id)) {
      return 'not_locked';
    }
    this.logger.info({ identifier: id, unlockedBy: this.session?.employee.id }, 'Account unlocked');
    return 'unlocked';
  }

  getLoginStatistics(): LoginStatistics {
    const user = this.getCurrentUser();
    const now = this.clock.now();
    const startOfDay = new Date(now);
    startOfDay.setHours(0, 0, 0, 0);

    return {
      currentUser: user ? user.displayName : null,
      authenticated: user !== null,
      sessionDurationMinutes: this.session ? this.minutesBetween(this.session.startedAt, now) : 0,
      failedAttemptsToday: this.attempts.failuresSince(startOfDay, now),
      lockedAccounts: this.attempts.lockedIdentifiers(this.options.maxAttempts, now).length,
    };
  }

  private async attempt(identifier: string): Promise<AuthResult> {
    const id = identifier.trim();
    if (!id) {
      return { status: 'unauthorized', reason: 'unknown_identifier', failedAttempts: 0 };
    }

    const now = this.clock.now();
    const failures = this.attempts.prune(id, now);
    if (failures >= this.options.maxAttempts) {
      const retryAfterMs = this.attempts.remainingLockoutMs(id, now);
      this.logger.warn(
        { identifier: id, retryAfterMinutes: Math.ceil(retryAfterMs / MINUTE_MS) },
        'Login rejected, identifier locked'
      );
      return { status: 'locked', retryAfterMs };
    }

    let employee: Employee | null;
    try {
      employee = await this.directory.lookupEmployee(id);
    } catch (err) {
      this.logger.error({ err, identifier: id }, 'Employee directory lookup failed');
      return { status: 'unauthorized', reason: 'directory_unavailable', failedAttempts: failures };
    }

    if (!employee || !employee.active) {
      const failedAttempts = this.attempts.recordFailure(id, now);
      const reason = employee ? 'inactive_employee' : 'unknown_identifier';
      this.logger.warn({ identifier: id, reason, failedAttempts }, 'Login rejected');
      return { status: 'unauthorized', reason, failedAttempts };
    }

    this.attempts.clear(id);
    this.startSession(employee, now);
    return { status: 'success', employee };
  }

  private startSession(employee: Employee, now: Date): void {
    const previous = this.session;
    if (previous && previous.employee.id !== employee.id) {
      this.logout();
    }

    this.session = { employee, startedAt: now, lastActivityAt: now, state: 'active' };
    this.logger.info({ employeeId: employee.id, role: employee.role }, 'Employee logged in');

    const employeeId = employee.id;
    this.notifyDirectory('last_login', () => this.directory.recordLastLogin(employeeId, now));
    this.notifyClock(employeeId, 'in', now);
  }

  private notifyClock(employeeId: number, kind: ClockEventKind, at: Date): void {
    this.notifyDirectory(`clock_${kind}`, () => this.directory.recordClockEvent(employeeId, kind, at));
  }

  // fire-and-forget: a failing directory never blocks or fails a login/logout
  private notifyDirectory(action: string, task: () => Promise<void>): void {
    Promise.resolve()
      .then(task)
      .catch((err) => {
        this.logger.warn({ err, action }, 'Directory notification failed');
      });
  }

  private minutesBetween(from: Date, to: Date): number {
    return Math.floor((to.getTime() - from.getTime()) / MINUTE_MS);
  }
}
