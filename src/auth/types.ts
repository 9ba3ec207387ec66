import type { Employee } from '../models/employee.js';

export interface AuthOptions {
  maxAttempts: number;
  lockoutWindowMs: number;
  sessionTimeoutMs: number;
}

export const DEFAULT_AUTH_OPTIONS: AuthOptions = {
  maxAttempts: 5,
  lockoutWindowMs: 15 * 60 * 1000,
  sessionTimeoutMs: 60 * 60 * 1000,
};

export type UnauthorizedReason = 'unknown_identifier' | 'inactive_employee' | 'directory_unavailable';

export type AuthResult =
  | { status: 'success'; employee: Employee }
  | { status: 'unauthorized'; reason: UnauthorizedReason; failedAttempts: number }
  | { status: 'locked'; retryAfterMs: number };

export type SessionState = 'none' | 'active' | 'expired' | 'closed';

export type SessionInfo =
  | { state: 'none' }
  | { state: 'active'; employeeId: number; startedAt: Date; lastActivityAt: Date };

export type UnlockResult = 'unlocked' | 'not_locked' | 'forbidden';

export interface LoginStatistics {
  currentUser: string | null;
  authenticated: boolean;
  sessionDurationMinutes: number;
  failedAttemptsToday: number;
  lockedAccounts: number;
}

export type PermissionDeniedCode = 'not_authenticated' | 'missing_permission';

export class PermissionDeniedError extends Error {
  readonly code: PermissionDeniedCode;
  readonly permission: string;

  constructor(code: PermissionDeniedCode, permission: string) {
    super(code === 'not_authenticated' ? 'Not logged in' : `Permission '${permission}' required`);
    this.name = 'PermissionDeniedError';
    this.code = code;
    this.permission = permission;
  }
}
