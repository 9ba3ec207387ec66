import type { AuthResult, SessionInfo } from '../auth/index.js';
import type { Employee } from '../models/employee.js';
import type { ScanOutcome } from '../station/index.js';

export interface EmployeeBody {
  id: number;
  cardId: string;
  loginName: string | null;
  firstName: string;
  lastName: string;
  displayName: string;
  role: string;
  department: string | null;
  language: string;
  active: boolean;
  permissions: string[];
  lastLogin: string | null;
}

export function serializeEmployee(employee: Employee): EmployeeBody {
  return {
    id: employee.id,
    cardId: employee.cardId,
    loginName: employee.loginName,
    firstName: employee.firstName,
    lastName: employee.lastName,
    displayName: employee.displayName,
    role: employee.role,
    department: employee.department,
    language: employee.language,
    active: employee.active,
    permissions: [...employee.permissions].sort(),
    lastLogin: employee.lastLogin ? employee.lastLogin.toISOString() : null,
  };
}

export function serializeSession(session: SessionInfo) {
  if (session.state === 'none') {
    return { state: session.state };
  }
  return {
    state: session.state,
    employeeId: session.employeeId,
    startedAt: session.startedAt.toISOString(),
    lastActivityAt: session.lastActivityAt.toISOString(),
  };
}

export function serializeAuthResult(result: AuthResult) {
  switch (result.status) {
    case 'success':
      return { status: result.status, employee: serializeEmployee(result.employee) };
    case 'unauthorized':
      return { status: result.status, reason: result.reason, failedAttempts: result.failedAttempts };
    case 'locked':
      return { status: result.status, retryAfterSeconds: Math.ceil(result.retryAfterMs / 1000) };
  }
}

export function serializeScanOutcome(outcome: ScanOutcome) {
  return {
    cardId: outcome.scan.cardId,
    observedAt: outcome.scan.observedAt.toISOString(),
    result: serializeAuthResult(outcome.result),
  };
}
