/**
 * Employee records as the kiosk sees them.
 * Owned by the directory; the auth layer only references them.
 */

export const ROLES = ['worker', 'supervisor', 'manager', 'admin'] as const;
export type Role = (typeof ROLES)[number];

export const LANGUAGES = ['de', 'en', 'tr', 'pl'] as const;
export type Language = (typeof LANGUAGES)[number];

export const WILDCARD_PERMISSION = '*';

export interface Employee {
  id: number;
  cardId: string;
  loginName: string | null;
  firstName: string;
  lastName: string;
  displayName: string;
  role: Role;
  department: string | null;
  language: Language;
  active: boolean;
  permissions: ReadonlySet<string>;
  lastLogin: Date | null;
}

const BASE_PERMISSIONS = ['view_own_profile', 'change_own_language', 'view_deliveries'];

const WORKER_PERMISSIONS = [
  ...BASE_PERMISSIONS,
  'scan_packages',
  'register_packages',
  'manual_entry',
  'view_package_list',
];

const SUPERVISOR_PERMISSIONS = [
  ...WORKER_PERMISSIONS,
  'create_delivery',
  'finish_delivery',
  'cancel_delivery',
  'view_statistics',
  'edit_packages',
  'delete_packages',
];

const MANAGER_PERMISSIONS = [
  ...SUPERVISOR_PERMISSIONS,
  'manage_employees',
  'view_reports',
  'export_data',
  'system_settings',
  'manage_users',
];

const ROLE_PERMISSIONS: Record<Role, readonly string[]> = {
  worker: WORKER_PERMISSIONS,
  supervisor: SUPERVISOR_PERMISSIONS,
  manager: MANAGER_PERMISSIONS,
  admin: [WILDCARD_PERMISSION],
};

export function defaultPermissions(role: Role): string[] {
  return [...ROLE_PERMISSIONS[role]];
}

/**
 * Explicit permissions win; an employee stored without any gets the role defaults.
 */
export function resolvePermissions(role: Role, explicit: readonly string[]): ReadonlySet<string> {
  return new Set(explicit.length > 0 ? explicit : ROLE_PERMISSIONS[role]);
}

export function grants(permissions: ReadonlySet<string>, permission: string): boolean {
  return permissions.has(WILDCARD_PERMISSION) || permissions.has(permission);
}

export function isRole(value: string): value is Role {
  return ROLES.some((role) => role === value);
}

export function isLanguage(value: string): value is Language {
  return LANGUAGES.some((language) => language === value);
}
