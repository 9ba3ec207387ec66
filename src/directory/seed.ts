import { readFileSync } from 'fs';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import type { KioskDb } from '../db/index.js';
import { employees } from '../db/schema.js';
import { LANGUAGES, ROLES } from '../models/employee.js';

const EmployeeSeedSchema = z.object({
  card_id: z.string().trim().min(1),
  login_name: z.string().trim().min(1).optional(),
  first_name: z.string().trim().min(1),
  last_name: z.string().trim().min(1),
  role: z.enum(ROLES).default('worker'),
  department: z.string().optional(),
  language: z.enum(LANGUAGES).default('de'),
  active: z.boolean().default(true),
  permissions: z.array(z.string().min(1)).default([]),
});

export type EmployeeSeed = z.infer<typeof EmployeeSeedSchema>;

export interface SeedLoadResult {
  employees: EmployeeSeed[];
  errors: Array<{ entry: number; error: string }>;
}

/**
 * Parse an employee seed file:
 *
 *   employees:
 *     - card_id: "0004211337"
 *       first_name: Jo
 *       last_name: Example
 *       role: supervisor
 *
 * Bad entries are reported and skipped; the rest still load.
 */
export function loadEmployeeSeed(filePath: string): SeedLoadResult {
  const result: SeedLoadResult = { employees: [], errors: [] };

  const parsed: unknown = parseYaml(readFileSync(filePath, 'utf-8'));
  const list = z.object({ employees: z.array(z.unknown()).default([]) }).safeParse(parsed ?? {});
  if (!list.success) {
    result.errors.push({ entry: -1, error: 'Seed file must contain an "employees" list' });
    return result;
  }

  list.data.employees.forEach((entry, index) => {
    const employee = EmployeeSeedSchema.safeParse(entry);
    if (employee.success) {
      result.employees.push(employee.data);
    } else {
      result.errors.push({
        entry: index,
        error: employee.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '),
      });
    }
  });

  return result;
}

/**
 * Insert or update by card id. Returns the number of rows written.
 */
export function upsertEmployees(db: KioskDb, seeds: EmployeeSeed[]): number {
  const now = new Date().toISOString();
  let written = 0;

  for (const seed of seeds) {
    const values = {
      cardId: seed.card_id,
      loginName: seed.login_name ?? null,
      firstName: seed.first_name,
      lastName: seed.last_name,
      role: seed.role,
      department: seed.department ?? null,
      language: seed.language,
      active: seed.active,
      permissions: seed.permissions.length > 0 ? JSON.stringify(seed.permissions) : null,
      updatedAt: now,
    };

    db.insert(employees)
      .values({ ...values, createdAt: now })
      .onConflictDoUpdate({ target: employees.cardId, set: values })
      .run();
    written++;
  }

  return written;
}

/**
 * Load a seed file and upsert every valid entry.
 */
export function seedEmployees(db: KioskDb, filePath: string): { imported: number; errors: SeedLoadResult['errors'] } {
  const { employees: seeds, errors } = loadEmployeeSeed(filePath);
  return { imported: upsertEmployees(db, seeds), errors };
}
