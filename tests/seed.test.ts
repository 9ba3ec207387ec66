import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, writeFileSync, rmSync, existsSync } from 'fs';
import { join } from 'path';
import { IN_MEMORY, openDatabase } from '../src/db/index.js';
import { loadEmployeeSeed, seedEmployees } from '../src/directory/index.js';

const TEST_DIR = join(process.cwd(), 'tests', 'fixtures', 'seed');
const SEED_FILE = join(TEST_DIR, 'employees.yaml');

describe('loadEmployeeSeed', () => {
  beforeEach(() => {
    if (existsSync(TEST_DIR)) {
      rmSync(TEST_DIR, { recursive: true });
    }
    mkdirSync(TEST_DIR, { recursive: true });
  });

  afterEach(() => {
    if (existsSync(TEST_DIR)) {
      rmSync(TEST_DIR, { recursive: true });
    }
  });

  it('should load entries and apply defaults', () => {
    writeFileSync(
      SEED_FILE,
      `employees:
  - card_id: "0001000003"
    first_name: Robin
    last_name: Picker
  - card_id: "0001000002"
    login_name: sam.lead
    first_name: Sam
    last_name: Lead
    role: supervisor
    language: en
    permissions: [view_reports]
`
    );

    const result = loadEmployeeSeed(SEED_FILE);

    expect(result.errors).toEqual([]);
    expect(result.employees).toEqual([
      {
        card_id: '0001000003',
        first_name: 'Robin',
        last_name: 'Picker',
        role: 'worker',
        language: 'de',
        active: true,
        permissions: [],
      },
      {
        card_id: '0001000002',
        login_name: 'sam.lead',
        first_name: 'Sam',
        last_name: 'Lead',
        role: 'supervisor',
        language: 'en',
        active: true,
        permissions: ['view_reports'],
      },
    ]);
  });

  it('should report invalid entries and keep the valid ones', () => {
    writeFileSync(
      SEED_FILE,
      `employees:
  - card_id: "0001000003"
    first_name: Robin
    last_name: Picker
  - first_name: Missing
    last_name: Card
  - card_id: "0001000005"
    first_name: Noor
    last_name: Boss
    role: chief
`
    );

    const result = loadEmployeeSeed(SEED_FILE);

    expect(result.employees.map((e) => e.card_id)).toEqual(['0001000003']);
    expect(result.errors).toHaveLength(2);
    expect(result.errors[0]).toEqual({ entry: 1, error: 'card_id: Required' });
    expect(result.errors[1]?.entry).toBe(2);
    expect(result.errors[1]?.error.startsWith('role: ')).toBe(true);
  });

  it('should reject a file without an employees list', () => {
    writeFileSync(SEED_FILE, 'employees: nobody\n');

    expect(loadEmployeeSeed(SEED_FILE)).toEqual({
      employees: [],
      errors: [{ entry: -1, error: 'Seed file must contain an "employees" list' }],
    });
  });

  it('should treat an empty file as no employees', () => {
    writeFileSync(SEED_FILE, '');

    expect(loadEmployeeSeed(SEED_FILE)).toEqual({ employees: [], errors: [] });
  });

  it('should throw for a missing file', () => {
    expect(() => loadEmployeeSeed(join(TEST_DIR, 'absent.yaml'))).toThrow();
  });

  it('should import valid entries into the database', () => {
    writeFileSync(
      SEED_FILE,
      `employees:
  - card_id: "0001000003"
    first_name: Robin
    last_name: Picker
  - first_name: Missing
    last_name: Card
`
    );
    const database = openDatabase(IN_MEMORY);

    const result = seedEmployees(database.db, SEED_FILE);
    const count = database.sqlite.prepare('SELECT COUNT(*) AS n FROM employees').get();

    expect(result).toEqual({ imported: 1, errors: [{ entry: 1, error: 'card_id: Required' }] });
    expect(count).toEqual({ n: 1 });
    database.close();
  });
});
