import { sqliteTable, text, integer, index } from 'drizzle-orm/sqlite-core';

export const employees = sqliteTable(
  'employees',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    cardId: text('card_id').notNull().unique(),
    loginName: text('login_name').unique(),
    firstName: text('first_name').notNull(),
    lastName: text('last_name').notNull(),
    role: text('role').notNull().default('worker'),
    department: text('department'),
    language: text('language').notNull().default('de'),
    active: integer('is_active', { mode: 'boolean' }).notNull().default(true),
    permissions: text('permissions'), // JSON array, null = role defaults
    lastLogin: text('last_login'),
    loginCount: integer('login_count').notNull().default(0),
    createdAt: text('created_at')
      .notNull()
      .$defaultFn(() => new Date().toISOString()),
    updatedAt: text('updated_at')
      .notNull()
      .$defaultFn(() => new Date().toISOString()),
  },
  (table) => ({
    activeIdx: index('idx_employees_active').on(table.active),
  })
);

export const timeTracking = sqliteTable(
  'time_tracking',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    employeeId: integer('employee_id')
      .notNull()
      .references(() => employees.id, { onDelete: 'cascade' }),
    station: text('station').notNull(),
    clockIn: text('clock_in').notNull(),
    clockOut: text('clock_out'),
  },
  (table) => ({
    employeeIdx: index('idx_time_employee').on(table.employeeId),
    clockInIdx: index('idx_time_clock_in').on(table.clockIn),
  })
);

export type InsertEmployee = typeof employees.$inferInsert;
export type SelectEmployee = typeof employees.$inferSelect;
export type InsertTimeTracking = typeof timeTracking.$inferInsert;
export type SelectTimeTracking = typeof timeTracking.$inferSelect;
