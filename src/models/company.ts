import { pgTable, serial, varchar, text, boolean, timestamp, integer, index, uniqueIndex } from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';
import { users } from './user';

export const companies = pgTable('companies', {
  id: serial('id').primaryKey(),
  name: varchar('name', { length: 200 }).notNull(),
  description: text('description').notNull().default(''),
  logo: varchar('logo', { length: 255 }),
  website: varchar('website', { length: 200 }).notNull().default(''),
  createdAt: timestamp('created_at').notNull().defaultNow(),
});

export const contacts = pgTable('contacts', {
  id: serial('id').primaryKey(),
  companyId: integer('company_id').notNull().references(() => companies.id, { onDelete: 'cascade' }),
  userId: integer('user_id').unique().references(() => users.id, { onDelete: 'cascade' }),
  firstName: varchar('first_name', { length: 100 }).notNull(),
  lastName: varchar('last_name', { length: 100 }).notNull(),
  email: varchar('email', { length: 254 }).notNull(),
  phone: varchar('phone', { length: 20 }).notNull().default(''),
  isPrimary: boolean('is_primary').notNull().default(false),
  telegramChatId: varchar('telegram_chat_id', { length: 50 }).notNull().default(''),
}, (table) => ({
  companyIdx: index('contacts_company_idx').on(table.companyId),
  uniquePrimaryIdx: uniqueIndex('contacts_unique_primary_idx').on(table.companyId).where(sql`${table.isPrimary} = true`),
}));

export const agents = pgTable('agents', {
  id: serial('id').primaryKey(),
  userId: integer('user_id').notNull().unique().references(() => users.id, { onDelete: 'cascade' }),
  companyId: integer('company_id').notNull().references(() => companies.id, { onDelete: 'cascade' }),
  telegramChatId: varchar('telegram_chat_id', { length: 50 }).notNull().default(''),
  isActive: boolean('is_active').notNull().default(true),
}, (table) => ({
  companyIdx: index('agents_company_idx').on(table.companyId),
}));

export type Company = typeof companies.$inferSelect;
export type Contact = typeof contacts.$inferSelect;
export type Agent = typeof agents.$inferSelect;
