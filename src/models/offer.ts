import { pgTable, serial, varchar, text, numeric, integer, boolean, date, timestamp, index, check, type AnyPgColumn } from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';
import { objects } from './object';
import { contacts } from './company';
import { VACANCY_TYPES, OFFER_TYPES, UTILITY_TYPES } from './choices';

export const offers = pgTable('offers', {
  id: serial('id').primaryKey(),
  objectId: integer('object_id').notNull().references(() => objects.id, { onDelete: 'cascade' }),
  vacancyType: varchar('vacancy_type', { length: 20, enum: VACANCY_TYPES }).notNull(),
  offerType: varchar('offer_type', { length: 10, enum: OFFER_TYPES }).notNull().default('lease'),
  parentOfferId: integer('parent_offer_id').references((): AnyPgColumn => offers.id, { onDelete: 'cascade' }),
  title: varchar('title', { length: 200 }).notNull(),
  contactPersonId: integer('contact_person_id').references(() => contacts.id, { onDelete: 'set null' }),

  // Areas, m²
  whsArea: numeric('whs_area', { precision: 10, scale: 2 }).notNull().default('0'),
  mezArea: numeric('mez_area', { precision: 10, scale: 2 }).notNull().default('0'),
  officeArea: numeric('office_area', { precision: 10, scale: 2 }).notNull().default('0'),
  techArea: numeric('tech_area', { precision: 10, scale: 2 }).notNull().default('0'),

  salePrice: numeric('sale_price', { precision: 15, scale: 2 }),
  leasePricePerSqm: numeric('lease_price_per_sqm', { precision: 10, scale: 2 }),
  currency: varchar('currency', { length: 3 }).notNull().default('RUB'),

  isAvailable: boolean('is_available').notNull().default(true),
  availableFrom: date('available_from').notNull().defaultNow(),

  height: numeric('height', { precision: 6, scale: 2 }).notNull().default('0'),
  columnGrid: varchar('column_grid', { length: 50 }).notNull().default(''),
  floorLoad: numeric('floor_load', { precision: 6, scale: 2 }).notNull().default('0'),
  // '' when not specified
  floorType: varchar('floor_type', { length: 20 }).notNull().default(''),
  docksAmount: integer('docks_amount').notNull().default(0),

  fireAlarm: boolean('fire_alarm').notNull().default(true),
  sprinklerSystem: boolean('sprinkler_system').notNull().default(true),
  smokeRemove: boolean('smoke_remove').notNull().default(true),
  hydrants: boolean('hydrants').notNull().default(false),
  specialFireSystem: boolean('special_fire_system').notNull().default(false),

  ventilation: boolean('ventilation').notNull().default(false),
  electricity: numeric('electricity', { precision: 8, scale: 2 }).notNull().default('0'),
  water: varchar('water', { length: 20, enum: UTILITY_TYPES }).notNull().default('municipal'),
  heating: varchar('heating', { length: 20, enum: UTILITY_TYPES }).notNull().default('municipal'),
  sew: varchar('sew', { length: 20, enum: UTILITY_TYPES }).notNull().default('municipal'),

  floorplanImage: varchar('floorplan_image', { length: 255 }),

  description: text('description').notNull().default(''),
  createdAt: timestamp('created_at').notNull().defaultNow(),
  updatedAt: timestamp('updated_at').notNull().defaultNow(),
}, (table) => ({
  objectIdx: index('offers_object_idx').on(table.objectId),
  parentIdx: index('offers_parent_idx').on(table.parentOfferId),
  areasCheck: check('offers_areas_non_negative', sql`${table.whsArea} >= 0 AND ${table.mezArea} >= 0 AND ${table.officeArea} >= 0 AND ${table.techArea} >= 0`),
  parentCheck: check('offers_parent_not_self', sql`${table.parentOfferId} IS NULL OR ${table.parentOfferId} <> ${table.id}`),
}));

export type Offer = typeof offers.$inferSelect;
