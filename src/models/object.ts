import { pgTable, serial, varchar, text, numeric, smallint, integer, timestamp, uuid, index, check } from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';
import { companies } from './company';
import { OBJECT_TYPES, OBJECT_STATUSES, CITIES } from './choices';

export const objects = pgTable('objects', {
  id: serial('id').primaryKey(),
  name: varchar('name', { length: 200 }).notNull(),
  objectType: varchar('object_type', { length: 20, enum: OBJECT_TYPES }).notNull().default('warehouse'),
  status: varchar('status', { length: 10, enum: OBJECT_STATUSES }).notNull().default('active'),
  city: varchar('city', { length: 15, enum: CITIES }).notNull().default('spb'),
  address: varchar('address', { length: 100 }).notNull(),
  latitude: numeric('latitude', { precision: 9, scale: 6 }),
  longitude: numeric('longitude', { precision: 9, scale: 6 }),
  ownerId: integer('owner_id').notNull().references(() => companies.id, { onDelete: 'cascade' }),
  totalArea: numeric('total_area', { precision: 10, scale: 2 }).notNull(),
  floors: smallint('floors'),
  buildYear: integer('build_year'),
  description: text('description'),
  createdAt: timestamp('created_at').notNull().defaultNow(),
  updatedAt: timestamp('updated_at').notNull().defaultNow(),
}, (table) => ({
  ownerIdx: index('objects_owner_idx').on(table.ownerId),
  totalAreaCheck: check('objects_total_area_positive', sql`${table.totalArea} > 0`),
  floorsCheck: check('objects_floors_min', sql`${table.floors} IS NULL OR ${table.floors} >= 1`),
  latitudeCheck: check('objects_latitude_range', sql`${table.latitude} IS NULL OR ${table.latitude} BETWEEN -90 AND 90`),
  longitudeCheck: check('objects_longitude_range', sql`${table.longitude} IS NULL OR ${table.longitude} BETWEEN -180 AND 180`),
}));

export const objectImages = pgTable('object_images', {
  id: uuid('id').primaryKey().defaultRandom(),
  objectId: integer('object_id').notNull().references(() => objects.id, { onDelete: 'cascade' }),
  image: varchar('image', { length: 255 }).notNull(),
  caption: varchar('caption', { length: 200 }).notNull().default(''),
  order: integer('order').notNull().default(0),
  uploadedAt: timestamp('uploaded_at').notNull().defaultNow(),
}, (table) => ({
  objectOrderIdx: index('object_images_object_order_idx').on(table.objectId, table.order, table.uploadedAt),
}));

export type RealEstateObject = typeof objects.$inferSelect;
export type ObjectImage = typeof objectImages.$inferSelect;
