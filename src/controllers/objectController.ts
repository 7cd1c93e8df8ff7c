import { Response } from 'express';
import { z } from 'zod';
import { and, asc, count, desc, eq, sql } from 'drizzle-orm';
import { db } from '../config/database';
import { companies } from '../models/company';
import { objects, objectImages } from '../models/object';
import { offers } from '../models/offer';
import { CITIES, OBJECT_STATUSES, OBJECT_TYPES } from '../models/choices';
import { auditService } from '../services/auditService';
import { handleControllerError } from '../utils/httpErrors';
import { decimal, idQuery, listQuerySchema, pageOffset, parseId, searchCondition, toDecimalString } from '../utils/validation';
import { serializeImage, serializeObject, serializeOffer } from '../utils/serializers';
import type { AuthRequest } from '../types';

export const objectSchema = z.object({
  name: z.string().trim().min(1, 'Name is required').max(200),
  objectType: z.enum(OBJECT_TYPES).optional().default('warehouse'),
  status: z.enum(OBJECT_STATUSES).optional().default('active'),
  city: z.enum(CITIES).optional().default('spb'),
  address: z.string().trim().min(1, 'Address is required').max(100),
  latitude: decimal(z.number().min(-90, 'Latitude must be between -90 and 90').max(90, 'Latitude must be between -90 and 90'), 6).nullable().optional(),
  longitude: decimal(z.number().min(-180, 'Longitude must be between -180 and 180').max(180, 'Longitude must be between -180 and 180'), 6).nullable().optional(),
  ownerId: z.number().int().positive(),
  totalArea: decimal(z.number().gt(0, 'Total area must be greater than 0').lt(100_000_000, 'Total area is too large')),
  floors: z.number().int().min(1, 'Floors must be at least 1').max(32767).nullable().optional(),
  buildYear: z.number().int().min(1800, 'Build year looks wrong').max(2100, 'Build year looks wrong').nullable().optional(),
  description: z.string().nullable().optional(),
});

const objectFiltersSchema = listQuerySchema.extend({
  objectType: z.enum(OBJECT_TYPES).optional(),
  city: z.enum(CITIES).optional(),
  status: z.enum(OBJECT_STATUSES).optional(),
  ownerId: idQuery.optional(),
});

const activeOffersCount = sql<number>`(SELECT COUNT(*) FROM ${offers} WHERE ${offers.objectId} = ${objects.id} AND ${offers.isAvailable} = true)`.mapWith(Number);

export const getObjects = async (req: AuthRequest, res: Response) => {
  try {
    const { page, limit, q, objectType, city, status, ownerId } = objectFiltersSchema.parse(req.query);

    const where = and(
      objectType === undefined ? undefined : eq(objects.objectType, objectType),
      city === undefined ? undefined : eq(objects.city, city),
      status === undefined ? undefined : eq(objects.status, status),
      ownerId === undefined ? undefined : eq(objects.ownerId, ownerId),
      searchCondition(q, [objects.name, objects.address, objects.city]),
    );

    const [rows, [{ total }]] = await Promise.all([
      db.select({ object: objects, ownerName: companies.name, activeOffersCount })
        .from(objects)
        .innerJoin(companies, eq(objects.ownerId, companies.id))
        .where(where)
        .orderBy(desc(objects.createdAt), desc(objects.id))
        .limit(limit)
        .offset(pageOffset(page, limit)),
      db.select({ total: count() }).from(objects).where(where),
    ]);

    const data = rows.map(row => ({
      ...serializeObject(row.object),
      ownerName: row.ownerName,
      activeOffersCount: row.activeOffersCount,
    }));

    res.json({ data, page, limit, total, hasMore: page * limit < total });
  } catch (error) {
    handleControllerError(res, error, 'Failed to fetch objects');
  }
};

export const getObjectById = async (req: AuthRequest, res: Response) => {
  try {
    const id = parseId(req.params.id, 'object');

    const [row] = await db.select({ object: objects, ownerName: companies.name, activeOffersCount })
      .from(objects)
      .innerJoin(companies, eq(objects.ownerId, companies.id))
      .where(eq(objects.id, id))
      .limit(1);

    if (!row) {
      return res.status(404).json({ message: 'Object not found' });
    }

    const [images, objectOffers] = await Promise.all([
      db.select().from(objectImages)
        .where(eq(objectImages.objectId, id))
        .orderBy(asc(objectImages.order), asc(objectImages.uploadedAt)),
      db.select().from(offers)
        .where(eq(offers.objectId, id))
        .orderBy(desc(offers.createdAt), desc(offers.id)),
    ]);

    res.json({
      ...serializeObject(row.object),
      ownerName: row.ownerName,
      activeOffersCount: row.activeOffersCount,
      images: images.map(serializeImage),
      offers: objectOffers.map(offer => serializeOffer(offer)),
    });
  } catch (error) {
    handleControllerError(res, error, 'Failed to fetch object');
  }
};

export const createObject = async (req: AuthRequest, res: Response) => {
  try {
    const { latitude, longitude, totalArea, ...data } = objectSchema.parse(req.body);

    const [object] = await db.insert(objects).values({
      ...data,
      latitude: toDecimalString(latitude),
      longitude: toDecimalString(longitude),
      totalArea: toDecimalString(totalArea),
    }).returning();

    await auditService.log(req.user?.userId, 'object_create', 'object', object.id, { name: object.name });

    res.status(201).json(serializeObject(object));
  } catch (error) {
    handleControllerError(res, error, 'Failed to create object');
  }
};

export const updateObject = async (req: AuthRequest, res: Response) => {
  try {
    const id = parseId(req.params.id, 'object');
    const { latitude, longitude, totalArea, ...data } = objectSchema.partial().parse(req.body);

    const changes = {
      ...data,
      latitude: toDecimalString(latitude),
      longitude: toDecimalString(longitude),
      totalArea: totalArea === undefined ? undefined : toDecimalString(totalArea),
    };
    const fields = Object.entries(changes).filter(([, value]) => value !== undefined).map(([key]) => key);

    if (fields.length === 0) {
      return res.status(400).json({ message: 'No changes provided' });
    }

    const [object] = await db
      .update(objects)
      .set({ ...changes, updatedAt: new Date() })
      .where(eq(objects.id, id))
      .returning();

    if (!object) {
      return res.status(404).json({ message: 'Object not found' });
    }

    await auditService.log(req.user?.userId, 'object_update', 'object', id, { fields });

    res.json(serializeObject(object));
  } catch (error) {
    handleControllerError(res, error, 'Failed to update object');
  }
};

export const deleteObject = async (req: AuthRequest, res: Response) => {
  try {
    const id = parseId(req.params.id, 'object');

    const deleted = await db.delete(objects).where(eq(objects.id, id)).returning({ id: objects.id, name: objects.name });

    if (deleted.length === 0) {
      return res.status(404).json({ message: 'Object not found' });
    }

    await auditService.log(req.user?.userId, 'object_delete', 'object', id, { name: deleted[0].name });

    res.json({ success: true });
  } catch (error) {
    handleControllerError(res, error, 'Failed to delete object');
  }
};
