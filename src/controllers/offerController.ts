import { Response } from 'express';
import { z } from 'zod';
import { and, asc, count, desc, eq } from 'drizzle-orm';
import { db, type Database } from '../config/database';
import { contacts } from '../models/company';
import { objects } from '../models/object';
import { offers } from '../models/offer';
import { FLOOR_TYPES, OFFER_TYPES, UTILITY_TYPES, VACANCY_TYPES } from '../models/choices';
import { auditService } from '../services/auditService';
import { buildStorageName, storage } from '../services/storageService';
import { HttpError, handleControllerError } from '../utils/httpErrors';
import { decodeImageUpload, imageUploadSchema } from '../utils/upload';
import { booleanQuery, decimal, idQuery, listQuerySchema, pageOffset, parseId, searchCondition, toDecimalString } from '../utils/validation';
import { contactDisplayName, serializeOffer } from '../utils/serializers';
import type { AuthRequest } from '../types';

const area = () => decimal(z.number().min(0, 'Areas cannot be negative').lt(100_000_000, 'Area is too large')).optional().default(0);
const measurement = (max: number) => decimal(z.number().min(0, 'Value cannot be negative').lt(max, 'Value is too large')).optional().default(0);

export const offerSchema = z.object({
  objectId: z.number().int().positive(),
  vacancyType: z.enum(VACANCY_TYPES),
  offerType: z.enum(OFFER_TYPES).optional().default('lease'),
  parentOfferId: z.number().int().positive().nullable().optional(),
  title: z.string().trim().min(1, 'Title is required').max(200),
  contactPersonId: z.number().int().positive().nullable().optional(),

  whsArea: area(),
  mezArea: area(),
  officeArea: area(),
  techArea: area(),

  salePrice: decimal(z.number().min(0, 'Price cannot be negative').lt(10_000_000_000_000, 'Price is too large')).nullable().optional(),
  leasePricePerSqm: decimal(z.number().min(0, 'Rate cannot be negative').lt(100_000_000, 'Rate is too large')).nullable().optional(),
  currency: z.string().trim().regex(/^[A-Z]{3}$/, 'Currency must be a 3-letter code').optional().default('RUB'),

  isAvailable: z.boolean().optional().default(true),
  availableFrom: z.string().date('Invalid date').optional(),

  height: measurement(10_000),
  columnGrid: z.string().max(50).optional().default(''),
  floorLoad: measurement(10_000),
  floorType: z.union([z.enum(FLOOR_TYPES), z.literal('')]).optional().default(''),
  docksAmount: z.number().int().min(0, 'Docks amount cannot be negative').max(2_147_483_647, 'Docks amount is too large').optional().default(0),

  fireAlarm: z.boolean().optional().default(true),
  sprinklerSystem: z.boolean().optional().default(true),
  smokeRemove: z.boolean().optional().default(true),
  hydrants: z.boolean().optional().default(false),
  specialFireSystem: z.boolean().optional().default(false),

  ventilation: z.boolean().optional().default(false),
  electricity: measurement(1_000_000),
  water: z.enum(UTILITY_TYPES).optional().default('municipal'),
  heating: z.enum(UTILITY_TYPES).optional().default('municipal'),
  sew: z.enum(UTILITY_TYPES).optional().default('municipal'),

  description: z.string().optional().default(''),
});

type OfferInput = z.infer<typeof offerSchema>;

const offerFiltersSchema = listQuerySchema.extend({
  vacancyType: z.enum(VACANCY_TYPES).optional(),
  offerType: z.enum(OFFER_TYPES).optional(),
  isAvailable: booleanQuery.optional(),
  objectId: idQuery.optional(),
});

const MAX_NESTING = 100;

const requiredDecimal = (value: number | undefined) => (value === undefined ? undefined : value.toString());

const toOfferValues = <T extends Partial<OfferInput>>({
  whsArea, mezArea, officeArea, techArea, salePrice, leasePricePerSqm, height, floorLoad, electricity, ...rest
}: T) => ({
  ...rest,
  whsArea: requiredDecimal(whsArea),
  mezArea: requiredDecimal(mezArea),
  officeArea: requiredDecimal(officeArea),
  techArea: requiredDecimal(techArea),
  salePrice: toDecimalString(salePrice),
  leasePricePerSqm: toDecimalString(leasePricePerSqm),
  height: requiredDecimal(height),
  floorLoad: requiredDecimal(floorLoad),
  electricity: requiredDecimal(electricity),
});

/**
 * Sub-divided listings: the parent has to live on the same object, and
 * following parents upwards from it must never reach the offer itself.
 */
export const assertValidParent = async (
  executor: Pick<Database, 'select'>,
  offerId: number | null,
  objectId: number,
  parentOfferId: number,
) => {
  if (offerId !== null && parentOfferId === offerId) {
    throw new HttpError(400, 'An offer cannot be its own parent');
  }

  let currentId: number | null = parentOfferId;
  for (let depth = 0; currentId !== null; depth++) {
    if (depth >= MAX_NESTING) {
      throw new HttpError(400, 'Offer nesting is too deep');
    }

    const [current] = await executor
      .select({ id: offers.id, objectId: offers.objectId, parentOfferId: offers.parentOfferId })
      .from(offers)
      .where(eq(offers.id, currentId))
      .limit(1);

    if (!current) {
      throw new HttpError(400, 'Parent offer does not exist');
    }
    if (depth === 0 && current.objectId !== objectId) {
      throw new HttpError(400, 'Parent offer must belong to the same object');
    }
    if (offerId !== null && current.parentOfferId === offerId) {
      throw new HttpError(400, 'Offer cannot be nested under its own sub-offer');
    }

    currentId = current.parentOfferId;
  }
};

export const getOffers = async (req: AuthRequest, res: Response) => {
  try {
    const { page, limit, q, vacancyType, offerType, isAvailable, objectId } = offerFiltersSchema.parse(req.query);

    const where = and(
      vacancyType === undefined ? undefined : eq(offers.vacancyType, vacancyType),
      offerType === undefined ? undefined : eq(offers.offerType, offerType),
      isAvailable === undefined ? undefined : eq(offers.isAvailable, isAvailable),
      objectId === undefined ? undefined : eq(offers.objectId, objectId),
      searchCondition(q, [offers.title, objects.name]),
    );

    const [rows, [{ total }]] = await Promise.all([
      db.select({ offer: offers, objectName: objects.name })
        .from(offers)
        .innerJoin(objects, eq(offers.objectId, objects.id))
        .where(where)
        .orderBy(desc(offers.createdAt), desc(offers.id))
        .limit(limit)
        .offset(pageOffset(page, limit)),
      db.select({ total: count() })
        .from(offers)
        .innerJoin(objects, eq(offers.objectId, objects.id))
        .where(where),
    ]);

    const data = rows.map(row => ({ ...serializeOffer(row.offer, row.objectName), objectName: row.objectName }));

    res.json({ data, page, limit, total, hasMore: page * limit < total });
  } catch (error) {
    handleControllerError(res, error, 'Failed to fetch offers');
  }
};

export const getOfferById = async (req: AuthRequest, res: Response) => {
  try {
    const id = parseId(req.params.id, 'offer');

    const [row] = await db.select({ offer: offers, objectName: objects.name, contact: contacts })
      .from(offers)
      .innerJoin(objects, eq(offers.objectId, objects.id))
      .leftJoin(contacts, eq(offers.contactPersonId, contacts.id))
      .where(eq(offers.id, id))
      .limit(1);

    if (!row) {
      return res.status(404).json({ message: 'Offer not found' });
    }

    const children = await db.select()
      .from(offers)
      .where(eq(offers.parentOfferId, id))
      .orderBy(asc(offers.createdAt), asc(offers.id));

    res.json({
      ...serializeOffer(row.offer, row.objectName),
      objectName: row.objectName,
      contactPerson: row.contact
        ? { id: row.contact.id, displayName: contactDisplayName(row.contact), email: row.contact.email, phone: row.contact.phone }
        : null,
      childOffers: children.map(child => serializeOffer(child, row.objectName)),
    });
  } catch (error) {
    handleControllerError(res, error, 'Failed to fetch offer');
  }
};

export const createOffer = async (req: AuthRequest, res: Response) => {
  try {
    const data = offerSchema.parse(req.body);

    const offer = await db.transaction(async (tx) => {
      if (data.parentOfferId) {
        await assertValidParent(tx, null, data.objectId, data.parentOfferId);
      }
      const [created] = await tx.insert(offers).values(toOfferValues(data)).returning();
      return created;
    });

    await auditService.log(req.user?.userId, 'offer_create', 'offer', offer.id, { objectId: offer.objectId });

    res.status(201).json(serializeOffer(offer));
  } catch (error) {
    handleControllerError(res, error, 'Failed to create offer');
  }
};

export const updateOffer = async (req: AuthRequest, res: Response) => {
  try {
    const id = parseId(req.params.id, 'offer');
    const data = offerSchema.partial().parse(req.body);
    const values = toOfferValues(data);
    const fields = Object.entries(values).filter(([, value]) => value !== undefined).map(([key]) => key);

    if (fields.length === 0) {
      return res.status(400).json({ message: 'No changes provided' });
    }

    const offer = await db.transaction(async (tx) => {
      const [existing] = await tx.select().from(offers).where(eq(offers.id, id)).limit(1);
      if (!existing) {
        throw new HttpError(404, 'Offer not found');
      }

      if (data.objectId !== undefined && data.objectId !== existing.objectId) {
        const [child] = await tx.select({ id: offers.id }).from(offers).where(eq(offers.parentOfferId, id)).limit(1);
        if (child) {
          throw new HttpError(400, 'Offer with sub-offers cannot move to another object');
        }
      }

      const parentOfferId = data.parentOfferId === undefined ? existing.parentOfferId : data.parentOfferId;
      if (parentOfferId) {
        await assertValidParent(tx, id, data.objectId ?? existing.objectId, parentOfferId);
      }

      const [updated] = await tx
        .update(offers)
        .set({ ...values, updatedAt: new Date() })
        .where(eq(offers.id, id))
        .returning();
      return updated;
    });

    await auditService.log(req.user?.userId, 'offer_update', 'offer', id, { fields });

    res.json(serializeOffer(offer));
  } catch (error) {
    handleControllerError(res, error, 'Failed to update offer');
  }
};

export const deleteOffer = async (req: AuthRequest, res: Response) => {
  try {
    const id = parseId(req.params.id, 'offer');

    // Sub-offers are removed by the parent_offer_id cascade.
    const deleted = await db.delete(offers).where(eq(offers.id, id)).returning({ id: offers.id });

    if (deleted.length === 0) {
      return res.status(404).json({ message: 'Offer not found' });
    }

    await auditService.log(req.user?.userId, 'offer_delete', 'offer', id);

    res.json({ success: true });
  } catch (error) {
    handleControllerError(res, error, 'Failed to delete offer');
  }
};

export const uploadOfferFloorplan = async (req: AuthRequest, res: Response) => {
  try {
    const id = parseId(req.params.id, 'offer');
    const upload = decodeImageUpload(imageUploadSchema.parse(req.body));

    const [existing] = await db.select({ id: offers.id }).from(offers).where(eq(offers.id, id)).limit(1);
    if (!existing) {
      return res.status(404).json({ message: 'Offer not found' });
    }

    const floorplanImage = await storage.save(buildStorageName('floorplans', upload.fileName), upload.body, upload.contentType);
    const [offer] = await db
      .update(offers)
      .set({ floorplanImage, updatedAt: new Date() })
      .where(eq(offers.id, id))
      .returning();

    await auditService.log(req.user?.userId, 'offer_floorplan_upload', 'offer', id, { floorplanImage });

    res.json(serializeOffer(offer));
  } catch (error) {
    handleControllerError(res, error, 'Failed to upload floorplan');
  }
};
