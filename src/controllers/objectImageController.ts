import { Response } from 'express';
import { z } from 'zod';
import { asc, count, eq } from 'drizzle-orm';
import { db } from '../config/database';
import { objects, objectImages, type ObjectImage } from '../models/object';
import { auditService } from '../services/auditService';
import { buildStorageName, storage } from '../services/storageService';
import { handleControllerError } from '../utils/httpErrors';
import { decodeImageUpload, imageUploadSchema } from '../utils/upload';
import { idQuery, listQuerySchema, pageOffset, parseId } from '../utils/validation';
import { serializeImage } from '../utils/serializers';
import type { AuthRequest } from '../types';

const imageFieldsSchema = z.object({
  caption: z.string().max(200, 'Caption is too long').optional(),
  order: z.number().int().min(-2_147_483_648, 'Order is out of range').max(2_147_483_647, 'Order is out of range').optional(),
});

const imageUploadWithFieldsSchema = imageUploadSchema.merge(imageFieldsSchema);

const bulkUpdateSchema = z.object({
  items: z
    .array(imageFieldsSchema.extend({ id: z.string().uuid('Invalid image ID') }))
    .min(1, 'No images to update')
    .max(100, 'Cannot update more than 100 images at once'),
});

const imageFiltersSchema = listQuerySchema.extend({
  objectId: idQuery.optional(),
});

const parseImageId = (value: string) => z.string().uuid('Invalid image ID').parse(value);

export const getImages = async (req: AuthRequest, res: Response) => {
  try {
    const { page, limit, objectId } = imageFiltersSchema.parse(req.query);
    const where = objectId === undefined ? undefined : eq(objectImages.objectId, objectId);

    const [rows, [{ total }]] = await Promise.all([
      db.select({ image: objectImages, objectName: objects.name })
        .from(objectImages)
        .innerJoin(objects, eq(objectImages.objectId, objects.id))
        .where(where)
        .orderBy(asc(objectImages.order), asc(objectImages.uploadedAt))
        .limit(limit)
        .offset(pageOffset(page, limit)),
      db.select({ total: count() }).from(objectImages).where(where),
    ]);

    const data = rows.map(row => ({ ...serializeImage(row.image), objectName: row.objectName }));

    res.json({ data, page, limit, total, hasMore: page * limit < total });
  } catch (error) {
    handleControllerError(res, error, 'Failed to fetch images');
  }
};

export const uploadObjectImage = async (req: AuthRequest, res: Response) => {
  try {
    const objectId = parseId(req.params.id, 'object');
    const { caption, order, ...payload } = imageUploadWithFieldsSchema.parse(req.body);
    const upload = decodeImageUpload(payload);

    const [object] = await db.select({ id: objects.id }).from(objects).where(eq(objects.id, objectId)).limit(1);
    if (!object) {
      return res.status(404).json({ message: 'Object not found' });
    }

    const name = await storage.save(buildStorageName('object_images', upload.fileName), upload.body, upload.contentType);
    const [image] = await db.insert(objectImages).values({
      objectId,
      image: name,
      caption,
      order,
    }).returning();

    await auditService.log(req.user?.userId, 'object_image_upload', 'object_image', image.id, { objectId, image: name });

    res.status(201).json(serializeImage(image));
  } catch (error) {
    handleControllerError(res, error, 'Failed to upload image');
  }
};

export const updateImage = async (req: AuthRequest, res: Response) => {
  try {
    const id = parseImageId(req.params.id);
    const data = imageFieldsSchema.parse(req.body);

    if (data.caption === undefined && data.order === undefined) {
      return res.status(400).json({ message: 'No changes provided' });
    }

    const [image] = await db.update(objectImages).set(data).where(eq(objectImages.id, id)).returning();

    if (!image) {
      return res.status(404).json({ message: 'Image not found' });
    }

    await auditService.log(req.user?.userId, 'object_image_update', 'object_image', id, { fields: Object.keys(data) });

    res.json(serializeImage(image));
  } catch (error) {
    handleControllerError(res, error, 'Failed to update image');
  }
};

/** Saves caption/order edits made directly in the image list. */
export const bulkUpdateImages = async (req: AuthRequest, res: Response) => {
  try {
    const { items } = bulkUpdateSchema.parse(req.body);

    const updated = await db.transaction(async (tx) => {
      const results: ObjectImage[] = [];
      for (const { id, ...fields } of items) {
        if (fields.caption === undefined && fields.order === undefined) continue;
        const [image] = await tx.update(objectImages).set(fields).where(eq(objectImages.id, id)).returning();
        if (image) results.push(image);
      }
      return results;
    });

    await auditService.log(req.user?.userId, 'object_image_bulk_update', 'object_image', undefined, { ids: updated.map(image => image.id) });

    res.json({ data: updated.map(serializeImage), updated: updated.length });
  } catch (error) {
    handleControllerError(res, error, 'Failed to update images');
  }
};

export const deleteImage = async (req: AuthRequest, res: Response) => {
  try {
    const id = parseImageId(req.params.id);

    const deleted = await db.delete(objectImages).where(eq(objectImages.id, id)).returning();

    if (deleted.length === 0) {
      return res.status(404).json({ message: 'Image not found' });
    }

    await auditService.log(req.user?.userId, 'object_image_delete', 'object_image', id, { image: deleted[0].image });

    res.json({ success: true });
  } catch (error) {
    handleControllerError(res, error, 'Failed to delete image');
  }
};
