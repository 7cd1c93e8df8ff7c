import { Response } from 'express';
import { z } from 'zod';
import { asc, count, desc, eq, sql } from 'drizzle-orm';
import { db } from '../config/database';
import { companies, contacts } from '../models/company';
import { objects } from '../models/object';
import { auditService } from '../services/auditService';
import { buildStorageName, storage } from '../services/storageService';
import { handleControllerError } from '../utils/httpErrors';
import { decodeImageUpload, imageUploadSchema } from '../utils/upload';
import { listQuerySchema, pageOffset, parseId, searchCondition } from '../utils/validation';
import { serializeCompany, serializeContact } from '../utils/serializers';
import type { AuthRequest } from '../types';

const companySchema = z.object({
  name: z.string().trim().min(1, 'Name is required').max(200),
  description: z.string().optional().default(''),
  website: z.union([z.string().url('Invalid website URL').max(200), z.literal('')]).optional().default(''),
});

const contactsCount = sql<number>`(SELECT COUNT(*) FROM ${contacts} WHERE ${contacts.companyId} = ${companies.id})`.mapWith(Number);
const objectsCount = sql<number>`(SELECT COUNT(*) FROM ${objects} WHERE ${objects.ownerId} = ${companies.id})`.mapWith(Number);

export const getCompanies = async (req: AuthRequest, res: Response) => {
  try {
    const { page, limit, q } = listQuerySchema.parse(req.query);
    const where = searchCondition(q, [companies.name, companies.description]);

    const [rows, [{ total }]] = await Promise.all([
      db.select({ company: companies, contactsCount, objectsCount })
        .from(companies)
        .where(where)
        .orderBy(asc(companies.name), asc(companies.id))
        .limit(limit)
        .offset(pageOffset(page, limit)),
      db.select({ total: count() }).from(companies).where(where),
    ]);

    const data = rows.map(row => ({
      ...serializeCompany(row.company),
      contactsCount: row.contactsCount,
      objectsCount: row.objectsCount,
    }));

    res.json({ data, page, limit, total, hasMore: page * limit < total });
  } catch (error) {
    handleControllerError(res, error, 'Failed to fetch companies');
  }
};

export const getCompanyById = async (req: AuthRequest, res: Response) => {
  try {
    const id = parseId(req.params.id, 'company');

    const [row] = await db.select({ company: companies, objectsCount })
      .from(companies)
      .where(eq(companies.id, id))
      .limit(1);

    if (!row) {
      return res.status(404).json({ message: 'Company not found' });
    }

    const companyContacts = await db.select()
      .from(contacts)
      .where(eq(contacts.companyId, id))
      .orderBy(desc(contacts.isPrimary), asc(contacts.lastName), asc(contacts.id));

    res.json({
      ...serializeCompany(row.company),
      objectsCount: row.objectsCount,
      contacts: companyContacts.map(serializeContact),
    });
  } catch (error) {
    handleControllerError(res, error, 'Failed to fetch company');
  }
};

export const createCompany = async (req: AuthRequest, res: Response) => {
  try {
    const data = companySchema.parse(req.body);

    const [company] = await db.insert(companies).values(data).returning();

    await auditService.log(req.user?.userId, 'company_create', 'company', company.id, { name: company.name });

    res.status(201).json(serializeCompany(company));
  } catch (error) {
    handleControllerError(res, error, 'Failed to create company');
  }
};

export const updateCompany = async (req: AuthRequest, res: Response) => {
  try {
    const id = parseId(req.params.id, 'company');
    const data = companySchema.partial().parse(req.body);

    if (Object.keys(data).length === 0) {
      return res.status(400).json({ message: 'No changes provided' });
    }

    const [company] = await db.update(companies).set(data).where(eq(companies.id, id)).returning();

    if (!company) {
      return res.status(404).json({ message: 'Company not found' });
    }

    await auditService.log(req.user?.userId, 'company_update', 'company', id, { fields: Object.keys(data) });

    res.json(serializeCompany(company));
  } catch (error) {
    handleControllerError(res, error, 'Failed to update company');
  }
};

export const deleteCompany = async (req: AuthRequest, res: Response) => {
  try {
    const id = parseId(req.params.id, 'company');

    // Contacts, agents, objects and everything under them go with the company.
    const deleted = await db.delete(companies).where(eq(companies.id, id)).returning({ id: companies.id, name: companies.name });

    if (deleted.length === 0) {
      return res.status(404).json({ message: 'Company not found' });
    }

    await auditService.log(req.user?.userId, 'company_delete', 'company', id, { name: deleted[0].name });

    res.json({ success: true });
  } catch (error) {
    handleControllerError(res, error, 'Failed to delete company');
  }
};

export const uploadCompanyLogo = async (req: AuthRequest, res: Response) => {
  try {
    const id = parseId(req.params.id, 'company');
    const upload = decodeImageUpload(imageUploadSchema.parse(req.body));

    const [existing] = await db.select({ id: companies.id }).from(companies).where(eq(companies.id, id)).limit(1);
    if (!existing) {
      return res.status(404).json({ message: 'Company not found' });
    }

    const logo = await storage.save(buildStorageName('company_logos', upload.fileName), upload.body, upload.contentType);
    const [company] = await db.update(companies).set({ logo }).where(eq(companies.id, id)).returning();

    await auditService.log(req.user?.userId, 'company_logo_upload', 'company', id, { logo });

    res.json(serializeCompany(company));
  } catch (error) {
    handleControllerError(res, error, 'Failed to upload logo');
  }
};

export const removeCompanyLogo = async (req: AuthRequest, res: Response) => {
  try {
    const id = parseId(req.params.id, 'company');

    const [existing] = await db.select().from(companies).where(eq(companies.id, id)).limit(1);
    if (!existing) {
      return res.status(404).json({ message: 'Company not found' });
    }

    const [company] = await db.update(companies).set({ logo: null }).where(eq(companies.id, id)).returning();
    if (existing.logo) {
      await storage.delete(existing.logo);
    }

    await auditService.log(req.user?.userId, 'company_logo_delete', 'company', id);

    res.json(serializeCompany(company));
  } catch (error) {
    handleControllerError(res, error, 'Failed to remove logo');
  }
};
