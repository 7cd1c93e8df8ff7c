import { Response } from 'express';
import { z } from 'zod';
import { and, asc, count, eq } from 'drizzle-orm';
import { db } from '../config/database';
import { companies, contacts } from '../models/company';
import { auditService } from '../services/auditService';
import { handleControllerError } from '../utils/httpErrors';
import { booleanQuery, idQuery, listQuerySchema, pageOffset, parseId, searchCondition } from '../utils/validation';
import { serializeContact } from '../utils/serializers';
import type { AuthRequest } from '../types';

const contactSchema = z.object({
  companyId: z.number().int().positive(),
  userId: z.number().int().positive().nullable().optional(),
  firstName: z.string().trim().min(1, 'First name is required').max(100),
  lastName: z.string().trim().min(1, 'Last name is required').max(100),
  email: z.string().email('Invalid email address').max(254),
  phone: z.string().max(20).optional().default(''),
  isPrimary: z.boolean().optional().default(false),
  telegramChatId: z.string().max(50).optional().default(''),
});

const contactFiltersSchema = listQuerySchema.extend({
  companyId: idQuery.optional(),
  isPrimary: booleanQuery.optional(),
});

export const getContacts = async (req: AuthRequest, res: Response) => {
  try {
    const { page, limit, q, companyId, isPrimary } = contactFiltersSchema.parse(req.query);

    const where = and(
      companyId === undefined ? undefined : eq(contacts.companyId, companyId),
      isPrimary === undefined ? undefined : eq(contacts.isPrimary, isPrimary),
      searchCondition(q, [contacts.firstName, contacts.lastName, contacts.email]),
    );

    const [rows, [{ total }]] = await Promise.all([
      db.select({ contact: contacts, companyName: companies.name })
        .from(contacts)
        .innerJoin(companies, eq(contacts.companyId, companies.id))
        .where(where)
        .orderBy(asc(companies.name), asc(contacts.companyId), asc(contacts.isPrimary), asc(contacts.lastName), asc(contacts.id))
        .limit(limit)
        .offset(pageOffset(page, limit)),
      db.select({ total: count() }).from(contacts).where(where),
    ]);

    const data = rows.map(row => ({ ...serializeContact(row.contact), companyName: row.companyName }));

    res.json({ data, page, limit, total, hasMore: page * limit < total });
  } catch (error) {
    handleControllerError(res, error, 'Failed to fetch contacts');
  }
};

export const getContactById = async (req: AuthRequest, res: Response) => {
  try {
    const id = parseId(req.params.id, 'contact');

    const [row] = await db.select({ contact: contacts, companyName: companies.name })
      .from(contacts)
      .innerJoin(companies, eq(contacts.companyId, companies.id))
      .where(eq(contacts.id, id))
      .limit(1);

    if (!row) {
      return res.status(404).json({ message: 'Contact not found' });
    }

    res.json({ ...serializeContact(row.contact), companyName: row.companyName });
  } catch (error) {
    handleControllerError(res, error, 'Failed to fetch contact');
  }
};

export const createContact = async (req: AuthRequest, res: Response) => {
  try {
    const data = contactSchema.parse(req.body);

    // A second primary contact for the company is rejected by contacts_unique_primary_idx.
    const [contact] = await db.insert(contacts).values(data).returning();

    await auditService.log(req.user?.userId, 'contact_create', 'contact', contact.id, { companyId: contact.companyId });

    res.status(201).json(serializeContact(contact));
  } catch (error) {
    handleControllerError(res, error, 'Failed to create contact');
  }
};

export const updateContact = async (req: AuthRequest, res: Response) => {
  try {
    const id = parseId(req.params.id, 'contact');
    const data = contactSchema.partial().parse(req.body);

    if (Object.keys(data).length === 0) {
      return res.status(400).json({ message: 'No changes provided' });
    }

    const [contact] = await db.update(contacts).set(data).where(eq(contacts.id, id)).returning();

    if (!contact) {
      return res.status(404).json({ message: 'Contact not found' });
    }

    await auditService.log(req.user?.userId, 'contact_update', 'contact', id, { fields: Object.keys(data) });

    res.json(serializeContact(contact));
  } catch (error) {
    handleControllerError(res, error, 'Failed to update contact');
  }
};

export const deleteContact = async (req: AuthRequest, res: Response) => {
  try {
    const id = parseId(req.params.id, 'contact');

    // Offers pointing at this contact keep existing with contact_person_id set to NULL.
    const deleted = await db.delete(contacts).where(eq(contacts.id, id)).returning({ id: contacts.id });

    if (deleted.length === 0) {
      return res.status(404).json({ message: 'Contact not found' });
    }

    await auditService.log(req.user?.userId, 'contact_delete', 'contact', id);

    res.json({ success: true });
  } catch (error) {
    handleControllerError(res, error, 'Failed to delete contact');
  }
};
