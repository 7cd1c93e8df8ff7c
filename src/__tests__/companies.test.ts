import fs from 'fs';
import path from 'path';
import request from 'supertest';
import app from '../app';
import { config } from '../config/env';
import { closeDatabase, resetDatabase } from './helpers/testDatabase';
import { createCompany, createStaffToken, PNG_BASE64 } from './helpers/fixtures';

jest.mock('../config/database', () => jest.requireActual('./helpers/testDatabase'));

const contact = (companyId: number, overrides: Record<string, unknown> = {}) => ({
  companyId,
  firstName: 'Ivan',
  lastName: 'Sokolov',
  email: 'ivan@example.com',
  ...overrides,
});

describe('Companies and contacts', () => {
  let token: string;

  beforeEach(async () => {
    await resetDatabase();
    token = await createStaffToken();
  });

  afterAll(async () => {
    await closeDatabase();
  });

  describe('companies', () => {
    it('creates a company', async () => {
      const res = await request(app)
        .post('/api/admin/companies')
        .set('Authorization', `Bearer ${token}`)
        .send({ name: 'Northern Logistics', website: 'https://northern.example.com' });

      expect(res.status).toBe(201);
      expect(res.body).toMatchObject({
        id: 1,
        name: 'Northern Logistics',
        description: '',
        website: 'https://northern.example.com',
        logo: null,
        logoUrl: null,
        logoPreview: 'No Logo',
      });
    });

    it('validates the website', async () => {
      const res = await request(app)
        .post('/api/admin/companies')
        .set('Authorization', `Bearer ${token}`)
        .send({ name: 'Northern Logistics', website: 'not a url' });

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ message: 'Invalid website URL', field: 'website' });
    });

    it('lists companies by name with related counts', async () => {
      const harbour = await createCompany('Harbour Storage');
      await createCompany('Atlas Warehousing');
      await request(app).post('/api/admin/contacts').set('Authorization', `Bearer ${token}`).send(contact(harbour.id)).expect(201);

      const res = await request(app).get('/api/admin/companies').set('Authorization', `Bearer ${token}`);

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({ page: 1, limit: 20, total: 2, hasMore: false });
      expect(res.body.data.map((company: { name: string }) => company.name)).toEqual(['Atlas Warehousing', 'Harbour Storage']);
      expect(res.body.data[1]).toMatchObject({ contactsCount: 1, objectsCount: 0 });
    });

    it('searches by name', async () => {
      await createCompany('Harbour Storage');
      await createCompany('Atlas Warehousing');

      const res = await request(app).get('/api/admin/companies?q=atlas').set('Authorization', `Bearer ${token}`);

      expect(res.body.total).toBe(1);
      expect(res.body.data[0].name).toBe('Atlas Warehousing');
    });

    it('returns 404 for a missing company', async () => {
      const res = await request(app).get('/api/admin/companies/999').set('Authorization', `Bearer ${token}`);

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ message: 'Company not found' });
    });

    it('rejects malformed ids', async () => {
      const res = await request(app).get('/api/admin/companies/abc').set('Authorization', `Bearer ${token}`);

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ message: 'Invalid company ID' });
    });

    it('uploads, serves and removes a logo', async () => {
      const company = await createCompany();

      const uploaded = await request(app)
        .post(`/api/admin/companies/${company.id}/logo`)
        .set('Authorization', `Bearer ${token}`)
        .send({ fileName: 'logo.png', contentType: 'image/png', data: PNG_BASE64 });

      expect(uploaded.status).toBe(200);
      const logo: string = uploaded.body.logo;
      expect(logo).toMatch(/^company_logos\/logo(_[A-Za-z0-9]{7})?\.png$/);
      expect(uploaded.body.logoUrl).toBe(`/media/${logo}`);
      expect(uploaded.body.logoPreview).toBe(`<img src="/media/${logo}" width="50" height="50" style="border-radius: 5px;" />`);

      const served = await request(app).get(`/media/${logo}`);
      expect(served.status).toBe(200);
      expect(served.headers['content-type']).toBe('image/png');

      const removed = await request(app)
        .delete(`/api/admin/companies/${company.id}/logo`)
        .set('Authorization', `Bearer ${token}`);

      expect(removed.status).toBe(200);
      expect(removed.body.logo).toBeNull();
      expect(fs.existsSync(path.join(config.media.root, logo))).toBe(false);
    });

    it('deletes contacts and objects together with the company', async () => {
      const company = await createCompany();
      await request(app).post('/api/admin/contacts').set('Authorization', `Bearer ${token}`).send(contact(company.id)).expect(201);
      await request(app)
        .post('/api/admin/objects')
        .set('Authorization', `Bearer ${token}`)
        .send({ name: 'North Hub', address: 'Industrial st. 5', ownerId: company.id, totalArea: 5000 })
        .expect(201);

      await request(app).delete(`/api/admin/companies/${company.id}`).set('Authorization', `Bearer ${token}`).expect(200);

      const contacts = await request(app).get('/api/admin/contacts').set('Authorization', `Bearer ${token}`);
      const objects = await request(app).get('/api/admin/objects').set('Authorization', `Bearer ${token}`);
      expect(contacts.body.total).toBe(0);
      expect(objects.body.total).toBe(0);
    });
  });

  describe('primary contact', () => {
    it('allows one primary contact per company', async () => {
      const company = await createCompany();

      await request(app)
        .post('/api/admin/contacts')
        .set('Authorization', `Bearer ${token}`)
        .send(contact(company.id, { isPrimary: true }))
        .expect(201);

      const res = await request(app)
        .post('/api/admin/contacts')
        .set('Authorization', `Bearer ${token}`)
        .send(contact(company.id, { firstName: 'Olga', email: 'olga@example.com', isPrimary: true }));

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ message: 'Company already has a primary contact', constraint: 'contacts_unique_primary_idx' });
    });

    it('allows any number of secondary contacts', async () => {
      const company = await createCompany();

      for (const firstName of ['Ivan', 'Olga', 'Petr']) {
        await request(app)
          .post('/api/admin/contacts')
          .set('Authorization', `Bearer ${token}`)
          .send(contact(company.id, { firstName }))
          .expect(201);
      }

      const res = await request(app).get(`/api/admin/contacts?companyId=${company.id}`).set('Authorization', `Bearer ${token}`);
      expect(res.body.total).toBe(3);
    });

    it('applies the rule per company', async () => {
      const first = await createCompany('Harbour Storage');
      const second = await createCompany('Atlas Warehousing');

      await request(app).post('/api/admin/contacts').set('Authorization', `Bearer ${token}`).send(contact(first.id, { isPrimary: true })).expect(201);
      await request(app).post('/api/admin/contacts').set('Authorization', `Bearer ${token}`).send(contact(second.id, { isPrimary: true })).expect(201);
    });

    it('rejects promoting a second contact to primary', async () => {
      const company = await createCompany();
      await request(app).post('/api/admin/contacts').set('Authorization', `Bearer ${token}`).send(contact(company.id, { isPrimary: true })).expect(201);
      const secondary = await request(app)
        .post('/api/admin/contacts')
        .set('Authorization', `Bearer ${token}`)
        .send(contact(company.id, { firstName: 'Olga' }))
        .expect(201);

      const res = await request(app)
        .put(`/api/admin/contacts/${secondary.body.id}`)
        .set('Authorization', `Bearer ${token}`)
        .send({ isPrimary: true });

      expect(res.status).toBe(400);
      expect(res.body.message).toBe('Company already has a primary contact');
    });

    it('lists the primary contact first on the company page', async () => {
      const company = await createCompany();
      await request(app).post('/api/admin/contacts').set('Authorization', `Bearer ${token}`).send(contact(company.id, { lastName: 'Abramov' })).expect(201);
      await request(app).post('/api/admin/contacts').set('Authorization', `Bearer ${token}`).send(contact(company.id, { lastName: 'Zaitsev', isPrimary: true })).expect(201);

      const res = await request(app).get(`/api/admin/companies/${company.id}`).set('Authorization', `Bearer ${token}`);

      expect(res.body.contacts.map((item: { displayName: string }) => item.displayName)).toEqual(['Ivan Zaitsev', 'Ivan Abramov']);
    });
  });

  it('rejects contacts for a missing company', async () => {
    const res = await request(app).post('/api/admin/contacts').set('Authorization', `Bearer ${token}`).send(contact(999));

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ message: 'Company does not exist', constraint: 'contacts_company_id_fkey' });
  });
});
