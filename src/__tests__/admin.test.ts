import request from 'supertest';
import app from '../app';
import { closeDatabase, resetDatabase } from './helpers/testDatabase';
import { createStaffToken, createUser } from './helpers/fixtures';

jest.mock('../config/database', () => jest.requireActual('./helpers/testDatabase'));

describe('Admin screens and history', () => {
  let token: string;

  beforeEach(async () => {
    await resetDatabase();
    token = await createStaffToken();
  });

  afterAll(async () => {
    await closeDatabase();
  });

  it('lists every screen', async () => {
    const res = await request(app).get('/api/admin/screens').set('Authorization', `Bearer ${token}`);

    expect(res.status).toBe(200);
    expect(Object.keys(res.body.data).sort()).toEqual(['agents', 'companies', 'contacts', 'images', 'objects', 'offers']);
  });

  it('describes a single screen', async () => {
    const res = await request(app).get('/api/admin/screens/offers').set('Authorization', `Bearer ${token}`);

    expect(res.status).toBe(200);
    expect(res.body.readonlyFields).toEqual(['totalArea', 'priceDisplay', 'createdAt', 'updatedAt']);
    expect(res.body.choices.offerType).toEqual({ sale: '💰 Sale', lease: '📄 Lease', both: '💼 Lease or sale' });
  });

  it('returns 404 for an unknown screen', async () => {
    const res = await request(app).get('/api/admin/screens/invoices').set('Authorization', `Bearer ${token}`);

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ message: 'Screen not found' });
  });

  it.each(['constructor', 'toString'])('returns 404 for the inherited name %s', async (name) => {
    const res = await request(app).get(`/api/admin/screens/${name}`).set('Authorization', `Bearer ${token}`);

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ message: 'Screen not found' });
  });

  it('records changes in the admin log, newest first', async () => {
    await request(app)
      .post('/api/admin/users')
      .set('Authorization', `Bearer ${token}`)
      .send({ username: 'new.agent', password: 'test-password' })
      .expect(201);
    await request(app)
      .post('/api/admin/companies')
      .set('Authorization', `Bearer ${token}`)
      .send({ name: 'Harbour Storage' })
      .expect(201);

    const res = await request(app).get('/api/admin/log').set('Authorization', `Bearer ${token}`);

    expect(res.status).toBe(200);
    expect(res.body.data.map((entry: { actionType: string }) => entry.actionType)).toEqual(['company_create', 'user_create']);
    expect(res.body.data[0]).toMatchObject({ username: 'staff', targetType: 'company', targetId: '1', details: { name: 'Harbour Storage' } });

    const limited = await request(app).get('/api/admin/log?limit=1').set('Authorization', `Bearer ${token}`);
    expect(limited.body.data).toHaveLength(1);
  });

  describe('users', () => {
    it('creates users without exposing the password hash', async () => {
      const res = await request(app)
        .post('/api/admin/users')
        .set('Authorization', `Bearer ${token}`)
        .send({ username: 'new.agent', password: 'test-password', firstName: 'Anna', lastName: 'Petrova' });

      expect(res.status).toBe(201);
      expect(res.body).toMatchObject({ username: 'new.agent', displayName: 'Anna Petrova', isStaff: false, isActive: true });
      expect(res.body).not.toHaveProperty('passwordHash');
    });

    it('rejects duplicate usernames', async () => {
      await createUser('taken');

      const res = await request(app)
        .post('/api/admin/users')
        .set('Authorization', `Bearer ${token}`)
        .send({ username: 'taken', password: 'test-password' });

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ message: 'A user with that username already exists', constraint: 'users_username_key' });
    });

    it('does not let staff delete their own account', async () => {
      const res = await request(app).delete('/api/admin/users/1').set('Authorization', `Bearer ${token}`);

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ message: 'You cannot delete your own account' });
    });
  });
});
