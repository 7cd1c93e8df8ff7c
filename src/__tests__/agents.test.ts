import request from 'supertest';
import app from '../app';
import { closeDatabase, resetDatabase } from './helpers/testDatabase';
import { createCompany, createStaffToken, createUser } from './helpers/fixtures';

jest.mock('../config/database', () => jest.requireActual('./helpers/testDatabase'));

describe('Agents', () => {
  let token: string;

  beforeEach(async () => {
    await resetDatabase();
    token = await createStaffToken();
  });

  afterAll(async () => {
    await closeDatabase();
  });

  it('links a user to a company', async () => {
    const company = await createCompany();
    const user = await createUser('agent.smith');

    const created = await request(app)
      .post('/api/admin/agents')
      .set('Authorization', `Bearer ${token}`)
      .send({ userId: user.id, companyId: company.id, telegramChatId: '100200' });

    expect(created.status).toBe(201);
    expect(created.body).toMatchObject({ userId: user.id, companyId: company.id, telegramChatId: '100200', isActive: true });

    const res = await request(app).get('/api/admin/agents').set('Authorization', `Bearer ${token}`);

    expect(res.body.total).toBe(1);
    expect(res.body.data[0]).toMatchObject({ displayName: 'agent.smith', companyName: 'Northern Logistics' });
  });

  it('allows one agent profile per user', async () => {
    const company = await createCompany();
    const user = await createUser('agent.smith');
    await request(app)
      .post('/api/admin/agents')
      .set('Authorization', `Bearer ${token}`)
      .send({ userId: user.id, companyId: company.id })
      .expect(201);

    const res = await request(app)
      .post('/api/admin/agents')
      .set('Authorization', `Bearer ${token}`)
      .send({ userId: user.id, companyId: company.id });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ message: 'User already has an agent profile', constraint: 'agents_user_id_key' });
  });

  it('goes away with the user', async () => {
    const company = await createCompany();
    const user = await createUser('agent.smith');
    await request(app)
      .post('/api/admin/agents')
      .set('Authorization', `Bearer ${token}`)
      .send({ userId: user.id, companyId: company.id })
      .expect(201);

    await request(app).delete(`/api/admin/users/${user.id}`).set('Authorization', `Bearer ${token}`).expect(200);

    const res = await request(app).get('/api/admin/agents').set('Authorization', `Bearer ${token}`);
    expect(res.body.total).toBe(0);
  });

  it('filters by active flag', async () => {
    const company = await createCompany();
    const active = await createUser('agent.active');
    const idle = await createUser('agent.idle');
    await request(app).post('/api/admin/agents').set('Authorization', `Bearer ${token}`).send({ userId: active.id, companyId: company.id }).expect(201);
    await request(app).post('/api/admin/agents').set('Authorization', `Bearer ${token}`).send({ userId: idle.id, companyId: company.id, isActive: false }).expect(201);

    const res = await request(app).get('/api/admin/agents?isActive=false').set('Authorization', `Bearer ${token}`);

    expect(res.body.data.map((agent: { username: string }) => agent.username)).toEqual(['agent.idle']);
  });
});
