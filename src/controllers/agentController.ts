import { Response } from 'express';
import { z } from 'zod';
import { and, asc, count, eq } from 'drizzle-orm';
import { db } from '../config/database';
import { agents, companies } from '../models/company';
import { users, type User } from '../models/user';
import type { Agent } from '../models/company';
import { auditService } from '../services/auditService';
import { handleControllerError } from '../utils/httpErrors';
import { booleanQuery, idQuery, listQuerySchema, pageOffset, parseId, searchCondition } from '../utils/validation';
import { userDisplayName } from '../utils/serializers';
import type { AuthRequest } from '../types';

const agentSchema = z.object({
  userId: z.number().int().positive(),
  companyId: z.number().int().positive(),
  telegramChatId: z.string().max(50).optional().default(''),
  isActive: z.boolean().optional().default(true),
});

const agentFiltersSchema = listQuerySchema.extend({
  companyId: idQuery.optional(),
  isActive: booleanQuery.optional(),
});

const serializeAgent = (agent: Agent, user: User, companyName: string) => ({
  ...agent,
  displayName: userDisplayName(user),
  username: user.username,
  email: user.email,
  companyName,
});

const selectAgents = () =>
  db.select({ agent: agents, user: users, companyName: companies.name })
    .from(agents)
    .innerJoin(users, eq(agents.userId, users.id))
    .innerJoin(companies, eq(agents.companyId, companies.id));

export const getAgents = async (req: AuthRequest, res: Response) => {
  try {
    const { page, limit, q, companyId, isActive } = agentFiltersSchema.parse(req.query);

    const where = and(
      companyId === undefined ? undefined : eq(agents.companyId, companyId),
      isActive === undefined ? undefined : eq(agents.isActive, isActive),
      searchCondition(q, [users.username, users.firstName, users.lastName, users.email]),
    );

    const [rows, [{ total }]] = await Promise.all([
      selectAgents()
        .where(where)
        .orderBy(asc(users.username))
        .limit(limit)
        .offset(pageOffset(page, limit)),
      db.select({ total: count() })
        .from(agents)
        .innerJoin(users, eq(agents.userId, users.id))
        .where(where),
    ]);

    const data = rows.map(row => serializeAgent(row.agent, row.user, row.companyName));

    res.json({ data, page, limit, total, hasMore: page * limit < total });
  } catch (error) {
    handleControllerError(res, error, 'Failed to fetch agents');
  }
};

export const getAgentById = async (req: AuthRequest, res: Response) => {
  try {
    const id = parseId(req.params.id, 'agent');

    const [row] = await selectAgents().where(eq(agents.id, id)).limit(1);

    if (!row) {
      return res.status(404).json({ message: 'Agent not found' });
    }

    res.json(serializeAgent(row.agent, row.user, row.companyName));
  } catch (error) {
    handleControllerError(res, error, 'Failed to fetch agent');
  }
};

export const createAgent = async (req: AuthRequest, res: Response) => {
  try {
    const data = agentSchema.parse(req.body);

    const [agent] = await db.insert(agents).values(data).returning();

    await auditService.log(req.user?.userId, 'agent_create', 'agent', agent.id, { userId: agent.userId, companyId: agent.companyId });

    res.status(201).json(agent);
  } catch (error) {
    handleControllerError(res, error, 'Failed to create agent');
  }
};

export const updateAgent = async (req: AuthRequest, res: Response) => {
  try {
    const id = parseId(req.params.id, 'agent');
    const data = agentSchema.partial().parse(req.body);

    if (Object.keys(data).length === 0) {
      return res.status(400).json({ message: 'No changes provided' });
    }

    const [agent] = await db.update(agents).set(data).where(eq(agents.id, id)).returning();

    if (!agent) {
      return res.status(404).json({ message: 'Agent not found' });
    }

    await auditService.log(req.user?.userId, 'agent_update', 'agent', id, { fields: Object.keys(data) });

    res.json(agent);
  } catch (error) {
    handleControllerError(res, error, 'Failed to update agent');
  }
};

export const deleteAgent = async (req: AuthRequest, res: Response) => {
  try {
    const id = parseId(req.params.id, 'agent');

    const deleted = await db.delete(agents).where(eq(agents.id, id)).returning({ id: agents.id });

    if (deleted.length === 0) {
      return res.status(404).json({ message: 'Agent not found' });
    }

    await auditService.log(req.user?.userId, 'agent_delete', 'agent', id);

    res.json({ success: true });
  } catch (error) {
    handleControllerError(res, error, 'Failed to delete agent');
  }
};
