import bcrypt from 'bcrypt';
import { signToken } from '../../middleware/auth';
import { companies, users } from '../../models';
import { db } from './testDatabase';

interface UserOptions {
  password?: string;
  isStaff?: boolean;
  isActive?: boolean;
}

export const createUser = async (username: string, options: UserOptions = {}) => {
  const passwordHash = await bcrypt.hash(options.password ?? 'test-password', 4);
  const [user] = await db.insert(users).values({
    username,
    passwordHash,
    isStaff: options.isStaff ?? false,
    isActive: options.isActive ?? true,
  }).returning();
  return user;
};

export const tokenFor = (user: { id: number; username: string; isStaff: boolean }) =>
  signToken({ userId: user.id, username: user.username, isStaff: user.isStaff });

export const createStaffToken = async (username = 'staff') => tokenFor(await createUser(username, { isStaff: true }));

export const createCompany = async (name = 'Northern Logistics') => {
  const [company] = await db.insert(companies).values({ name }).returning();
  return company;
};

// 1x1 transparent PNG
export const PNG_BASE64 = 'iVBORw0KGgoAAAANSUhEUgAAAAEAAAABCAQAAAC1HAwCAAAAC0lEQVR42mNkYAAAAAYAAjCB0C8AAAAASUVORK5CYII=';
