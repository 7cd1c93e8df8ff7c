import bcrypt from 'bcrypt';
import { eq } from 'drizzle-orm';
import { db, pool } from '../config/database';
import { users } from '../models/user';

const PASSWORD_SALT_ROUNDS = 10;

async function seedAdmin() {
  const username = process.env.ADMIN_USERNAME?.trim();
  const password = process.env.ADMIN_PASSWORD;

  if (!username || !password) {
    throw new Error('ADMIN_USERNAME and ADMIN_PASSWORD must be set');
  }

  const passwordHash = await bcrypt.hash(password, PASSWORD_SALT_ROUNDS);
  const [existing] = await db.select({ id: users.id }).from(users).where(eq(users.username, username)).limit(1);

  if (existing) {
    await db.update(users)
      .set({ passwordHash, isStaff: true, isActive: true })
      .where(eq(users.id, existing.id));
    console.log(`✅ Updated existing user ${username} to staff`);
  } else {
    await db.insert(users).values({ username, passwordHash, isStaff: true });
    console.log(`✅ Created staff user ${username}`);
  }
}

seedAdmin()
  .then(async () => {
    console.log('✅ Admin seed completed');
    await pool.end();
    process.exit(0);
  })
  .catch((error) => {
    console.error('❌ Admin seed failed:', error instanceof Error ? error.message : error);
    process.exit(1);
  });
