import 'dotenv/config';
import { logger } from './logger';
import { seedDiary } from './services/seedService';
import { createStore } from './store';

async function main() {
  const [username, daysArg] = process.argv.slice(2);
  if (!username) {
    throw new Error('Usage: npm run seed -- <username> [days]');
  }
  const store = createStore({
    kind: process.env.STORAGE_DRIVER === 'memory' ? 'memory' : 'postgres',
    databaseUrl: process.env.DATABASE_URL
  });
  await store.init();
  try {
    const user = await store.getUserByUsername(username);
    if (!user) {
      throw new Error(`User ${username} does not exist`);
    }
    const result = await seedDiary(store, user.id, Number(daysArg ?? 90), new Date());
    logger.info({ username, ...result }, 'Seeded diary entries');
  } finally {
    await store.close();
  }
}

main().catch((err) => {
  logger.fatal({ err }, 'Seeding failed');
  process.exit(1);
});
