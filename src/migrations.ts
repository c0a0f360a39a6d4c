import { isWellbeingLevel, type DiaryEntry } from './types';

export interface MigrationClient {
  query(text: string, values?: unknown[]): Promise<{ rows: Array<Record<string, unknown>> }>;
}

export interface Migration {
  version: number;
  name: string;
  statements: string[];
}

export const MIGRATIONS: Migration[] = [
  {
    version: 1,
    name: 'create_base_tables',
    statements: [
      `CREATE TABLE IF NOT EXISTS users (
        id TEXT PRIMARY KEY,
        username TEXT UNIQUE NOT NULL,
        password_hash TEXT NOT NULL,
        created_at TIMESTAMPTZ NOT NULL
      )`,
      `CREATE TABLE IF NOT EXISTS sessions (
        token TEXT PRIMARY KEY,
        user_id TEXT NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        created_at TIMESTAMPTZ NOT NULL
      )`,
      `CREATE TABLE IF NOT EXISTS diary (
        id BIGSERIAL PRIMARY KEY,
        user_id TEXT NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        entry TEXT NOT NULL,
        timestamp TEXT NOT NULL,
        wellbeing_level TEXT,
        polarity DOUBLE PRECISION
      )`,
      `CREATE TABLE IF NOT EXISTS settings (
        user_id TEXT PRIMARY KEY REFERENCES users(id) ON DELETE CASCADE,
        timer_length INT NOT NULL DEFAULT 1800
      )`,
      `CREATE TABLE IF NOT EXISTS monthly_summary (
        id BIGSERIAL PRIMARY KEY,
        user_id TEXT NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        year INT NOT NULL,
        month INT NOT NULL,
        very_sad_count INT NOT NULL DEFAULT 0,
        sad_count INT NOT NULL DEFAULT 0,
        normal_count INT NOT NULL DEFAULT 0,
        happy_count INT NOT NULL DEFAULT 0,
        very_happy_count INT NOT NULL DEFAULT 0,
        avg_polarity DOUBLE PRECISION NOT NULL DEFAULT 0,
        happiest_day TEXT,
        happiest_entry TEXT,
        generated_at TIMESTAMPTZ NOT NULL,
        UNIQUE(user_id, year, month)
      )`
    ]
  },
  {
    // Rows written before the date column existed may repeat a day; the earliest id wins.
    version: 2,
    name: 'diary_one_entry_per_day',
    statements: [
      'ALTER TABLE diary ADD COLUMN IF NOT EXISTS date TEXT',
      `UPDATE diary SET date = substring(timestamp from 1 for 10) WHERE date IS NULL OR date = ''`,
      `DELETE FROM diary
       WHERE id NOT IN (
         SELECT MIN(id) FROM diary GROUP BY user_id, date
       )`,
      'ALTER TABLE diary ALTER COLUMN date SET NOT NULL',
      'CREATE UNIQUE INDEX IF NOT EXISTS idx_diary_user_date ON diary(user_id, date)'
    ]
  },
  {
    version: 3,
    name: 'diary_user_timestamp_index',
    statements: ['CREATE INDEX IF NOT EXISTS idx_diary_user_timestamp ON diary(user_id, timestamp)']
  }
];

/**
 * Applies every migration whose version is not yet recorded in
 * `schema_migrations`, in ascending order, each inside its own transaction.
 * Returns the versions applied by this call.
 */
export async function runMigrations(
  client: MigrationClient,
  migrations: Migration[] = MIGRATIONS
): Promise<number[]> {
  await client.query(
    `CREATE TABLE IF NOT EXISTS schema_migrations (
      version INT PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT now()
    )`
  );
  const { rows } = await client.query('SELECT version FROM schema_migrations');
  const applied = new Set(rows.map((row) => Number(row.version)));

  const pending = migrations
    .filter((migration) => !applied.has(migration.version))
    .sort((a, b) => a.version - b.version);

  const done: number[] = [];
  for (const migration of pending) {
    try {
      await client.query('BEGIN');
      for (const statement of migration.statements) {
        await client.query(statement);
      }
      await client.query('INSERT INTO schema_migrations(version, name) VALUES ($1,$2)', [
        migration.version,
        migration.name
      ]);
      await client.query('COMMIT');
    } catch (err) {
      await client.query('ROLLBACK');
      throw err;
    }
    done.push(migration.version);
  }
  return done;
}

export interface LegacyDiaryRow {
  id: number;
  userId: string;
  text: string;
  timestamp: string;
  date?: string | null;
  wellbeingLevel?: string | null;
  polarity?: number | null;
}

/**
 * In-memory counterpart of migration 2: backfills the date from the timestamp
 * and keeps only the lowest-id row per user and date.
 */
export function normalizeLegacyDiaryRows(rows: LegacyDiaryRow[]): DiaryEntry[] {
  const seen = new Set<string>();
  const result: DiaryEntry[] = [];
  rows
    .slice()
    .sort((a, b) => a.id - b.id)
    .forEach((row) => {
      const date = row.date ? row.date : row.timestamp.slice(0, 10);
      const key = `${row.userId}|${date}`;
      if (seen.has(key)) {
        return;
      }
      seen.add(key);
      result.push({
        id: row.id,
        userId: row.userId,
        text: row.text,
        timestamp: row.timestamp,
        date,
        wellbeingLevel: isWellbeingLevel(row.wellbeingLevel) ? row.wellbeingLevel : null,
        polarity: typeof row.polarity === 'number' ? row.polarity : null
      });
    });
  return result;
}
