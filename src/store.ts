import { Pool, type QueryResult, type QueryResultRow } from 'pg';
import { StorageUnavailableError } from './errors';
import { dbLogger } from './logger';
import {
  normalizeLegacyDiaryRows,
  runMigrations,
  type LegacyDiaryRow,
  type MigrationClient
} from './migrations';
import {
  isWellbeingLevel,
  type DiaryEntry,
  type MonthlySummary,
  type NewDiaryEntry,
  type Session,
  type User,
  type UserSettings,
  type YearMonth
} from './types';
import { monthBounds, parseEntryDate } from './utils';

export type StoreKind = 'memory' | 'postgres';

export interface DataStore {
  init(): Promise<void>;
  close(): Promise<void>;

  /** Creates the user and its settings row together; resolves false when the username is taken. */
  createUserWithSettings(user: User, timerLength: number): Promise<boolean>;
  getUserByUsername(username: string): Promise<User | undefined>;
  getUserById(userId: string): Promise<User | undefined>;

  createSession(session: Session): Promise<void>;
  getSession(token: string): Promise<Session | undefined>;

  /** Inserts unless the user already has an entry on that date, in which case it resolves undefined. */
  addEntry(entry: NewDiaryEntry): Promise<DiaryEntry | undefined>;
  listEntries(userId: string): Promise<DiaryEntry[]>;
  listEntriesForMonth(userId: string, year: number, month: number): Promise<DiaryEntry[]>;
  listEntryMonths(userId: string): Promise<YearMonth[]>;

  ensureSettings(userId: string, defaultTimerLength: number): Promise<UserSettings>;
  getSettings(userId: string): Promise<UserSettings | undefined>;
  setTimerLength(userId: string, timerLength: number): Promise<UserSettings>;

  upsertMonthlySummary(summary: MonthlySummary): Promise<void>;
  getMonthlySummary(userId: string, year: number, month: number): Promise<MonthlySummary | undefined>;
  listMonthlySummaries(userId: string): Promise<MonthlySummary[]>;
}

export function compareEntriesAscending(a: DiaryEntry, b: DiaryEntry): number {
  if (a.timestamp !== b.timestamp) {
    return a.timestamp < b.timestamp ? -1 : 1;
  }
  return a.id - b.id;
}

function copySummary(summary: MonthlySummary): MonthlySummary {
  return { ...summary, stats: { ...summary.stats, counts: { ...summary.stats.counts } } };
}

export interface InMemoryStoreOptions {
  legacyEntries?: LegacyDiaryRow[];
}

export class InMemoryStore implements DataStore {
  usersById = new Map<string, User>();
  userIdByUsername = new Map<string, string>();
  sessions = new Map<string, Session>();

  entries = new Map<number, DiaryEntry>();
  entryIdByUserDate = new Map<string, number>();
  private nextEntryId = 1;

  settingsByUser = new Map<string, UserSettings>();
  summaries = new Map<string, MonthlySummary>();

  constructor(options: InMemoryStoreOptions = {}) {
    const legacy = options.legacyEntries ?? [];
    normalizeLegacyDiaryRows(legacy).forEach((entry) => {
      this.entries.set(entry.id, entry);
      this.entryIdByUserDate.set(`${entry.userId}|${entry.date}`, entry.id);
    });
    // Ids of dropped duplicates stay consumed, as with a database sequence.
    this.nextEntryId = legacy.reduce((next, row) => Math.max(next, row.id + 1), 1);
  }

  async init(): Promise<void> {}

  async close(): Promise<void> {}

  async createUserWithSettings(user: User, timerLength: number): Promise<boolean> {
    if (this.userIdByUsername.has(user.username)) {
      return false;
    }
    this.usersById.set(user.id, user);
    this.userIdByUsername.set(user.username, user.id);
    this.settingsByUser.set(user.id, { userId: user.id, timerLength });
    return true;
  }

  async getUserByUsername(username: string): Promise<User | undefined> {
    const userId = this.userIdByUsername.get(username);
    return userId ? this.usersById.get(userId) : undefined;
  }

  async getUserById(userId: string): Promise<User | undefined> {
    return this.usersById.get(userId);
  }

  async createSession(session: Session): Promise<void> {
    this.sessions.set(session.token, session);
  }

  async getSession(token: string): Promise<Session | undefined> {
    return this.sessions.get(token);
  }

  async addEntry(input: NewDiaryEntry): Promise<DiaryEntry | undefined> {
    const key = `${input.userId}|${input.date}`;
    if (this.entryIdByUserDate.has(key)) {
      return undefined;
    }
    const entry: DiaryEntry = {
      id: this.nextEntryId,
      userId: input.userId,
      text: input.text,
      timestamp: input.timestamp,
      date: input.date,
      wellbeingLevel: input.wellbeingLevel ?? null,
      polarity: input.polarity ?? null
    };
    this.nextEntryId += 1;
    this.entries.set(entry.id, entry);
    this.entryIdByUserDate.set(key, entry.id);
    return entry;
  }

  async listEntries(userId: string): Promise<DiaryEntry[]> {
    return [...this.entries.values()]
      .filter((entry) => entry.userId === userId)
      .sort((a, b) => compareEntriesAscending(b, a));
  }

  async listEntriesForMonth(userId: string, year: number, month: number): Promise<DiaryEntry[]> {
    const { start, end } = monthBounds(year, month);
    return [...this.entries.values()]
      .filter(
        (entry) =>
          entry.userId === userId &&
          entry.date >= start &&
          entry.date < end &&
          parseEntryDate(entry.date) !== undefined
      )
      .sort(compareEntriesAscending);
  }

  async listEntryMonths(userId: string): Promise<YearMonth[]> {
    const months = new Map<string, YearMonth>();
    this.entries.forEach((entry) => {
      if (entry.userId !== userId) {
        return;
      }
      const parsed = parseEntryDate(entry.date);
      if (parsed) {
        months.set(`${parsed.year}-${parsed.month}`, { year: parsed.year, month: parsed.month });
      }
    });
    return [...months.values()].sort((a, b) => a.year - b.year || a.month - b.month);
  }

  async ensureSettings(userId: string, defaultTimerLength: number): Promise<UserSettings> {
    const current = this.settingsByUser.get(userId);
    if (current) {
      return { ...current };
    }
    this.settingsByUser.set(userId, { userId, timerLength: defaultTimerLength });
    return { userId, timerLength: defaultTimerLength };
  }

  async getSettings(userId: string): Promise<UserSettings | undefined> {
    const current = this.settingsByUser.get(userId);
    return current ? { ...current } : undefined;
  }

  async setTimerLength(userId: string, timerLength: number): Promise<UserSettings> {
    this.settingsByUser.set(userId, { userId, timerLength });
    return { userId, timerLength };
  }

  async upsertMonthlySummary(summary: MonthlySummary): Promise<void> {
    this.summaries.set(`${summary.userId}|${summary.year}|${summary.month}`, copySummary(summary));
  }

  async getMonthlySummary(
    userId: string,
    year: number,
    month: number
  ): Promise<MonthlySummary | undefined> {
    const summary = this.summaries.get(`${userId}|${year}|${month}`);
    return summary ? copySummary(summary) : undefined;
  }

  async listMonthlySummaries(userId: string): Promise<MonthlySummary[]> {
    return [...this.summaries.values()]
      .filter((summary) => summary.userId === userId)
      .sort((a, b) => b.year - a.year || b.month - a.month)
      .map(copySummary);
  }
}

type UserRow = {
  id: string;
  username: string;
  password_hash: string;
  created_at: Date;
};

type DiaryRow = {
  id: string;
  user_id: string;
  entry: string;
  timestamp: string;
  date: string;
  wellbeing_level: string | null;
  polarity: number | null;
};

type SummaryRow = {
  user_id: string;
  year: number;
  month: number;
  very_sad_count: number;
  sad_count: number;
  normal_count: number;
  happy_count: number;
  very_happy_count: number;
  avg_polarity: number;
  happiest_day: string | null;
  happiest_entry: string | null;
  generated_at: Date;
};

/** The parts of a pg `Pool` the store uses. */
export interface PgPool {
  query<R extends QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
  connect(): Promise<PgClient>;
  end(): Promise<void>;
}

export interface PgClient extends MigrationClient {
  release(): void;
}

const UNAVAILABLE_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ENOTFOUND', 'ETIMEDOUT']);

function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

// SQLSTATE 08xxx is a connection exception, 57P0x an operator shutdown.
function isUnavailable(err: unknown): boolean {
  const code = errorCode(err);
  if (!code) {
    return false;
  }
  return UNAVAILABLE_CODES.has(code) || code.startsWith('08') || code.startsWith('57P');
}

function toStorageError(err: unknown): unknown {
  return isUnavailable(err) ? new StorageUnavailableError(err) : err;
}

// A failed ROLLBACK on a dead connection must not replace the error that caused it.
async function rollback(client: PgClient): Promise<void> {
  try {
    await client.query('ROLLBACK');
  } catch (err) {
    dbLogger.warn({ err }, 'Rollback failed');
  }
}

function mapUser(row: UserRow): User {
  return {
    id: row.id,
    username: row.username,
    passwordHash: row.password_hash,
    createdAt: row.created_at.toISOString()
  };
}

function mapEntry(row: DiaryRow): DiaryEntry {
  return {
    id: Number(row.id),
    userId: row.user_id,
    text: row.entry,
    timestamp: row.timestamp,
    date: row.date,
    wellbeingLevel: isWellbeingLevel(row.wellbeing_level) ? row.wellbeing_level : null,
    polarity: row.polarity === null ? null : Number(row.polarity)
  };
}

function mapSummary(row: SummaryRow): MonthlySummary {
  return {
    userId: row.user_id,
    year: Number(row.year),
    month: Number(row.month),
    stats: {
      counts: {
        verySad: Number(row.very_sad_count),
        sad: Number(row.sad_count),
        normal: Number(row.normal_count),
        happy: Number(row.happy_count),
        veryHappy: Number(row.very_happy_count)
      },
      avgPolarity: Number(row.avg_polarity),
      happiestDay: row.happiest_day,
      happiestEntry: row.happiest_entry
    },
    generatedAt: row.generated_at.toISOString()
  };
}

const DIARY_COLUMNS = 'id, user_id, entry, timestamp, date, wellbeing_level, polarity';

const ISO_DATE = '^[0-9]{4}-[0-9]{2}-[0-9]{2}$';

// NULL for a malformed legacy date, so one bad row cannot fail the cast for the whole query.
const ENTRY_DAY = `(CASE WHEN date ~ '${ISO_DATE}' THEN date::date END)`;

export class PostgresStore implements DataStore {
  private readonly pool: PgPool;

  constructor(source: string | PgPool) {
    this.pool = typeof source === 'string' ? new Pool({ connectionString: source }) : source;
  }

  async init(): Promise<void> {
    const applied = await this.withClient((client) => runMigrations(client));
    if (applied.length > 0) {
      dbLogger.info({ applied }, 'Applied database migrations');
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  async createUserWithSettings(user: User, timerLength: number): Promise<boolean> {
    return this.withClient(async (client) => {
      try {
        await client.query('BEGIN');
        await client.query(
          'INSERT INTO users(id, username, password_hash, created_at) VALUES ($1,$2,$3,$4)',
          [user.id, user.username, user.passwordHash, user.createdAt]
        );
        await client.query('INSERT INTO settings(user_id, timer_length) VALUES ($1,$2)', [
          user.id,
          timerLength
        ]);
        await client.query('COMMIT');
        return true;
      } catch (err) {
        await rollback(client);
        if (errorCode(err) === '23505') {
          return false;
        }
        throw toStorageError(err);
      }
    });
  }

  async getUserByUsername(username: string): Promise<User | undefined> {
    const rows = await this.query<UserRow>('SELECT * FROM users WHERE username = $1', [username]);
    return rows[0] ? mapUser(rows[0]) : undefined;
  }

  async getUserById(userId: string): Promise<User | undefined> {
    const rows = await this.query<UserRow>('SELECT * FROM users WHERE id = $1', [userId]);
    return rows[0] ? mapUser(rows[0]) : undefined;
  }

  async createSession(session: Session): Promise<void> {
    await this.query('INSERT INTO sessions(token, user_id, created_at) VALUES ($1,$2,$3)', [
      session.token,
      session.userId,
      session.createdAt
    ]);
  }

  async getSession(token: string): Promise<Session | undefined> {
    const rows = await this.query<{ token: string; user_id: string; created_at: Date }>(
      'SELECT * FROM sessions WHERE token = $1',
      [token]
    );
    const row = rows[0];
    if (!row) {
      return undefined;
    }
    return {
      token: row.token,
      userId: row.user_id,
      createdAt: row.created_at.toISOString()
    };
  }

  async addEntry(entry: NewDiaryEntry): Promise<DiaryEntry | undefined> {
    const rows = await this.query<DiaryRow>(
      `INSERT INTO diary(user_id, entry, timestamp, date, wellbeing_level, polarity)
       VALUES ($1,$2,$3,$4,$5,$6)
       ON CONFLICT (user_id, date) DO NOTHING
       RETURNING ${DIARY_COLUMNS}`,
      [
        entry.userId,
        entry.text,
        entry.timestamp,
        entry.date,
        entry.wellbeingLevel ?? null,
        entry.polarity ?? null
      ]
    );
    return rows[0] ? mapEntry(rows[0]) : undefined;
  }

  async listEntries(userId: string): Promise<DiaryEntry[]> {
    const rows = await this.query<DiaryRow>(
      `SELECT ${DIARY_COLUMNS} FROM diary WHERE user_id = $1 ORDER BY timestamp DESC, id DESC`,
      [userId]
    );
    return rows.map(mapEntry);
  }

  async listEntriesForMonth(userId: string, year: number, month: number): Promise<DiaryEntry[]> {
    const { start, end } = monthBounds(year, month);
    const rows = await this.query<DiaryRow>(
      `SELECT ${DIARY_COLUMNS} FROM diary
       WHERE user_id = $1
         AND date ~ '${ISO_DATE}'
         AND date >= $2
         AND date < $3
       ORDER BY timestamp ASC, id ASC`,
      [userId, start, end]
    );
    return rows.map(mapEntry);
  }

  async listEntryMonths(userId: string): Promise<YearMonth[]> {
    const rows = await this.query<{ year: number; month: number }>(
      `SELECT DISTINCT EXTRACT(YEAR FROM ${ENTRY_DAY})::int AS year,
                       EXTRACT(MONTH FROM ${ENTRY_DAY})::int AS month
       FROM diary
       WHERE user_id = $1 AND ${ENTRY_DAY} IS NOT NULL
       ORDER BY year ASC, month ASC`,
      [userId]
    );
    return rows.map((row) => ({ year: Number(row.year), month: Number(row.month) }));
  }

  async ensureSettings(userId: string, defaultTimerLength: number): Promise<UserSettings> {
    await this.query(
      `INSERT INTO settings(user_id, timer_length) VALUES ($1,$2)
       ON CONFLICT (user_id) DO NOTHING`,
      [userId, defaultTimerLength]
    );
    const current = await this.getSettings(userId);
    return current ?? { userId, timerLength: defaultTimerLength };
  }

  async getSettings(userId: string): Promise<UserSettings | undefined> {
    const rows = await this.query<{ user_id: string; timer_length: number }>(
      'SELECT user_id, timer_length FROM settings WHERE user_id = $1',
      [userId]
    );
    const row = rows[0];
    if (!row) {
      return undefined;
    }
    return { userId: row.user_id, timerLength: Number(row.timer_length) };
  }

  async setTimerLength(userId: string, timerLength: number): Promise<UserSettings> {
    await this.query(
      `INSERT INTO settings(user_id, timer_length) VALUES ($1,$2)
       ON CONFLICT (user_id) DO UPDATE SET timer_length = EXCLUDED.timer_length`,
      [userId, timerLength]
    );
    return { userId, timerLength };
  }

  async upsertMonthlySummary(summary: MonthlySummary): Promise<void> {
    const { counts } = summary.stats;
    await this.query(
      `INSERT INTO monthly_summary(
         user_id, year, month,
         very_sad_count, sad_count, normal_count, happy_count, very_happy_count,
         avg_polarity, happiest_day, happiest_entry, generated_at
       )
       VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10,$11,$12)
       ON CONFLICT (user_id, year, month)
       DO UPDATE SET very_sad_count = EXCLUDED.very_sad_count,
                     sad_count = EXCLUDED.sad_count,
                     normal_count = EXCLUDED.normal_count,
                     happy_count = EXCLUDED.happy_count,
                     very_happy_count = EXCLUDED.very_happy_count,
                     avg_polarity = EXCLUDED.avg_polarity,
                     happiest_day = EXCLUDED.happiest_day,
                     happiest_entry = EXCLUDED.happiest_entry,
                     generated_at = EXCLUDED.generated_at`,
      [
        summary.userId,
        summary.year,
        summary.month,
        counts.verySad,
        counts.sad,
        counts.normal,
        counts.happy,
        counts.veryHappy,
        summary.stats.avgPolarity,
        summary.stats.happiestDay,
        summary.stats.happiestEntry,
        summary.generatedAt
      ]
    );
  }

  async getMonthlySummary(
    userId: string,
    year: number,
    month: number
  ): Promise<MonthlySummary | undefined> {
    const rows = await this.query<SummaryRow>(
      'SELECT * FROM monthly_summary WHERE user_id = $1 AND year = $2 AND month = $3',
      [userId, year, month]
    );
    return rows[0] ? mapSummary(rows[0]) : undefined;
  }

  async listMonthlySummaries(userId: string): Promise<MonthlySummary[]> {
    const rows = await this.query<SummaryRow>(
      'SELECT * FROM monthly_summary WHERE user_id = $1 ORDER BY year DESC, month DESC',
      [userId]
    );
    return rows.map(mapSummary);
  }

  private async query<T extends QueryResultRow>(text: string, values: unknown[] = []): Promise<T[]> {
    try {
      const { rows } = await this.pool.query<T>(text, values);
      return rows;
    } catch (err) {
      throw toStorageError(err);
    }
  }

  private async withClient<T>(fn: (client: PgClient) => Promise<T>): Promise<T> {
    let client: PgClient;
    try {
      client = await this.pool.connect();
    } catch (err) {
      throw toStorageError(err);
    }
    try {
      return await fn(client);
    } finally {
      client.release();
    }
  }
}

export function createStore(params: { kind: StoreKind; databaseUrl?: string }): DataStore {
  if (params.kind === 'memory') {
    return new InMemoryStore();
  }
  if (!params.databaseUrl) {
    throw new Error('DATABASE_URL is required when using postgres store');
  }
  return new PostgresStore(params.databaseUrl);
}
