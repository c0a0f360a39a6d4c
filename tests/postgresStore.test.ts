import type { QueryResult, QueryResultRow } from 'pg';
import { describe, expect, it } from 'vitest';
import { StorageUnavailableError } from '../src/errors';
import { PostgresStore, type PgClient, type PgPool } from '../src/store';

function pgError(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

class FakeClient implements PgClient {
  statements: string[] = [];
  released = false;

  constructor(private readonly failures: Array<[string, Error]> = []) {}

  async query(text: string) {
    this.statements.push(text);
    const failure = this.failures.find(([prefix]) => text.startsWith(prefix));
    if (failure) {
      throw failure[1];
    }
    return { rows: [] };
  }

  release() {
    this.released = true;
  }
}

class FakePool implements PgPool {
  queries: Array<{ text: string; values: unknown[] }> = [];

  constructor(private readonly client = new FakeClient()) {}

  async query<R extends QueryResultRow>(
    text: string,
    values: unknown[] = []
  ): Promise<QueryResult<R>> {
    this.queries.push({ text: text.replace(/\s+/g, ' ').trim(), values });
    return { command: 'SELECT', rowCount: 0, oid: 0, fields: [], rows: [] };
  }

  async connect() {
    return this.client;
  }

  async end() {}
}

const user = {
  id: 'usr_1',
  username: 'erin',
  passwordHash: 'test-hash',
  createdAt: '2025-09-01T00:00:00.000Z'
};

describe('postgres store', () => {
  it('reports a dropped connection during signup as unavailable storage', async () => {
    const client = new FakeClient([
      ['INSERT INTO users', pgError('Connection terminated unexpectedly', 'ECONNRESET')],
      ['ROLLBACK', new Error('Client was closed and is not queryable')]
    ]);
    const store = new PostgresStore(new FakePool(client));

    const result = store.createUserWithSettings(user, 1800);
    await expect(result).rejects.toBeInstanceOf(StorageUnavailableError);
    await expect(result).rejects.toMatchObject({
      status: 503,
      code: 50301,
      details: { reason: 'Connection terminated unexpectedly' }
    });
    expect(client.statements).toEqual([
      'BEGIN',
      expect.stringContaining('INSERT INTO users'),
      'ROLLBACK'
    ]);
    expect(client.released).toBe(true);
  });

  it('rolls back and reports a taken username', async () => {
    const client = new FakeClient([
      ['INSERT INTO users', pgError('duplicate key value violates unique constraint', '23505')]
    ]);
    const store = new PostgresStore(new FakePool(client));

    expect(await store.createUserWithSettings(user, 1800)).toBe(false);
    expect(client.statements[client.statements.length - 1]).toBe('ROLLBACK');
  });

  it('leaves malformed dates out of month queries instead of casting them', async () => {
    const pool = new FakePool();
    const store = new PostgresStore(pool);

    await store.listEntryMonths('usr_1');
    await store.listEntriesForMonth('usr_1', 2025, 12);

    const [months, entries] = pool.queries;
    expect(months.text).toContain(
      "EXTRACT(YEAR FROM (CASE WHEN date ~ '^[0-9]{4}-[0-9]{2}-[0-9]{2}$' THEN date::date END))"
    );
    expect(months.text.replace(/\(CASE WHEN .*? END\)/g, '')).not.toContain('::date');

    expect(entries.text).toContain("AND date ~ '^[0-9]{4}-[0-9]{2}-[0-9]{2}$'");
    expect(entries.text).not.toContain('::date');
    expect(entries.values).toEqual(['usr_1', '2025-12-01', '2026-01-01']);
  });
});
