/**
 * SQLite Post Store
 *
 * Durable PostStore on sql.js (SQLite compiled to WebAssembly). The
 * database lives in memory and is written back to its file after every
 * change; `:memory:` keeps it process-local. AUTOINCREMENT keeps ids
 * strictly increasing and never hands out the id of a removed row again.
 *
 * @module
 */

import { readFile, writeFile } from 'node:fs/promises';
import initSqlJs, { type Database, type SqlJsStatic, type SqlValue } from 'sql.js';
import { withDbSpan } from '../../../../framework/telemetry/otel.ts';
import type { Post } from '../domain/post.ts';
import type { ManagedPostStore } from '../domain/post_store.ts';

const TABLE = 'posts';
const IN_MEMORY = ':memory:';

type Row = Record<string, SqlValue>;

let engine: Promise<SqlJsStatic> | null = null;

function loadEngine(): Promise<SqlJsStatic> {
  engine ??= initSqlJs();
  return engine;
}

async function readDatabaseFile(path: string): Promise<Uint8Array | null> {
  try {
    return await readFile(path);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

export class SqlitePostStore implements ManagedPostStore {
  private closed = false;
  private flushing: Promise<void> = Promise.resolve();

  private constructor(
    private readonly db: Database,
    private readonly path: string
  ) {}

  /**
   * Open a database file, creating it on first write, or `:memory:` for
   * a private in-memory database
   */
  static async open(path: string): Promise<SqlitePostStore> {
    const SQL = await loadEngine();
    const data = path === IN_MEMORY ? null : await readDatabaseFile(path);
    return new SqlitePostStore(new SQL.Database(data), path);
  }

  async createSchema(): Promise<void> {
    this.db.run(`
      CREATE TABLE IF NOT EXISTS ${TABLE} (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        title TEXT NOT NULL,
        body TEXT NOT NULL
      )
    `);
    await this.flush();
  }

  async dropSchema(): Promise<void> {
    this.db.run(`DROP TABLE IF EXISTS ${TABLE}`);
    await this.flush();
  }

  async list(): Promise<Post[]> {
    return await withDbSpan('select', TABLE, async (span) => {
      const rows = this.query(`SELECT id, title, body FROM ${TABLE} ORDER BY id ASC`);
      span?.setAttribute('db.result.count', rows.length);
      return rows.map(toPost);
    });
  }

  async find(id: number): Promise<Post | null> {
    return await withDbSpan('select', TABLE, async () => {
      const [row] = this.query(`SELECT id, title, body FROM ${TABLE} WHERE id = ?`, [id]);
      return row ? toPost(row) : null;
    });
  }

  async create(title: string, body: string): Promise<Post> {
    return await withDbSpan('insert', TABLE, async () => {
      const [row] = this.query(
        `INSERT INTO ${TABLE} (title, body) VALUES (?, ?) RETURNING id, title, body`,
        [title, body]
      );
      if (!row) {
        throw new Error(`Insert into ${TABLE} returned no row`);
      }
      await this.flush();
      return toPost(row);
    });
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.flushing;
    this.db.close();
  }

  private query(sql: string, params: SqlValue[] = []): Row[] {
    const statement = this.db.prepare(sql);
    try {
      statement.bind(params);
      const rows: Row[] = [];
      while (statement.step()) {
        rows.push(statement.getAsObject());
      }
      return rows;
    } finally {
      statement.free();
    }
  }

  /**
   * Write the database back to its file. Writes are queued so the file
   * always ends up holding the latest state.
   */
  private flush(): Promise<void> {
    if (this.path === IN_MEMORY) return Promise.resolve();
    this.flushing = this.flushing.then(() => writeFile(this.path, this.db.export()));
    return this.flushing;
  }
}

function toPost(row: Row): Post {
  const { id, title, body } = row;
  if (typeof id !== 'number' || typeof title !== 'string' || typeof body !== 'string') {
    throw new Error(`Malformed ${TABLE} row: ${JSON.stringify(row)}`);
  }
  return { id, title, body };
}
