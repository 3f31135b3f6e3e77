import sqlite3 from "sqlite3";
import { CaseTx, NewMessage, Store } from "./store.js";
import { Case, CaseStatus, Message, Source } from "../types/contracts.js";
import { generateCaseId } from "../core/case-id.js";
import { isUniqueViolation } from "../core/dedupe.js";

type RunInfo = { changes: number; lastID: number };

function run(db: sqlite3.Database, sql: string, params: unknown[] = []) {
  return new Promise<RunInfo>((resolve, reject) => {
    db.run(sql, params, function (err) {
      if (err) reject(err);
      else resolve({ changes: this.changes, lastID: this.lastID });
    });
  });
}
function get<T>(db: sqlite3.Database, sql: string, params: unknown[] = []) {
  return new Promise<T | undefined>((resolve, reject) => {
    db.get(sql, params, (err, row) => (err ? reject(err) : resolve(row as T | undefined)));
  });
}
function all<T>(db: sqlite3.Database, sql: string, params: unknown[] = []) {
  return new Promise<T[]>((resolve, reject) => {
    db.all(sql, params, (err, rows) => (err ? reject(err) : resolve(rows as T[])));
  });
}

interface CaseRow {
  caseId: string;
  customerIdentifier: string;
  status: CaseStatus;
  createdAt: string;
  lastMessageAt: string;
  messageCount: number;
  escalated: number;
  escalatedAt: string | null;
  lastEscalationAlertAt: string | null;
  closedAt: string | null;
}

interface MessageRow {
  id: number;
  caseId: string;
  sender: string;
  isAdmin: number;
  body: string;
  timestamp: string;
  source: Source;
}

function rowToCase(r: CaseRow): Case {
  return {
    caseId: r.caseId,
    customerIdentifier: r.customerIdentifier,
    status: r.status,
    createdAt: r.createdAt,
    lastMessageAt: r.lastMessageAt,
    messageCount: r.messageCount,
    escalated: r.escalated === 1,
    escalatedAt: r.escalatedAt ?? null,
    lastEscalationAlertAt: r.lastEscalationAlertAt ?? null,
    closedAt: r.closedAt ?? null
  };
}

function rowToMessage(r: MessageRow): Message {
  return {
    id: r.id,
    caseId: r.caseId,
    sender: r.sender,
    isAdmin: r.isAdmin === 1,
    body: r.body,
    timestamp: r.timestamp,
    source: r.source
  };
}

function createTx(db: sqlite3.Database, newCaseId: (now: Date) => string): CaseTx {
  async function getCase(caseId: string): Promise<Case | null> {
    const row = await get<CaseRow>(db, `select * from cases where caseId=?`, [caseId]);
    return row ? rowToCase(row) : null;
  }

  async function findOpenCase(customerIdentifier: string): Promise<Case | null> {
    const row = await get<CaseRow>(db, `
      select * from cases where customerIdentifier=? and status='open'
    `, [customerIdentifier]);
    return row ? rowToCase(row) : null;
  }

  async function listMessages(caseId: string): Promise<Message[]> {
    const rows = await all<MessageRow>(db, `
      select * from messages where caseId=? order by timestamp asc, id asc
    `, [caseId]);
    return rows.map(rowToMessage);
  }

  return {
    async isProcessed(externalId, source) {
      const row = await get<{ one: number }>(db, `
        select 1 as one from processed_messages where externalMessageId=? and source=?
      `, [externalId, source]);
      return row !== undefined;
    },

    async recordProcessed(externalId, source, caseId, at) {
      try {
        await run(db, `
          insert into processed_messages (externalMessageId, source, caseId, processedAt)
          values (?,?,?,?)
        `, [externalId, source, caseId, at]);
        return "recorded";
      } catch (err) {
        if (isUniqueViolation(err)) return "duplicate";
        throw err;
      }
    },

    getCase,
    findOpenCase,

    async resolveOrCreateCase(customerIdentifier, now) {
      const existing = await findOpenCase(customerIdentifier);
      if (existing) return { case: existing, created: false };

      const caseId = newCaseId(new Date(now));
      try {
        // messageCount starts at 0; the first append brings it to 1.
        await run(db, `
          insert into cases (caseId, customerIdentifier, status, createdAt, lastMessageAt, messageCount, escalated)
          values (?,?,'open',?,?,0,0)
        `, [caseId, customerIdentifier, now, now]);
      } catch (err) {
        // The partial unique index on open cases lost us the race: use the winner's row.
        if (!isUniqueViolation(err)) throw err;
        const winner = await findOpenCase(customerIdentifier);
        if (!winner) throw err;
        return { case: winner, created: false };
      }

      const created = await getCase(caseId);
      if (!created) throw new Error(`case ${caseId} vanished after insert`);
      return { case: created, created: true };
    },

    async listOpenCases() {
      const rows = await all<CaseRow>(db, `
        select * from cases where status='open' order by lastMessageAt asc
      `);
      return rows.map(rowToCase);
    },

    async appendMessage(caseId, msg: NewMessage, now) {
      const info = await run(db, `
        insert into messages (caseId, sender, isAdmin, body, timestamp, source)
        values (?,?,?,?,?,?)
      `, [caseId, msg.sender, msg.isAdmin ? 1 : 0, msg.body, msg.timestamp, msg.source]);
      await run(db, `
        update cases set messageCount = messageCount + 1, lastMessageAt=? where caseId=?
      `, [now, caseId]);
      return { id: info.lastID, caseId, ...msg };
    },

    listMessages,

    async markEscalated(caseId, at) {
      const info = await run(db, `
        update cases set escalated=1, escalatedAt=? where caseId=? and escalated=0
      `, [at, caseId]);
      return info.changes > 0;
    },

    async markAlerted(caseId, at) {
      await run(db, `update cases set lastEscalationAlertAt=? where caseId=?`, [at, caseId]);
    },

    async closeCase(caseId, at) {
      const info = await run(db, `
        update cases set status='closed', closedAt=? where caseId=? and status='open'
      `, [at, caseId]);
      return info.changes > 0;
    }
  };
}

/**
 * SQLite-backed store. A single connection serves the process, so every
 * operation goes through one queue; write transactions start with
 * `begin immediate`, which also holds off writers in other processes.
 */
export class SqliteStore implements Store {
  private db: sqlite3.Database;
  private tx: CaseTx;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(dbPath: string, newCaseId: (now: Date) => string = generateCaseId) {
    this.db = new sqlite3.Database(dbPath);
    this.db.configure("busyTimeout", 5000);
    this.tx = createTx(this.db, newCaseId);
  }

  async init(): Promise<void> {
    await run(this.db, `pragma journal_mode = wal;`);
    await run(this.db, `pragma foreign_keys = on;`);
    await run(this.db, `
      create table if not exists cases (
        caseId text primary key,
        customerIdentifier text not null,
        status text not null check (status in ('open', 'closed')),
        createdAt text not null,
        lastMessageAt text not null,
        messageCount integer not null default 0,
        escalated integer not null default 0,
        escalatedAt text,
        lastEscalationAlertAt text,
        closedAt text
      );
    `);
    // At most one open case per customer.
    await run(this.db, `
      create unique index if not exists uq_cases_open_customer
      on cases(customerIdentifier) where status = 'open';
    `);
    await run(this.db, `create index if not exists idx_cases_customer on cases(customerIdentifier, createdAt);`);
    await run(this.db, `create index if not exists idx_cases_status on cases(status, lastMessageAt);`);

    await run(this.db, `
      create table if not exists messages (
        id integer primary key autoincrement,
        caseId text not null references cases(caseId) on delete cascade,
        sender text not null,
        isAdmin integer not null,
        body text not null,
        timestamp text not null,
        source text not null check (source in ('email', 'chat'))
      );
    `);
    await run(this.db, `create index if not exists idx_messages_case on messages(caseId, timestamp, id);`);

    await run(this.db, `
      create table if not exists processed_messages (
        externalMessageId text not null,
        source text not null,
        caseId text references cases(caseId) on delete set null,
        processedAt text not null,
        primary key (externalMessageId, source)
      );
    `);
    await run(this.db, `create index if not exists idx_processed_at on processed_messages(processedAt);`);
  }

  close(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.db.close((err) => (err ? reject(err) : resolve()));
    });
  }

  async ping(): Promise<void> {
    await this.exclusive(() => get(this.db, `select 1`));
  }

  transaction<T>(fn: (tx: CaseTx) => Promise<T>): Promise<T> {
    return this.exclusive(async () => {
      await run(this.db, `begin immediate`);
      try {
        const out = await fn(this.tx);
        await run(this.db, `commit`);
        return out;
      } catch (err) {
        await run(this.db, `rollback`);
        throw err;
      }
    });
  }

  getCase(caseId: string): Promise<Case | null> {
    return this.exclusive(() => this.tx.getCase(caseId));
  }

  listCases(q: { status?: CaseStatus; limit?: number; offset?: number }): Promise<Case[]> {
    const limit = Math.min(q.limit ?? 50, 200);
    const offset = q.offset ?? 0;

    const where: string[] = [];
    const params: unknown[] = [];
    if (q.status) { where.push(`status = ?`); params.push(q.status); }

    const sql = `
      select * from cases
      ${where.length ? `where ${where.join(" and ")}` : ""}
      order by lastMessageAt desc, caseId desc
      limit ? offset ?
    `;
    params.push(limit, offset);
    return this.exclusive(async () => {
      const rows = await all<CaseRow>(this.db, sql, params);
      return rows.map(rowToCase);
    });
  }

  listMessages(caseId: string): Promise<Message[]> {
    return this.exclusive(() => this.tx.listMessages(caseId));
  }

  deleteCase(caseId: string): Promise<boolean> {
    return this.exclusive(async () => {
      const info = await run(this.db, `delete from cases where caseId=?`, [caseId]);
      return info.changes > 0;
    });
  }

  pruneProcessed(before: string): Promise<number> {
    return this.exclusive(async () => {
      const info = await run(this.db, `delete from processed_messages where processedAt < ?`, [before]);
      return info.changes;
    });
  }

  private exclusive<T>(fn: () => Promise<T>): Promise<T> {
    const next = this.queue.then(fn);
    // Keep the chain alive after a failure; the caller still sees the rejection through `next`.
    this.queue = next.catch(() => undefined);
    return next;
  }
}
