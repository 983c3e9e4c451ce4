import fs from "node:fs";
import path from "node:path";
import { createRequire } from "node:module";
import initSqlJs, { type Database } from "sql.js";
import { z } from "zod";
import { RELAY_ERROR_CODES, RelayError } from "../errors.js";
import { logger as rootLogger, type Logger } from "../log.js";
import type { LedgerSink } from "./ledger.js";
import { INTENT_FLAGS, LEDGER_EVENT_TYPES, STEP_NAMES, type LedgerEvent, type Task } from "./types.js";

/** Keeps the database in memory only; nothing is written to disk. */
export const IN_MEMORY = ":memory:";

/**
 * Locate sql-wasm.wasm: node_modules relative to cwd first, then through
 * module resolution from this file.
 */
function locateSqlWasm(filename: string): string {
  const nodeModulesCandidate = path.resolve(process.cwd(), "node_modules", "sql.js", "dist", filename);
  if (fs.existsSync(nodeModulesCandidate)) return nodeModulesCandidate;

  try {
    const require = createRequire(import.meta.url);
    const resolved = require.resolve(`sql.js/dist/${filename}`);
    if (fs.existsSync(resolved)) return resolved;
  } catch {
    // Not resolvable from here; sql.js reports the missing file itself
  }

  return nodeModulesCandidate;
}

function migrate(db: Database): void {
  db.run(`
    CREATE TABLE IF NOT EXISTS tasks (
      id TEXT PRIMARY KEY,
      state TEXT NOT NULL,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL,
      snapshot_json TEXT NOT NULL
    );
  `);
  db.run(`
    CREATE TABLE IF NOT EXISTS ledger_events (
      seq INTEGER NOT NULL,
      task_id TEXT NOT NULL,
      time TEXT NOT NULL,
      type TEXT NOT NULL,
      payload_json TEXT
    );
  `);
  db.run(`CREATE INDEX IF NOT EXISTS idx_ledger_events_task ON ledger_events(task_id);`);
  db.run(`CREATE INDEX IF NOT EXISTS idx_tasks_state ON tasks(state);`);
}

function safeStringify(payload: unknown): string {
  try {
    return JSON.stringify(payload ?? null);
  } catch {
    return JSON.stringify({ error: "non_serializable_payload" });
  }
}

const FailureSchema = z.object({
  code: z.enum(RELAY_ERROR_CODES).catch("INTERNAL"),
  reason: z.string(),
  details: z.unknown().optional()
});

const StoredTaskSchema = z.object({
  id: z.string(),
  createdAt: z.string(),
  updatedAt: z.string(),
  state: z.enum(["pending", "running", "awaiting_delegate", "completed", "failed"]),
  input: z.object({
    text: z.string(),
    sourceLang: z.string().optional(),
    targetLang: z.string().optional()
  }),
  intent: z.array(z.enum(INTENT_FLAGS)),
  steps: z.array(
    z.object({
      name: z.enum(STEP_NAMES),
      mode: z.enum(["local", "delegated"]),
      status: z.enum(["not_started", "in_progress", "delegated", "done", "failed"]),
      input: z.unknown().optional(),
      output: z.unknown().optional(),
      delegateRef: z
        .object({ remoteId: z.string(), counterparty: z.string(), deadline: z.number() })
        .optional(),
      error: FailureSchema.optional(),
      startedAt: z.string().optional(),
      finishedAt: z.string().optional()
    })
  ),
  artifacts: z.record(z.string()),
  failure: FailureSchema.extend({ step: z.enum(STEP_NAMES).optional() }).optional(),
  origin: z
    .object({ caller: z.string(), callbackUrl: z.string().optional(), closedAt: z.string().optional() })
    .optional()
});

export type StoredLedgerEvent = Pick<LedgerEvent, "seq" | "time" | "type"> & { payload: unknown };

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return null;
  }
}

/**
 * sql.js-backed ledger store. Writes the task snapshot and the audit event on
 * every mutation and rehydrates tasks at startup.
 *
 * If initialisation fails the store is degraded: persist() becomes a no-op
 * and the ledger keeps working in memory.
 */
export class SqliteLedgerStore implements LedgerSink {
  private readonly dbPath: string;
  private readonly log: Logger;
  private db?: Database;
  private _degraded = false;
  private _degradedReason?: string;

  constructor(dbPath: string, logger?: Logger) {
    this.dbPath = dbPath;
    this.log = (logger ?? rootLogger).child({ component: "ledger-store" });
  }

  get isDegraded(): boolean {
    return this._degraded;
  }

  get degradedReason(): string | undefined {
    return this._degradedReason;
  }

  /**
   * Returns true on success, false when the store entered degraded mode.
   */
  async init(): Promise<boolean> {
    try {
      const SQL = await initSqlJs({ locateFile: (filename: string) => locateSqlWasm(filename) }).catch(
        (err: unknown) => {
          throw new RelayError("LEDGER_INIT_FAILED", "Failed to initialize sql.js (missing/invalid wasm?)", {
            err: err instanceof Error ? { name: err.name, message: err.message } : err
          });
        }
      );
      if (this.dbPath !== IN_MEMORY && fs.existsSync(this.dbPath)) {
        this.db = new SQL.Database(fs.readFileSync(this.dbPath));
      } else {
        this.db = new SQL.Database();
      }
      migrate(this.db);
      this.flush();
      this._degraded = false;
      return true;
    } catch (err) {
      this._degraded = true;
      this._degradedReason = err instanceof Error ? err.message : String(err);
      this.log.warn(`Ledger store init failed (degraded mode): ${this._degradedReason}`);
      return false;
    }
  }

  persist(task: Task, event: LedgerEvent): void {
    if (this._degraded) return;
    const db = this.requireDb();
    db.run(
      `INSERT OR REPLACE INTO tasks (id, state, created_at, updated_at, snapshot_json) VALUES (?, ?, ?, ?, ?)`,
      [task.id, task.state, task.createdAt, task.updatedAt, safeStringify(task)]
    );
    db.run(`INSERT INTO ledger_events (seq, task_id, time, type, payload_json) VALUES (?, ?, ?, ?, ?)`, [
      event.seq,
      event.taskId,
      event.time,
      event.type,
      safeStringify(event.payload)
    ]);
    this.flush();
  }

  forget(taskId: string): void {
    if (this._degraded) return;
    const db = this.requireDb();
    db.run(`DELETE FROM tasks WHERE id = ?`, [taskId]);
    db.run(`DELETE FROM ledger_events WHERE task_id = ?`, [taskId]);
    this.flush();
  }

  /**
   * Load every stored task. Rows that no longer match the task shape are
   * skipped and logged.
   */
  load(): Task[] {
    if (this._degraded) return [];
    const db = this.requireDb();
    const stmt = db.prepare(`SELECT id, snapshot_json FROM tasks ORDER BY created_at ASC`);
    const tasks: Task[] = [];
    try {
      while (stmt.step()) {
        const row = stmt.getAsObject();
        const raw = typeof row.snapshot_json === "string" ? row.snapshot_json : "null";
        const parsed = StoredTaskSchema.safeParse(parseJson(raw));
        if (parsed.success) {
          tasks.push(parsed.data);
        } else {
          this.log.warn({ id: String(row.id ?? "") }, "Skipping unreadable task row");
        }
      }
    } finally {
      stmt.free();
    }
    return tasks;
  }

  /**
   * Highest audit sequence number stored, 0 when there is none.
   */
  lastSeq(): number {
    if (this._degraded) return 0;
    const db = this.requireDb();
    const result = db.exec(`SELECT MAX(seq) AS seq FROM ledger_events`);
    const value = result[0]?.values[0]?.[0];
    return typeof value === "number" ? value : 0;
  }

  /**
   * Audit events recorded for a task, oldest first.
   */
  events(taskId: string): StoredLedgerEvent[] {
    if (this._degraded) return [];
    const db = this.requireDb();
    const stmt = db.prepare(
      `SELECT seq, time, type, payload_json FROM ledger_events WHERE task_id = ? ORDER BY seq ASC`
    );
    const rows: StoredLedgerEvent[] = [];
    try {
      stmt.bind([taskId]);
      while (stmt.step()) {
        const row = stmt.getAsObject();
        const type = z.enum(LEDGER_EVENT_TYPES).safeParse(row.type);
        if (!type.success) continue;
        rows.push({
          seq: Number(row.seq ?? 0),
          time: String(row.time ?? ""),
          type: type.data,
          payload: parseJson(typeof row.payload_json === "string" ? row.payload_json : "null")
        });
      }
    } finally {
      stmt.free();
    }
    return rows;
  }

  close(): void {
    this.flush();
    this.db?.close();
    this.db = undefined;
  }

  private flush(): void {
    if (!this.db || this.dbPath === IN_MEMORY) return;
    fs.mkdirSync(path.dirname(this.dbPath), { recursive: true });
    fs.writeFileSync(this.dbPath, Buffer.from(this.db.export()));
  }

  private requireDb(): Database {
    if (!this.db) {
      throw new RelayError("LEDGER_INIT_FAILED", "SqliteLedgerStore not initialized");
    }
    return this.db;
  }
}
