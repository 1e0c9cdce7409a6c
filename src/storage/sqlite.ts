// ============================================================================
// SQLITE STORAGE IMPLEMENTATION
// ============================================================================
// The canonical store, on better-sqlite3 (a file path or ":memory:").
// better-sqlite3 is synchronous; every write runs inside db.transaction() so a
// thrown driver error rolls the whole operation back.

import type BetterSqlite3 from "better-sqlite3";
import { randomUUID } from "crypto";

import { BaseStorage, TaskMutationResult, buildAnalytics } from "./interface.js";
import {
  DailySummaryRow,
  EveningSessionRow,
  TaskRow,
  UserRow,
  eveningSessionData,
  isTaskPriority,
  isTaskStatus,
  rowToDailySummary,
  rowToEveningSession,
  rowToTask,
  rowToUser,
} from "./records.js";
import {
  Clock,
  CreateTaskInput,
  DailySummary,
  EveningSession,
  NotificationKind,
  SQLiteStorageConfig,
  Task,
  TaskAnalytics,
  TaskPriority,
  TaskStatus,
  UserProfile,
  MAX_DAILY_SUMMARIES,
} from "../types/index.js";
import {
  NotFoundError,
  PersistenceError,
  Result,
  ValidationError,
  describeError,
  err,
  ok,
} from "../errors/index.js";
import { createLogger } from "../logging/index.js";

const log = createLogger("storage");

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS tasks (
    id TEXT PRIMARY KEY,
    owner_id TEXT NOT NULL,
    title TEXT NOT NULL,
    description TEXT NOT NULL DEFAULT '',
    priority TEXT NOT NULL CHECK (priority IN ('low', 'medium', 'high', 'urgent')),
    status TEXT NOT NULL CHECK (status IN ('pending', 'in_progress', 'completed', 'cancelled')),
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL,
    due_at TEXT,
    completed_at TEXT,
    CHECK ((status = 'completed') = (completed_at IS NOT NULL))
  );

  CREATE INDEX IF NOT EXISTS idx_tasks_owner ON tasks(owner_id, created_at);
  CREATE INDEX IF NOT EXISTS idx_tasks_due ON tasks(owner_id, due_at);

  CREATE TABLE IF NOT EXISTS users (
    id TEXT PRIMARY KEY,
    data TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS evening_sessions (
    owner_id TEXT NOT NULL,
    date TEXT NOT NULL,
    state TEXT NOT NULL,
    data TEXT NOT NULL,
    started_at TEXT NOT NULL,
    completed_at TEXT,
    PRIMARY KEY (owner_id, date)
  );

  CREATE TABLE IF NOT EXISTS daily_summaries (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    owner_id TEXT NOT NULL,
    date TEXT NOT NULL,
    tasks_reviewed INTEGER NOT NULL,
    tasks_with_progress INTEGER NOT NULL,
    tasks_needing_help INTEGER NOT NULL,
    gratitude_theme TEXT NOT NULL,
    productivity_level TEXT NOT NULL,
    summary_text TEXT NOT NULL,
    created_at TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_summaries_owner ON daily_summaries(owner_id, id);

  CREATE TABLE IF NOT EXISTS notification_markers (
    owner_id TEXT NOT NULL,
    kind TEXT NOT NULL,
    value TEXT NOT NULL,
    updated_at TEXT NOT NULL,
    PRIMARY KEY (owner_id, kind)
  );
`;

export class SQLiteStorage extends BaseStorage {
  private db: BetterSqlite3.Database | null = null;
  private dbPath: string;

  constructor(config: SQLiteStorageConfig, clock?: Clock) {
    super(config, clock);
    this.dbPath = config.path;
  }

  async initialize(): Promise<void> {
    if (this.db) return;

    // Dynamic import keeps the native module out of code paths that never open a store
    const Database = (await import("better-sqlite3")).default;
    const db = new Database(this.dbPath);
    if (this.dbPath !== ":memory:") {
      db.pragma("journal_mode = WAL");
    }
    db.exec(SCHEMA);
    this.db = db;
    log.debug(`Opened ${this.dbPath}`);
  }

  async close(): Promise<void> {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  async isReady(): Promise<boolean> {
    return this.db !== null;
  }

  // ---- Task Operations ----

  async createTask(input: CreateTaskInput): Promise<Result<Task, ValidationError | PersistenceError>> {
    const validated = this.validateCreateInput(input);
    if (!validated.ok) return validated;

    const values = validated.value;
    const now = this.now();
    const task: Task = {
      id: randomUUID(),
      ownerId: values.ownerId,
      title: values.title,
      description: values.description,
      priority: values.priority,
      status: "pending",
      createdAt: now,
      updatedAt: now,
    };
    if (values.dueAt) task.dueAt = values.dueAt;

    const insert = this.database.prepare<
      [string, string, string, string, string, string, string, string, string | null]
    >(`
      INSERT INTO tasks (id, owner_id, title, description, priority, status, created_at, updated_at, due_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);

    const written = this.write("createTask", () => {
      insert.run(
        task.id,
        task.ownerId,
        task.title,
        task.description,
        task.priority,
        task.status,
        task.createdAt,
        task.updatedAt,
        values.dueAt
      );
    });
    if (!written.ok) return written;

    return ok(task);
  }

  async listTasks(ownerId: string, status?: TaskStatus): Promise<Task[]> {
    const rows = status
      ? this.database
          .prepare<[string, string], TaskRow>(
            "SELECT * FROM tasks WHERE owner_id = ? AND status = ? ORDER BY created_at DESC, rowid DESC"
          )
          .all(ownerId, status)
      : this.database
          .prepare<[string], TaskRow>("SELECT * FROM tasks WHERE owner_id = ? ORDER BY created_at DESC, rowid DESC")
          .all(ownerId);

    return rows.map(rowToTask);
  }

  async getTask(id: string, ownerId: string): Promise<Task | null> {
    const row = this.database
      .prepare<[string, string], TaskRow>("SELECT * FROM tasks WHERE id = ? AND owner_id = ?")
      .get(id, ownerId);
    return row ? rowToTask(row) : null;
  }

  async updateTaskStatus(id: string, ownerId: string, status: TaskStatus): Promise<TaskMutationResult> {
    const invalid = this.validateStatus(status);
    if (invalid) return err(invalid);

    const now = this.now();
    const update = this.database.prepare<[string, string | null, string, string, string]>(
      "UPDATE tasks SET status = ?, completed_at = ?, updated_at = ? WHERE id = ? AND owner_id = ?"
    );

    return this.mutateTask("updateTaskStatus", id, ownerId, (current) => {
      // Re-completing a completed task keeps its first completion time
      const completedAt = status === "completed" ? (current.completed_at ?? now) : null;
      update.run(status, completedAt, now, id, ownerId);
    });
  }

  async updateTaskPriority(id: string, ownerId: string, priority: TaskPriority): Promise<TaskMutationResult> {
    const invalid = this.validatePriority(priority);
    if (invalid) return err(invalid);

    const now = this.now();
    const update = this.database.prepare<[string, string, string, string]>(
      "UPDATE tasks SET priority = ?, updated_at = ? WHERE id = ? AND owner_id = ?"
    );

    return this.mutateTask("updateTaskPriority", id, ownerId, () => {
      update.run(priority, now, id, ownerId);
    });
  }

  async deleteTask(id: string, ownerId: string): Promise<Result<boolean, PersistenceError>> {
    const remove = this.database.prepare<[string, string]>("DELETE FROM tasks WHERE id = ? AND owner_id = ?");
    return this.write("deleteTask", () => remove.run(id, ownerId).changes > 0);
  }

  async getAnalytics(ownerId: string): Promise<TaskAnalytics> {
    const byStatus = this.database
      .prepare<[string], { status: string; count: number }>(
        "SELECT status, COUNT(*) AS count FROM tasks WHERE owner_id = ? GROUP BY status"
      )
      .all(ownerId);
    const byPriority = this.database
      .prepare<[string], { priority: string; count: number }>(
        "SELECT priority, COUNT(*) AS count FROM tasks WHERE owner_id = ? GROUP BY priority"
      )
      .all(ownerId);

    const statusCounts: Partial<Record<TaskStatus, number>> = {};
    for (const row of byStatus) {
      if (isTaskStatus(row.status)) statusCounts[row.status] = row.count;
    }
    const priorityCounts: Partial<Record<TaskPriority, number>> = {};
    for (const row of byPriority) {
      if (isTaskPriority(row.priority)) priorityCounts[row.priority] = row.count;
    }

    return buildAnalytics(statusCounts, priorityCounts);
  }

  // ---- User Operations ----

  async loadUser(id: string): Promise<UserProfile | null> {
    const row = this.database.prepare<[string], UserRow>("SELECT id, data FROM users WHERE id = ?").get(id);
    return row ? rowToUser(row) : null;
  }

  async saveUser(user: UserProfile): Promise<Result<void, PersistenceError>> {
    const upsert = this.database.prepare<[string, string, string]>(`
      INSERT INTO users (id, data, updated_at) VALUES (?, ?, ?)
      ON CONFLICT(id) DO UPDATE SET data = excluded.data, updated_at = excluded.updated_at
    `);
    return this.write("saveUser", () => {
      upsert.run(user.id, JSON.stringify(user), user.updatedAt);
    });
  }

  async listUsers(): Promise<UserProfile[]> {
    const rows = this.database.prepare<[], UserRow>("SELECT id, data FROM users ORDER BY id").all();
    return rows.map(rowToUser);
  }

  // ---- Evening Session Operations ----

  async loadActiveEveningSession(ownerId: string): Promise<EveningSession | null> {
    const row = this.database
      .prepare<[string], EveningSessionRow>(
        "SELECT * FROM evening_sessions WHERE owner_id = ? AND state != 'completed' ORDER BY date DESC LIMIT 1"
      )
      .get(ownerId);
    return row ? rowToEveningSession(row) : null;
  }

  async hasEveningSession(ownerId: string, date: string): Promise<boolean> {
    const row = this.database
      .prepare<[string, string], { found: number }>(
        "SELECT 1 AS found FROM evening_sessions WHERE owner_id = ? AND date = ?"
      )
      .get(ownerId, date);
    return row !== undefined;
  }

  async createEveningSession(
    session: EveningSession
  ): Promise<Result<EveningSession, ValidationError | PersistenceError>> {
    const exists = this.database.prepare<[string, string], { found: number }>(
      "SELECT 1 AS found FROM evening_sessions WHERE owner_id = ? AND date = ?"
    );
    const insert = this.database.prepare<[string, string, string, string, string]>(`
      INSERT INTO evening_sessions (owner_id, date, state, data, started_at)
      VALUES (?, ?, ?, ?, ?)
    `);

    const written = this.write("createEveningSession", () => {
      if (exists.get(session.ownerId, session.date)) return false;
      insert.run(session.ownerId, session.date, session.state, eveningSessionData(session), session.startedAt);
      return true;
    });
    if (!written.ok) return written;
    if (!written.value) {
      return err(new ValidationError(`A reflection session already exists for ${session.date}`, "date"));
    }
    return ok(session);
  }

  async saveEveningSession(session: EveningSession): Promise<Result<void, NotFoundError | PersistenceError>> {
    const update = this.database.prepare<[string, string, string | null, string, string]>(
      "UPDATE evening_sessions SET state = ?, data = ?, completed_at = ? WHERE owner_id = ? AND date = ?"
    );

    const written = this.write("saveEveningSession", () => {
      return (
        update.run(
          session.state,
          eveningSessionData(session),
          session.completedAt ?? null,
          session.ownerId,
          session.date
        ).changes > 0
      );
    });
    if (!written.ok) return written;
    if (!written.value) return err(new NotFoundError("Evening session", `${session.ownerId}/${session.date}`));
    return ok(undefined);
  }

  async completeEveningSession(
    session: EveningSession,
    summary: DailySummary
  ): Promise<Result<void, NotFoundError | PersistenceError>> {
    const completedAt = session.completedAt ?? this.now();
    const update = this.database.prepare<[string, string, string, string]>(
      "UPDATE evening_sessions SET state = 'completed', data = ?, completed_at = ? WHERE owner_id = ? AND date = ?"
    );
    const insert = this.database.prepare<
      [string, string, number, number, number, string, string, string, string]
    >(`
      INSERT INTO daily_summaries (
        owner_id, date, tasks_reviewed, tasks_with_progress, tasks_needing_help,
        gratitude_theme, productivity_level, summary_text, created_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
    const trim = this.database.prepare<[string, string, number]>(`
      DELETE FROM daily_summaries WHERE owner_id = ? AND id NOT IN (
        SELECT id FROM daily_summaries WHERE owner_id = ? ORDER BY id DESC LIMIT ?
      )
    `);

    const written = this.write("completeEveningSession", () => {
      const changed = update.run(eveningSessionData(session), completedAt, session.ownerId, session.date).changes;
      if (changed === 0) return false;
      insert.run(
        session.ownerId,
        summary.date,
        summary.tasksReviewed,
        summary.tasksWithProgress,
        summary.tasksNeedingHelp,
        summary.gratitudeTheme,
        summary.productivityLevel,
        summary.summaryText,
        summary.createdAt
      );
      trim.run(session.ownerId, session.ownerId, MAX_DAILY_SUMMARIES);
      return true;
    });
    if (!written.ok) return written;
    if (!written.value) return err(new NotFoundError("Evening session", `${session.ownerId}/${session.date}`));
    return ok(undefined);
  }

  async listDailySummaries(ownerId: string): Promise<DailySummary[]> {
    const rows = this.database
      .prepare<[string], DailySummaryRow>("SELECT * FROM daily_summaries WHERE owner_id = ? ORDER BY id ASC")
      .all(ownerId);
    return rows.map(rowToDailySummary);
  }

  // ---- Notification Markers ----

  async claimNotificationMarker(
    ownerId: string,
    kind: NotificationKind,
    value: string
  ): Promise<Result<boolean, PersistenceError>> {
    const select = this.database.prepare<[string, string], { value: string }>(
      "SELECT value FROM notification_markers WHERE owner_id = ? AND kind = ?"
    );
    const upsert = this.database.prepare<[string, string, string, string]>(`
      INSERT INTO notification_markers (owner_id, kind, value, updated_at) VALUES (?, ?, ?, ?)
      ON CONFLICT(owner_id, kind) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at
    `);
    const now = this.now();

    return this.write("claimNotificationMarker", () => {
      if (select.get(ownerId, kind)?.value === value) return false;
      upsert.run(ownerId, kind, value, now);
      return true;
    });
  }

  // ---- Private Helpers ----

  protected get database(): BetterSqlite3.Database {
    if (!this.db) {
      throw new Error("SQLite database not initialized. Call initialize() first.");
    }
    return this.db;
  }

  /**
   * Run `fn` in a transaction; driver errors roll back and become PersistenceError
   */
  private write<T>(operation: string, fn: () => T): Result<T, PersistenceError> {
    try {
      return ok(this.database.transaction(fn)());
    } catch (error) {
      log.error(`${operation} failed`, error);
      return err(new PersistenceError(`${operation} failed: ${describeError(error)}`, { cause: error }));
    }
  }

  /**
   * Apply an owner-scoped update to a task and return the row as stored afterwards
   */
  private mutateTask(operation: string, id: string, ownerId: string, apply: (current: TaskRow) => void): TaskMutationResult {
    const select = this.database.prepare<[string, string], TaskRow>(
      "SELECT * FROM tasks WHERE id = ? AND owner_id = ?"
    );

    const written = this.write(operation, () => {
      const current = select.get(id, ownerId);
      if (!current) return null;
      apply(current);
      return select.get(id, ownerId) ?? null;
    });
    if (!written.ok) return written;
    if (!written.value) return err(new NotFoundError("Task", id));
    return ok(rowToTask(written.value));
  }
}
