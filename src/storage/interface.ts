// ============================================================================
// STORAGE INTERFACE CONTRACT
// ============================================================================
// This interface defines the contract the engine relies on for persistence.
// Every task mutation is scoped by (id, ownerId) so one user can never touch
// another user's records.

import {
  ACTIVE_STATUSES,
  Clock,
  CreateTaskInput,
  DailySummary,
  EveningSession,
  NotificationKind,
  Task,
  TaskAnalytics,
  TaskPriority,
  TaskStatus,
  UserProfile,
  StorageConfig,
  TASK_PRIORITIES,
  TASK_STATUSES,
  systemClock,
} from "../types/index.js";
import {
  NotFoundError,
  PersistenceError,
  Result,
  ValidationError,
  err,
  ok,
} from "../errors/index.js";

export const MAX_TITLE_LENGTH = 200;
export const MAX_DESCRIPTION_LENGTH = 2000;

export type TaskMutationResult = Result<Task, NotFoundError | ValidationError | PersistenceError>;

/** A create request after trimming and defaults */
export interface NewTaskValues {
  ownerId: string;
  title: string;
  description: string;
  priority: TaskPriority;
  dueAt: string | null;
}

/**
 * Storage interface that backends must implement.
 * Expected conditions come back as Result values; only programming faults throw.
 */
export interface IStorage {
  // ---- Lifecycle ----

  /**
   * Open the database and create tables
   */
  initialize(): Promise<void>;

  /**
   * Close any open connections and clean up resources
   */
  close(): Promise<void>;

  /**
   * Check if the storage is properly initialized and connected
   */
  isReady(): Promise<boolean>;

  // ---- Task Operations ----

  /**
   * Create a task. Title is required; priority defaults to medium.
   */
  createTask(input: CreateTaskInput): Promise<Result<Task, ValidationError | PersistenceError>>;

  /**
   * List an owner's tasks, newest first
   */
  listTasks(ownerId: string, status?: TaskStatus): Promise<Task[]>;

  /**
   * Load a task by id, only if it belongs to the owner
   */
  getTask(id: string, ownerId: string): Promise<Task | null>;

  /**
   * Change a task's status; completedAt follows the completed status
   */
  updateTaskStatus(id: string, ownerId: string, status: TaskStatus): Promise<TaskMutationResult>;

  /**
   * Change a task's priority
   */
  updateTaskPriority(id: string, ownerId: string, priority: TaskPriority): Promise<TaskMutationResult>;

  /**
   * Delete a task permanently
   * @returns false if the task was not found for this owner
   */
  deleteTask(id: string, ownerId: string): Promise<Result<boolean, PersistenceError>>;

  /**
   * Aggregate counts for an owner
   */
  getAnalytics(ownerId: string): Promise<TaskAnalytics>;

  /**
   * Open tasks (pending or in progress) due at or before `until`, soonest first
   */
  listUpcomingDeadlines(ownerId: string, until: Date): Promise<Task[]>;

  /**
   * Tasks completed at or after `since`
   */
  listCompletedSince(ownerId: string, since: Date): Promise<Task[]>;

  // ---- User Operations ----

  loadUser(id: string): Promise<UserProfile | null>;

  saveUser(user: UserProfile): Promise<Result<void, PersistenceError>>;

  listUsers(): Promise<UserProfile[]>;

  // ---- Evening Session Operations ----

  /**
   * The owner's most recent unfinished session, whatever its date
   */
  loadActiveEveningSession(ownerId: string): Promise<EveningSession | null>;

  /**
   * Whether a session (active or completed) exists for the date
   */
  hasEveningSession(ownerId: string, date: string): Promise<boolean>;

  /**
   * Insert a new session. Fails with ValidationError if one exists for the date.
   */
  createEveningSession(session: EveningSession): Promise<Result<EveningSession, ValidationError | PersistenceError>>;

  saveEveningSession(session: EveningSession): Promise<Result<void, NotFoundError | PersistenceError>>;

  /**
   * Mark the session completed and append its summary in one transaction.
   * Summary history is trimmed to the newest MAX_DAILY_SUMMARIES entries.
   */
  completeEveningSession(
    session: EveningSession,
    summary: DailySummary
  ): Promise<Result<void, NotFoundError | PersistenceError>>;

  /**
   * Summary history, oldest first
   */
  listDailySummaries(ownerId: string): Promise<DailySummary[]>;

  // ---- Notification Markers ----

  /**
   * Atomically replace the marker for (owner, kind) with `value`.
   * @returns true if the stored marker differed (the caller won the claim)
   */
  claimNotificationMarker(
    ownerId: string,
    kind: NotificationKind,
    value: string
  ): Promise<Result<boolean, PersistenceError>>;
}

/**
 * Abstract base class with the validation and aggregation shared by backends
 */
export abstract class BaseStorage implements IStorage {
  protected config: StorageConfig;
  protected clock: Clock;

  constructor(config: StorageConfig, clock: Clock = systemClock) {
    this.config = config;
    this.clock = clock;
  }

  abstract initialize(): Promise<void>;
  abstract close(): Promise<void>;
  abstract isReady(): Promise<boolean>;
  abstract createTask(input: CreateTaskInput): Promise<Result<Task, ValidationError | PersistenceError>>;
  abstract listTasks(ownerId: string, status?: TaskStatus): Promise<Task[]>;
  abstract getTask(id: string, ownerId: string): Promise<Task | null>;
  abstract updateTaskStatus(id: string, ownerId: string, status: TaskStatus): Promise<TaskMutationResult>;
  abstract updateTaskPriority(id: string, ownerId: string, priority: TaskPriority): Promise<TaskMutationResult>;
  abstract deleteTask(id: string, ownerId: string): Promise<Result<boolean, PersistenceError>>;
  abstract getAnalytics(ownerId: string): Promise<TaskAnalytics>;
  abstract loadUser(id: string): Promise<UserProfile | null>;
  abstract saveUser(user: UserProfile): Promise<Result<void, PersistenceError>>;
  abstract listUsers(): Promise<UserProfile[]>;
  abstract loadActiveEveningSession(ownerId: string): Promise<EveningSession | null>;
  abstract hasEveningSession(ownerId: string, date: string): Promise<boolean>;
  abstract createEveningSession(
    session: EveningSession
  ): Promise<Result<EveningSession, ValidationError | PersistenceError>>;
  abstract saveEveningSession(session: EveningSession): Promise<Result<void, NotFoundError | PersistenceError>>;
  abstract completeEveningSession(
    session: EveningSession,
    summary: DailySummary
  ): Promise<Result<void, NotFoundError | PersistenceError>>;
  abstract listDailySummaries(ownerId: string): Promise<DailySummary[]>;
  abstract claimNotificationMarker(
    ownerId: string,
    kind: NotificationKind,
    value: string
  ): Promise<Result<boolean, PersistenceError>>;

  /**
   * Default implementation filtering listTasks in memory
   */
  async listUpcomingDeadlines(ownerId: string, until: Date): Promise<Task[]> {
    const limit = until.getTime();
    const tasks = await this.listTasks(ownerId);
    return tasks
      .filter((t) => ACTIVE_STATUSES.includes(t.status) && t.dueAt !== undefined)
      .filter((t) => Date.parse(t.dueAt ?? "") <= limit)
      .sort((a, b) => Date.parse(a.dueAt ?? "") - Date.parse(b.dueAt ?? ""));
  }

  /**
   * Default implementation filtering listTasks in memory
   */
  async listCompletedSince(ownerId: string, since: Date): Promise<Task[]> {
    const start = since.getTime();
    const tasks = await this.listTasks(ownerId, "completed");
    return tasks.filter((t) => t.completedAt !== undefined && Date.parse(t.completedAt) >= start);
  }

  // ---- Protected Helper Methods ----

  /**
   * Normalize and check a create request. Returns the values to insert.
   */
  protected validateCreateInput(input: CreateTaskInput): Result<NewTaskValues, ValidationError> {
    const ownerId = input.ownerId.trim();
    if (!ownerId) {
      return err(new ValidationError("Owner is required", "ownerId"));
    }

    const title = input.title.trim();
    if (!title) {
      return err(new ValidationError("Task title is required", "title"));
    }
    if (title.length > MAX_TITLE_LENGTH) {
      return err(new ValidationError(`Task title is longer than ${MAX_TITLE_LENGTH} characters`, "title"));
    }

    const description = (input.description ?? "").trim();
    if (description.length > MAX_DESCRIPTION_LENGTH) {
      return err(
        new ValidationError(`Task description is longer than ${MAX_DESCRIPTION_LENGTH} characters`, "description")
      );
    }

    const priority = input.priority ?? "medium";
    if (!TASK_PRIORITIES.includes(priority)) {
      return err(new ValidationError(`Unknown priority: ${priority}`, "priority"));
    }

    let dueAt: string | null = null;
    if (input.dueAt !== undefined) {
      const parsed = Date.parse(input.dueAt);
      if (Number.isNaN(parsed)) {
        return err(new ValidationError(`Invalid due date: ${input.dueAt}`, "dueAt"));
      }
      dueAt = new Date(parsed).toISOString();
    }

    return ok({ ownerId, title, description, priority, dueAt });
  }

  protected validateStatus(status: TaskStatus): ValidationError | null {
    return TASK_STATUSES.includes(status) ? null : new ValidationError(`Unknown status: ${status}`, "status");
  }

  protected validatePriority(priority: TaskPriority): ValidationError | null {
    return TASK_PRIORITIES.includes(priority) ? null : new ValidationError(`Unknown priority: ${priority}`, "priority");
  }

  protected now(): string {
    return this.clock().toISOString();
  }
}

// ---- Analytics ----

/**
 * Completion percentage rounded to two decimals. Exactly 0 when there are no tasks.
 */
export function completionRate(completed: number, total: number): number {
  if (total <= 0) return 0;
  const rate = Math.round((completed / total) * 100 * 100) / 100;
  return Math.min(100, Math.max(0, rate));
}

/**
 * Build analytics from per-status and per-priority counts
 */
export function buildAnalytics(
  statusCounts: Partial<Record<TaskStatus, number>>,
  priorityCounts: Partial<Record<TaskPriority, number>>
): TaskAnalytics {
  const completed = statusCounts.completed ?? 0;
  const inProgress = statusCounts.in_progress ?? 0;
  const pending = statusCounts.pending ?? 0;
  const cancelled = statusCounts.cancelled ?? 0;
  const total = completed + inProgress + pending + cancelled;

  return {
    total,
    completed,
    inProgress,
    pending,
    cancelled,
    completionRate: completionRate(completed, total),
    priorityDistribution: {
      low: priorityCounts.low ?? 0,
      medium: priorityCounts.medium ?? 0,
      high: priorityCounts.high ?? 0,
      urgent: priorityCounts.urgent ?? 0,
    },
  };
}
