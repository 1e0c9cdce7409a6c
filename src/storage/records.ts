// ============================================================================
// STORED RECORD SCHEMAS
// ============================================================================
// Rows come back from SQLite as plain columns plus a few JSON blobs. The blobs
// are validated on the way out so a hand-edited or stale row fails loudly
// instead of leaking an untyped object into the engine.

import { z } from "zod";

import {
  DailySummary,
  EveningSession,
  Task,
  TaskPriority,
  TaskStatus,
  UserProfile,
} from "../types/index.js";

// ---- Row Types ----

export interface TaskRow {
  id: string;
  owner_id: string;
  title: string;
  description: string;
  priority: string;
  status: string;
  created_at: string;
  updated_at: string;
  due_at: string | null;
  completed_at: string | null;
}

export interface UserRow {
  id: string;
  data: string;
}

export interface EveningSessionRow {
  owner_id: string;
  date: string;
  state: string;
  data: string;
  started_at: string;
  completed_at: string | null;
}

export interface DailySummaryRow {
  date: string;
  tasks_reviewed: number;
  tasks_with_progress: number;
  tasks_needing_help: number;
  gratitude_theme: string;
  productivity_level: string;
  summary_text: string;
  created_at: string;
}

// ---- Schemas ----

export const TaskPrioritySchema = z.enum(["low", "medium", "high", "urgent"]);

export const TaskStatusSchema = z.enum(["pending", "in_progress", "completed", "cancelled"]);

const DialogueTurnSchema = z.object({
  role: z.enum(["user", "assistant"]),
  content: z.string(),
});

const TaskChangeSchema = z.discriminatedUnion("field", [
  z.object({ field: z.literal("status"), value: TaskStatusSchema }),
  z.object({ field: z.literal("priority"), value: TaskPrioritySchema }),
]);

const PendingActionSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("delete"),
    taskId: z.string(),
    title: z.string(),
    createdAt: z.string(),
  }),
  z.object({
    kind: z.literal("update"),
    taskId: z.string(),
    title: z.string(),
    change: TaskChangeSchema,
    createdAt: z.string(),
  }),
]);

export const NotificationSettingsSchema = z.object({
  enabled: z.boolean(),
  dailyDigest: z.boolean(),
  deadlineReminders: z.boolean(),
  newTaskNotifications: z.boolean(),
  sendTime: z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/),
  timezone: z.string(),
});

export const UserProfileSchema = z.object({
  id: z.string(),
  timezone: z.string(),
  notifications: NotificationSettingsSchema,
  currentView: z.enum(["main", "tasks", "analytics", "settings"]),
  onboardingStep: z.enum([
    "greeting",
    "anxiety_intro",
    "anxiety_survey",
    "goals",
    "notifications",
    "mentor_intro",
    "completion",
    "completed",
  ]),
  metMentor: z.boolean(),
  anxietyAnswers: z.array(z.number().int().min(1).max(5)),
  anxietyLevel: z.number().nullable(),
  goals: z.array(z.enum(["task_management", "stress_reduction", "productivity", "time_organization"])),
  history: z.array(DialogueTurnSchema),
  pendingAction: PendingActionSchema.nullable(),
  lastMessageId: z.string().nullable(),
  lastReply: z.string().nullable(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

const TaskReviewItemSchema = z.object({
  taskId: z.string(),
  taskTitle: z.string(),
  progressDescription: z.string(),
  needsHelp: z.boolean(),
  helpProvided: z.string(),
  aiSupport: z.string(),
  completed: z.boolean(),
});

/** The part of an evening session kept in the `data` column */
const EveningSessionDataSchema = z.object({
  reviews: z.array(TaskReviewItemSchema),
  currentIndex: z.number().int().min(0),
  gratitude: z.string(),
  summary: z.string(),
  transcript: z.array(DialogueTurnSchema),
});

const EveningSessionStateSchema = z.enum(["starting", "task_review", "gratitude", "summary", "completed"]);

const ProductivityLevelSchema = z.enum(["low", "medium", "high"]);

// ---- Row Mapping ----

export function rowToTask(row: TaskRow): Task {
  const task: Task = {
    id: row.id,
    ownerId: row.owner_id,
    title: row.title,
    description: row.description,
    priority: TaskPrioritySchema.parse(row.priority),
    status: TaskStatusSchema.parse(row.status),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
  if (row.due_at) task.dueAt = row.due_at;
  if (row.completed_at) task.completedAt = row.completed_at;
  return task;
}

export function rowToUser(row: UserRow): UserProfile {
  return UserProfileSchema.parse(JSON.parse(row.data));
}

export function rowToEveningSession(row: EveningSessionRow): EveningSession {
  const data = EveningSessionDataSchema.parse(JSON.parse(row.data));
  const session: EveningSession = {
    ownerId: row.owner_id,
    date: row.date,
    state: EveningSessionStateSchema.parse(row.state),
    ...data,
    startedAt: row.started_at,
  };
  if (row.completed_at) session.completedAt = row.completed_at;
  return session;
}

export function eveningSessionData(session: EveningSession): string {
  return JSON.stringify({
    reviews: session.reviews,
    currentIndex: session.currentIndex,
    gratitude: session.gratitude,
    summary: session.summary,
    transcript: session.transcript,
  });
}

export function rowToDailySummary(row: DailySummaryRow): DailySummary {
  return {
    date: row.date,
    tasksReviewed: row.tasks_reviewed,
    tasksWithProgress: row.tasks_with_progress,
    tasksNeedingHelp: row.tasks_needing_help,
    gratitudeTheme: row.gratitude_theme,
    productivityLevel: ProductivityLevelSchema.parse(row.productivity_level),
    summaryText: row.summary_text,
    createdAt: row.created_at,
  };
}

export function isTaskPriority(value: string): value is TaskPriority {
  return TaskPrioritySchema.safeParse(value).success;
}

export function isTaskStatus(value: string): value is TaskStatus {
  return TaskStatusSchema.safeParse(value).success;
}
