// ============================================================================
// CORE TYPES - Shared across CLI, Server, Storage and the conversation engine
// ============================================================================

// ---- Task Types ----

export type TaskPriority = "low" | "medium" | "high" | "urgent";

export type TaskStatus = "pending" | "in_progress" | "completed" | "cancelled";

export const TASK_PRIORITIES: readonly TaskPriority[] = ["low", "medium", "high", "urgent"];

export const TASK_STATUSES: readonly TaskStatus[] = ["pending", "in_progress", "completed", "cancelled"];

/** Statuses a task can be in while it still needs work. */
export const ACTIVE_STATUSES: readonly TaskStatus[] = ["pending", "in_progress"];

export interface Task {
  id: string;
  ownerId: string;
  title: string;
  description: string;
  priority: TaskPriority;
  status: TaskStatus;
  createdAt: string;
  updatedAt: string;
  dueAt?: string;
  // Present only while status is "completed"
  completedAt?: string;
}

export interface CreateTaskInput {
  ownerId: string;
  title: string;
  description?: string;
  priority?: TaskPriority;
  dueAt?: string;
}

export interface TaskAnalytics {
  total: number;
  completed: number;
  inProgress: number;
  pending: number;
  cancelled: number;
  /** Percentage in [0, 100], two decimals. Exactly 0 when there are no tasks. */
  completionRate: number;
  priorityDistribution: Record<TaskPriority, number>;
}

// ---- User Types ----

export type UserView = "main" | "tasks" | "analytics" | "settings";

export type OnboardingStep =
  | "greeting"
  | "anxiety_intro"
  | "anxiety_survey"
  | "goals"
  | "notifications"
  | "mentor_intro"
  | "completion"
  | "completed";

export type GoalId = "task_management" | "stress_reduction" | "productivity" | "time_organization";

export type NotificationFlag = "dailyDigest" | "deadlineReminders" | "newTaskNotifications";

export interface NotificationSettings {
  enabled: boolean;
  dailyDigest: boolean;
  deadlineReminders: boolean;
  newTaskNotifications: boolean;
  sendTime: string; // HH:MM
  timezone: string; // IANA zone
}

export interface DialogueTurn {
  role: "user" | "assistant";
  content: string;
}

/**
 * An action surfaced to the user that waits for an explicit "yes".
 * Only one can be pending per user; any other turn replaces or clears it.
 */
export type PendingAction =
  | { kind: "delete"; taskId: string; title: string; createdAt: string }
  | {
      kind: "update";
      taskId: string;
      title: string;
      change: TaskChange;
      createdAt: string;
    };

export type TaskChange =
  | { field: "status"; value: TaskStatus }
  | { field: "priority"; value: TaskPriority };

export interface UserProfile {
  id: string;
  timezone: string;
  notifications: NotificationSettings;
  currentView: UserView;
  onboardingStep: OnboardingStep;
  metMentor: boolean;
  anxietyAnswers: number[];
  anxietyLevel: number | null;
  goals: GoalId[];
  history: DialogueTurn[];
  pendingAction: PendingAction | null;
  lastMessageId: string | null;
  lastReply: string | null;
  createdAt: string;
  updatedAt: string;
}

// ---- Evening Reflection Types ----

export type EveningSessionState = "starting" | "task_review" | "gratitude" | "summary" | "completed";

export interface TaskReviewItem {
  taskId: string;
  taskTitle: string;
  progressDescription: string;
  needsHelp: boolean;
  helpProvided: string;
  aiSupport: string;
  completed: boolean;
}

export interface EveningSession {
  ownerId: string;
  date: string; // YYYY-MM-DD in the owner's timezone
  state: EveningSessionState;
  reviews: TaskReviewItem[];
  currentIndex: number;
  gratitude: string;
  summary: string;
  transcript: DialogueTurn[];
  startedAt: string;
  completedAt?: string;
}

export type ProductivityLevel = "low" | "medium" | "high";

export interface DailySummary {
  date: string;
  tasksReviewed: number;
  tasksWithProgress: number;
  tasksNeedingHelp: number;
  gratitudeTheme: string;
  productivityLevel: ProductivityLevel;
  summaryText: string;
  createdAt: string;
}

// ---- Notification Types ----

export type NotificationKind = "daily_digest" | "deadline_reminder" | "new_task";

export interface Notification {
  userId: string;
  kind: NotificationKind;
  text: string;
  createdAt: string;
}

// ---- LLM Config Types ----

export interface BedrockConfig {
  model?: string;
  region?: string;
}

export interface OpenAIConfig {
  baseUrl: string;
  apiKey: string;
  model: string;
}

export interface LocalConfig {
  baseUrl: string;
  model: string;
  apiKey?: string;
}

export interface LLMConfig {
  provider: "bedrock" | "openai" | "local";
  bedrock?: BedrockConfig;
  openai?: OpenAIConfig;
  local?: LocalConfig;
  /** Upper bound for a single completion call, in milliseconds */
  timeoutMs: number;
}

// ---- Storage Config Types ----

export interface SQLiteStorageConfig {
  type: "sqlite";
  path: string; // file path or ":memory:"
}

export type StorageConfig = SQLiteStorageConfig;

// ---- Scheduler / Server / Log Config Types ----

export interface SchedulerConfig {
  enabled: boolean;
  digestTime: string; // HH:MM on the deployment clock
  timezone: string;
  deadlineIntervalMinutes: number;
  deadlineHorizonHours: number;
  tickSeconds: number;
}

export interface ServerConfig {
  host: string;
  port: number;
}

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface DuskConfig {
  llm: LLMConfig;
  storage: StorageConfig;
  scheduler: SchedulerConfig;
  server: ServerConfig;
  log: { level: LogLevel };
}

// ---- Defaults ----

export const DEFAULT_LLM_CONFIG: LLMConfig = {
  provider: "bedrock",
  bedrock: {
    model: "anthropic.claude-3-5-sonnet-20241022-v2:0",
    region: "us-east-1",
  },
  timeoutMs: 20_000,
};

export const DEFAULT_SCHEDULER_CONFIG: SchedulerConfig = {
  enabled: true,
  digestTime: "09:00",
  timezone: "UTC",
  deadlineIntervalMinutes: 120,
  deadlineHorizonHours: 24,
  tickSeconds: 60,
};

export const DEFAULT_SERVER_CONFIG: ServerConfig = {
  host: "0.0.0.0",
  port: 3847,
};

export const DEFAULT_NOTIFICATION_SETTINGS: NotificationSettings = {
  enabled: true,
  dailyDigest: false,
  deadlineReminders: false,
  newTaskNotifications: false,
  sendTime: "09:00",
  timezone: "UTC",
};

export const MAX_HISTORY_TURNS = 20;

export const MAX_DAILY_SUMMARIES = 30;

export function createUserProfile(id: string, now: Date, timezone = "UTC"): UserProfile {
  const stamp = now.toISOString();
  return {
    id,
    timezone,
    notifications: { ...DEFAULT_NOTIFICATION_SETTINGS, timezone },
    currentView: "main",
    onboardingStep: "greeting",
    metMentor: false,
    anxietyAnswers: [],
    anxietyLevel: null,
    goals: [],
    history: [],
    pendingAction: null,
    lastMessageId: null,
    lastReply: null,
    createdAt: stamp,
    updatedAt: stamp,
  };
}

/** Source of the current time; injected so tests and the scheduler share one clock. */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
