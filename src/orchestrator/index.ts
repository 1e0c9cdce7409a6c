// ============================================================================
// ORCHESTRATOR
// ============================================================================
// Top-level router for inbound turns. Per user, strictly one turn at a time:
//   1. an unfinished onboarding owns the turn
//   2. then an unfinished evening review, even one begun before midnight
//   3. otherwise the intent resolver (completion service, keywords on failure)
//      and a dispatch to the task store, the reflection starter or the mentor

import {
  ACTIVE_STATUSES,
  Clock,
  EveningSession,
  NotificationSettings,
  PendingAction,
  Task,
  TaskChange,
  UserProfile,
  MAX_HISTORY_TURNS,
  createUserProfile,
  systemClock,
} from "../types/index.js";
import { IStorage } from "../storage/index.js";
import { IntentDecision, IntentResolver, ResolveInput, describeChange } from "../resolver/index.js";
import { OnboardingAction, OnboardingFlow } from "../sessions/onboarding.js";
import { ReflectionFlow } from "../sessions/reflection.js";
import { Mentor } from "../mentor/index.js";
import { Notifier, deliverSafely } from "../notifications/index.js";
import {
  NotFoundError,
  PersistenceError,
  ResolverFailure,
  Result,
  ValidationError,
  describeError,
  err,
  ok,
} from "../errors/index.js";
import { isValidTimezone } from "../time/index.js";
import { formatAnalytics, formatTaskLine, formatTaskList } from "../format/index.js";
import { createLogger } from "../logging/index.js";
import { UserLocks } from "./locks.js";

export { UserLocks } from "./locks.js";

const log = createLogger("orchestrator");

export const EMPTY_MESSAGE_REPLY = "I didn't catch that. Could you say it again?";
export const SAVE_FAILED_REPLY = "Something went wrong while saving. Nothing was changed; please try again.";

export interface InboundMessage {
  userId: string;
  text: string;
  /** Transport-level id; a resend with the same id gets the stored reply */
  messageId?: string;
}

export interface ChatReply {
  userId: string;
  reply: string;
  /** True when the message was a resend and nothing was processed */
  duplicate: boolean;
}

export interface OrchestratorDeps {
  storage: IStorage;
  resolver: IntentResolver;
  onboarding: OnboardingFlow;
  reflection: ReflectionFlow;
  mentor: Mentor;
  notifier: Notifier;
  locks: UserLocks;
  clock?: Clock;
  defaultTimezone?: string;
}

const TIME_OF_DAY = /^([01]\d|2[0-3]):[0-5]\d$/;

export type SettingsPatch = Partial<NotificationSettings> & { timezone?: string };

export class Orchestrator {
  private storage: IStorage;
  private resolver: IntentResolver;
  private onboarding: OnboardingFlow;
  private reflection: ReflectionFlow;
  private mentor: Mentor;
  private notifier: Notifier;
  private locks: UserLocks;
  private clock: Clock;
  private defaultTimezone: string;

  constructor(deps: OrchestratorDeps) {
    this.storage = deps.storage;
    this.resolver = deps.resolver;
    this.onboarding = deps.onboarding;
    this.reflection = deps.reflection;
    this.mentor = deps.mentor;
    this.notifier = deps.notifier;
    this.locks = deps.locks;
    this.clock = deps.clock ?? systemClock;
    this.defaultTimezone = deps.defaultTimezone ?? "UTC";
  }

  // ---- Entry Points ----

  async handleMessage(message: InboundMessage): Promise<ChatReply> {
    return this.locks.run(message.userId, () => this.processMessage(message));
  }

  /**
   * A structured action (button press). Only onboarding takes actions.
   */
  async handleAction(userId: string, action: OnboardingAction): Promise<ChatReply> {
    return this.locks.run(userId, async () => {
      const user = await this.loadOrCreateUser(userId);
      if (!this.onboarding.isActive(user)) {
        return { userId, reply: "Setup is already complete.", duplicate: false };
      }

      const turn = await this.onboarding.handle(user, { kind: "action", action });
      const saved = await this.storage.saveUser(turn.user);
      if (!saved.ok) return { userId, reply: SAVE_FAILED_REPLY, duplicate: false };
      return { userId, reply: turn.reply, duplicate: false };
    });
  }

  /**
   * Load a profile, creating it on first contact
   */
  async getUser(userId: string): Promise<UserProfile> {
    return this.locks.run(userId, () => this.loadOrCreateUser(userId));
  }

  /**
   * Apply a partial settings change. The profile timezone and the
   * notification timezone are kept in step.
   */
  async updateSettings(
    userId: string,
    patch: SettingsPatch
  ): Promise<Result<UserProfile, ValidationError | PersistenceError>> {
    if (patch.timezone !== undefined && !isValidTimezone(patch.timezone)) {
      return err(new ValidationError(`Unknown timezone: ${patch.timezone}`, "timezone"));
    }
    if (patch.sendTime !== undefined && !TIME_OF_DAY.test(patch.sendTime)) {
      return err(new ValidationError(`Send time must be HH:MM, got ${patch.sendTime}`, "sendTime"));
    }

    return this.locks.run(userId, async () => {
      const user = await this.loadOrCreateUser(userId);
      const timezone = patch.timezone ?? user.timezone;
      const updated: UserProfile = {
        ...user,
        timezone,
        notifications: { ...user.notifications, ...patch, timezone },
        updatedAt: this.clock().toISOString(),
      };
      const saved = await this.storage.saveUser(updated);
      if (!saved.ok) return saved;
      return ok(updated);
    });
  }

  /**
   * Start tonight's review outside of a chat turn
   */
  async startReflection(userId: string): Promise<Result<string, ValidationError | PersistenceError>> {
    return this.locks.run(userId, async () => {
      const user = await this.loadOrCreateUser(userId);
      const started = await this.reflection.start(user);
      if (!started.ok) return started;
      return ok(started.value.reply);
    });
  }

  /**
   * The evening review later turns would be routed into, or null
   */
  async currentReflection(userId: string): Promise<EveningSession | null> {
    return this.locks.run(userId, async () => {
      const user = await this.loadOrCreateUser(userId);
      return this.reflection.activeSession(user);
    });
  }

  // ---- Turn Processing ----

  private async processMessage(message: InboundMessage): Promise<ChatReply> {
    const { userId } = message;
    const text = message.text.trim();
    if (!text) {
      return { userId, reply: EMPTY_MESSAGE_REPLY, duplicate: false };
    }

    const user = await this.loadOrCreateUser(userId);

    if (message.messageId && user.lastMessageId === message.messageId && user.lastReply !== null) {
      log.debug(`Resend of ${message.messageId} from ${userId}`);
      return { userId, reply: user.lastReply, duplicate: true };
    }

    const turn = await this.route(user, text);
    const updated = this.recordTurn(turn.user, text, turn.reply, message.messageId);

    const saved = await this.storage.saveUser(updated);
    if (!saved.ok) {
      log.error(`Could not save profile for ${userId}`, saved.error);
    }

    return { userId, reply: turn.reply, duplicate: false };
  }

  private async route(user: UserProfile, text: string): Promise<{ user: UserProfile; reply: string }> {
    // A guided flow owns the turn, so nothing surfaced before it can still be confirmed
    if (this.onboarding.isActive(user)) {
      const turn = await this.onboarding.handle(user, { kind: "text", text });
      return { user: { ...turn.user, pendingAction: null }, reply: turn.reply };
    }

    const session = await this.reflection.activeSession(user);
    if (session) {
      const result = await this.reflection.handle(user, session, text);
      return { user: { ...user, pendingAction: null }, reply: result.ok ? result.value.reply : SAVE_FAILED_REPLY };
    }

    const tasks = await this.storage.listTasks(user.id);
    const input: ResolveInput = {
      utterance: text,
      tasks,
      history: user.history,
      pendingAction: user.pendingAction,
      timezone: user.timezone,
    };
    const decision = await this.resolve(input);
    return this.dispatch(user, decision, text);
  }

  private async resolve(input: ResolveInput): Promise<IntentDecision> {
    try {
      return await this.resolver.resolve(input);
    } catch (error) {
      if (error instanceof ResolverFailure) {
        log.warn(`Resolver failed, using keywords: ${error.message}`);
      } else {
        log.error("Unexpected resolver error, using keywords", error);
      }
      return this.resolver.resolveWithKeywords(input);
    }
  }

  // ---- Dispatch ----

  private async dispatch(
    user: UserProfile,
    decision: IntentDecision,
    text: string
  ): Promise<{ user: UserProfile; reply: string }> {
    // Any turn that does not set a new pending action clears the old one
    const next: UserProfile = { ...user, pendingAction: null };

    if (decision.confirmed) {
      return { user: next, reply: await this.executeConfirmed(user, decision) };
    }

    if (decision.cancelled) {
      return { user: next, reply: decision.suggestedResponse };
    }

    if (decision.route === "reflection") {
      const started = await this.reflection.start(user);
      if (!started.ok) {
        return { user: next, reply: started.error instanceof ValidationError ? started.error.message : SAVE_FAILED_REPLY };
      }
      return { user: next, reply: started.value.reply };
    }

    switch (decision.action) {
      case "unknown":
        return { user: next, reply: await this.mentor.advise(user, text) };

      case "view":
        return this.view(next, decision);

      case "create":
        return { user: next, reply: await this.create(user, decision) };

      case "update":
      case "delete": {
        const [selected] = decision.selectedTasks;
        if (decision.requiresConfirmation && selected) {
          next.pendingAction = this.pendingFor(decision, selected.taskId, selected.title);
        }
        return { user: next, reply: decision.suggestedResponse };
      }
    }
  }

  private pendingFor(decision: IntentDecision, taskId: string, title: string): PendingAction | null {
    const createdAt = this.clock().toISOString();
    if (decision.action === "delete") {
      return { kind: "delete", taskId, title, createdAt };
    }
    if (decision.action === "update" && decision.change) {
      return { kind: "update", taskId, title, change: decision.change, createdAt };
    }
    return null;
  }

  private async executeConfirmed(user: UserProfile, decision: IntentDecision): Promise<string> {
    const [selected] = decision.selectedTasks;
    if (!selected) return "There's nothing waiting for confirmation.";

    if (decision.action === "delete") {
      const deleted = await this.storage.deleteTask(selected.taskId, user.id);
      if (!deleted.ok) return SAVE_FAILED_REPLY;
      if (!deleted.value) return `"${selected.title}" no longer exists.`;
      log.info(`Deleted task ${selected.taskId} for ${user.id}`);
      return `Deleted "${selected.title}".`;
    }

    if (decision.action === "update" && decision.change) {
      const updated = await this.applyChange(user.id, selected.taskId, decision.change);
      if (!updated.ok) {
        if (updated.error instanceof NotFoundError) return `"${selected.title}" no longer exists.`;
        if (updated.error instanceof ValidationError) return updated.error.message;
        return SAVE_FAILED_REPLY;
      }
      return `Done: ${formatTaskLine(updated.value, user.timezone)}`;
    }

    return "There's nothing waiting for confirmation.";
  }

  private applyChange(ownerId: string, taskId: string, change: TaskChange) {
    return change.field === "status"
      ? this.storage.updateTaskStatus(taskId, ownerId, change.value)
      : this.storage.updateTaskPriority(taskId, ownerId, change.value);
  }

  private async create(user: UserProfile, decision: IntentDecision): Promise<string> {
    if (!decision.create) return decision.suggestedResponse;

    const created = await this.storage.createTask({
      ownerId: user.id,
      title: decision.create.title,
      description: decision.create.description,
      priority: decision.create.priority,
    });
    if (!created.ok) {
      return created.error instanceof ValidationError ? created.error.message : SAVE_FAILED_REPLY;
    }

    const task = created.value;
    log.info(`Created task ${task.id} for ${user.id}`);
    await this.noticeNewTask(user, task);
    return `Added ${formatTaskLine(task, user.timezone)}`;
  }

  private async noticeNewTask(user: UserProfile, task: Task): Promise<void> {
    if (!user.notifications.enabled || !user.notifications.newTaskNotifications) return;
    await deliverSafely(this.notifier, {
      userId: user.id,
      kind: "new_task",
      text: `New task: ${task.title} [${task.priority}]`,
      createdAt: this.clock().toISOString(),
    });
  }

  private async view(user: UserProfile, decision: IntentDecision): Promise<{ user: UserProfile; reply: string }> {
    if (decision.view === "analytics") {
      const analytics = await this.storage.getAnalytics(user.id);
      return { user: { ...user, currentView: "analytics" }, reply: formatAnalytics(analytics) };
    }

    const tasks = await this.storage.listTasks(user.id);
    const open = tasks.filter((t) => ACTIVE_STATUSES.includes(t.status));
    const reply = open.length
      ? `Your open tasks:\n${formatTaskList(open, user.timezone)}`
      : "You have no open tasks. Tell me what you'd like to add.";
    return { user: { ...user, currentView: "tasks" }, reply };
  }

  // ---- Profile Helpers ----

  private async loadOrCreateUser(userId: string): Promise<UserProfile> {
    const existing = await this.storage.loadUser(userId);
    if (existing) return existing;

    const user = createUserProfile(userId, this.clock(), this.defaultTimezone);
    const saved = await this.storage.saveUser(user);
    if (!saved.ok) {
      log.error(`Could not create profile for ${userId}: ${describeError(saved.error)}`);
    }
    return user;
  }

  private recordTurn(user: UserProfile, text: string, reply: string, messageId: string | undefined): UserProfile {
    const history = [...user.history, { role: "user" as const, content: text }, { role: "assistant" as const, content: reply }];
    return {
      ...user,
      history: history.slice(-MAX_HISTORY_TURNS),
      lastMessageId: messageId ?? null,
      lastReply: reply,
      updatedAt: this.clock().toISOString(),
    };
  }
}

export function describePending(pending: PendingAction): string {
  return pending.kind === "delete"
    ? `delete "${pending.title}"`
    : `${describeChange(pending.change)} for "${pending.title}"`;
}
