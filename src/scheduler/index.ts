// ============================================================================
// NOTIFICATION SCHEDULER
// ============================================================================
// One background timer, independent of the request path. Each tick checks:
//   - the daily digest, once the deployment clock passes `digestTime`
//   - the deadline sweep, every `deadlineIntervalMinutes`
// Per-user work runs under the same lock the chat turns use, so a job never
// reads a half-applied turn.

import { ACTIVE_STATUSES, Clock, SchedulerConfig, Task, TaskPriority, UserProfile, systemClock } from "../types/index.js";
import { IStorage } from "../storage/index.js";
import { Notifier, deliverSafely } from "../notifications/index.js";
import { UserLocks } from "../orchestrator/locks.js";
import { formatTaskLine } from "../format/index.js";
import { formatLocal, hasReachedTime, localDate, localTime } from "../time/index.js";
import { createLogger } from "../logging/index.js";

const log = createLogger("scheduler");

export const MAX_DEADLINES_LISTED = 5;
export const MAX_DIGEST_TASKS = 5;

const PRIORITY_RANK: Record<TaskPriority, number> = { urgent: 0, high: 1, medium: 2, low: 3 };

export type DigestOutcome = "sent" | "already_sent" | "skipped" | "failed";

export interface JobReport {
  considered: number;
  sent: number;
}

// ---- Message Builders ----

/**
 * Open tasks, most important first, then soonest due
 */
export function rankForDigest(tasks: Task[]): Task[] {
  return tasks
    .filter((t) => ACTIVE_STATUSES.includes(t.status))
    .sort((a, b) => {
      const byPriority = PRIORITY_RANK[a.priority] - PRIORITY_RANK[b.priority];
      if (byPriority !== 0) return byPriority;
      if (a.dueAt && b.dueAt) return a.dueAt.localeCompare(b.dueAt);
      if (a.dueAt) return -1;
      if (b.dueAt) return 1;
      return 0;
    });
}

export function buildDigestText(user: UserProfile, tasks: Task[], completedYesterday: number): string {
  const open = rankForDigest(tasks);
  if (open.length === 0) {
    return completedYesterday > 0
      ? `Good morning! You finished ${completedYesterday} in the last day and have nothing open. Enjoy it.`
      : "Good morning! Your list is empty. Tell me what you'd like to work on today.";
  }

  const lines = open.slice(0, MAX_DIGEST_TASKS).map((t) => `- ${formatTaskLine(t, user.timezone)}`);
  const more = open.length > MAX_DIGEST_TASKS ? [`…and ${open.length - MAX_DIGEST_TASKS} more`] : [];
  const done = completedYesterday > 0 ? [`Completed in the last day: ${completedYesterday}`] : [];

  return [
    `Good morning! You have ${open.length} open ${open.length === 1 ? "task" : "tasks"}:`,
    ...lines,
    ...more,
    ...done,
  ].join("\n");
}

export function buildDeadlineText(user: UserProfile, tasks: Task[], now: Date): string {
  const lines = tasks.slice(0, MAX_DEADLINES_LISTED).map((t) => {
    const due = t.dueAt ? new Date(t.dueAt) : now;
    const label = due.getTime() < now.getTime() ? "overdue since" : "due";
    return `- ${t.title} [${t.priority}], ${label} ${formatLocal(due, user.timezone)}`;
  });
  const more = tasks.length > MAX_DEADLINES_LISTED ? [`…and ${tasks.length - MAX_DEADLINES_LISTED} more`] : [];
  return [`Coming up soon:`, ...lines, ...more].join("\n");
}

// ---- Scheduler ----

export class NotificationScheduler {
  private timer: NodeJS.Timeout | null = null;
  private lastSweepAt: number | null = null;
  private running: Promise<void> | null = null;

  constructor(
    private storage: IStorage,
    private notifier: Notifier,
    private locks: UserLocks,
    private config: SchedulerConfig,
    private clock: Clock = systemClock
  ) {}

  start(): void {
    if (this.timer || !this.config.enabled) return;
    this.timer = setInterval(() => {
      void this.tick();
    }, this.config.tickSeconds * 1000);
    this.timer.unref();
    log.info(
      `Scheduler started (digest ${this.config.digestTime} ${this.config.timezone}, ` +
        `deadlines every ${this.config.deadlineIntervalMinutes} min)`
    );
  }

  /**
   * Stop the timer and wait for a tick in flight
   */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      log.info("Scheduler stopped");
    }
    if (this.running) await this.running;
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  /**
   * One pass of both jobs. Overlapping ticks are skipped.
   */
  async tick(): Promise<void> {
    if (this.running) return;
    this.running = this.runDue(this.clock()).finally(() => {
      this.running = null;
    });
    return this.running;
  }

  private async runDue(now: Date): Promise<void> {
    try {
      if (hasReachedTime(localTime(now, this.config.timezone), this.config.digestTime)) {
        await this.runDailyDigest(now);
      }

      const interval = this.config.deadlineIntervalMinutes * 60_000;
      if (this.lastSweepAt === null || now.getTime() - this.lastSweepAt >= interval) {
        this.lastSweepAt = now.getTime();
        await this.runDeadlineSweep(now);
      }
    } catch (error) {
      log.error("Scheduler tick failed", error);
    }
  }

  // ---- Daily Digest ----

  /**
   * Send today's digest to every eligible user that has not had one.
   * "Today" is the deployment calendar date, so running this twice on the
   * same date sends at most once per user.
   */
  async runDailyDigest(now: Date = this.clock()): Promise<JobReport> {
    const users = (await this.storage.listUsers()).filter((u) => this.wantsDigest(u));
    let sent = 0;
    for (const user of users) {
      if ((await this.digestFor(user.id, now, false)) === "sent") sent += 1;
    }
    if (sent > 0) log.info(`Daily digest sent to ${sent} of ${users.length} users`);
    return { considered: users.length, sent };
  }

  /**
   * Send a digest on demand. Ignores the once-per-day marker.
   */
  async sendDigestNow(userId: string): Promise<DigestOutcome> {
    return this.digestFor(userId, this.clock(), true);
  }

  private async digestFor(userId: string, now: Date, force: boolean): Promise<DigestOutcome> {
    return this.locks.run(userId, async () => {
      const user = await this.storage.loadUser(userId);
      if (!user || (!force && !this.wantsDigest(user))) return "skipped";

      if (!force) {
        const claimed = await this.storage.claimNotificationMarker(
          user.id,
          "daily_digest",
          localDate(now, this.config.timezone)
        );
        if (!claimed.ok) {
          log.error(`Could not record digest marker for ${user.id}`, claimed.error);
          return "failed";
        }
        if (!claimed.value) return "already_sent";
      }

      const tasks = await this.storage.listTasks(user.id);
      const completed = await this.storage.listCompletedSince(user.id, new Date(now.getTime() - 24 * 3_600_000));
      const delivered = await deliverSafely(this.notifier, {
        userId: user.id,
        kind: "daily_digest",
        text: buildDigestText(user, tasks, completed.length),
        createdAt: now.toISOString(),
      });
      return delivered ? "sent" : "failed";
    });
  }

  private wantsDigest(user: UserProfile): boolean {
    return user.onboardingStep === "completed" && user.notifications.enabled && user.notifications.dailyDigest;
  }

  // ---- Deadline Sweep ----

  /**
   * Remind eligible users of open tasks due within the horizon
   */
  async runDeadlineSweep(now: Date = this.clock()): Promise<JobReport> {
    const users = (await this.storage.listUsers()).filter(
      (u) => u.onboardingStep === "completed" && u.notifications.enabled && u.notifications.deadlineReminders
    );
    const until = new Date(now.getTime() + this.config.deadlineHorizonHours * 3_600_000);

    let sent = 0;
    for (const user of users) {
      const delivered = await this.locks.run(user.id, async () => {
        const due = await this.storage.listUpcomingDeadlines(user.id, until);
        if (due.length === 0) return false;
        return deliverSafely(this.notifier, {
          userId: user.id,
          kind: "deadline_reminder",
          text: buildDeadlineText(user, due, now),
          createdAt: now.toISOString(),
        });
      });
      if (delivered) sent += 1;
    }
    if (sent > 0) log.info(`Deadline reminders sent to ${sent} users`);
    return { considered: users.length, sent };
  }
}
