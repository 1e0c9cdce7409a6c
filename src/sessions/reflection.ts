// ============================================================================
// REFLECTION FLOW
// ============================================================================
// The nightly review: starting → task_review → gratitude → summary → completed.
//
// One session per user per local calendar date, kept under the date it began:
// a review that runs past midnight carries on. One left idle longer than
// SESSION_RESUME_HOURS is closed out with the counts it has. Each open task
// is reviewed in turn; a report of no progress earns one extra turn for help before moving on.
// The gratitude answer closes the session: the summary is written and the
// session completed in one store transaction.

import {
  ACTIVE_STATUSES,
  Clock,
  DailySummary,
  EveningSession,
  EveningSessionState,
  ProductivityLevel,
  TaskReviewItem,
  UserProfile,
  systemClock,
} from "../types/index.js";
import { IStorage } from "../storage/index.js";
import { CompletionService, completeOr } from "../llm/index.js";
import { NotFoundError, PersistenceError, Result, ValidationError, err, ok } from "../errors/index.js";
import { indicatesNoProgress } from "../resolver/keywords.js";
import { localDate } from "../time/index.js";
import { createLogger } from "../logging/index.js";
import { StepSequence } from "./flow.js";
import { describeUser } from "./profile.js";

const log = createLogger("reflection");

export const REFLECTION_SEQUENCE = new StepSequence<EveningSessionState>([
  "starting",
  "task_review",
  "gratitude",
  "summary",
  "completed",
]);

export const GRATITUDE_THEME_LENGTH = 100;
export const SESSION_RESUME_HOURS = 12;

export interface ReflectionStart {
  session: EveningSession;
  reply: string;
}

export interface ReflectionTurn {
  session: EveningSession;
  reply: string;
  completed: boolean;
  summary?: DailySummary;
}

const SYSTEM_PROMPT =
  "You are a warm, practical companion running a short evening review of the user's day. " +
  "Reply in two or three sentences. Focus on progress rather than perfection.";

/**
 * high when more than 70% of reviewed tasks moved, medium when any did, low otherwise
 */
export function productivityLevel(tasksWithProgress: number, tasksReviewed: number): ProductivityLevel {
  if (tasksWithProgress > tasksReviewed * 0.7) return "high";
  if (tasksWithProgress > 0) return "medium";
  return "low";
}

interface ReviewTally {
  tasksReviewed: number;
  tasksWithProgress: number;
  tasksNeedingHelp: number;
  level: ProductivityLevel;
  /** Plain summary used when the model has nothing to say */
  text: string;
}

function tallyReviews(session: EveningSession): ReviewTally {
  const tasksReviewed = session.reviews.length;
  const tasksWithProgress = session.reviews.filter((r) => r.progressDescription && !r.needsHelp).length;
  const tasksNeedingHelp = session.reviews.filter((r) => r.needsHelp).length;
  const level = productivityLevel(tasksWithProgress, tasksReviewed);
  return {
    tasksReviewed,
    tasksWithProgress,
    tasksNeedingHelp,
    level,
    text:
      `You reviewed ${tasksReviewed} ${tasksReviewed === 1 ? "task" : "tasks"}: ${tasksWithProgress} with progress, ` +
      `${tasksNeedingHelp} needing help. Productivity today: ${level}.`,
  };
}

export class ReflectionFlow {
  constructor(
    private storage: IStorage,
    private completion: CompletionService,
    private clock: Clock = systemClock
  ) {}

  /**
   * The user's unfinished session, if it is recent enough to resume. A stale
   * one is completed from what it holds and null returned.
   */
  async activeSession(user: UserProfile): Promise<EveningSession | null> {
    const session = await this.storage.loadActiveEveningSession(user.id);
    if (!session) return null;

    const idle = this.clock().getTime() - Date.parse(session.startedAt);
    if (idle < SESSION_RESUME_HOURS * 3_600_000) return session;

    const closed = await this.closeUnfinished(session);
    if (!closed.ok) {
      log.error(`Could not close stale evening session for ${user.id} (${session.date})`, closed.error);
    }
    return null;
  }

  /**
   * Open today's session. Rejected when one already exists for the date, when
   * an earlier one is still running or when there is nothing pending or in
   * progress to review.
   */
  async start(user: UserProfile): Promise<Result<ReflectionStart, ValidationError | PersistenceError>> {
    const now = this.clock();
    const date = localDate(now, user.timezone);

    if (await this.storage.hasEveningSession(user.id, date)) {
      return err(new ValidationError(`You've already done your evening review for ${date}.`, "date"));
    }
    if (await this.activeSession(user)) {
      return err(new ValidationError("You're already in the middle of an evening review.", "date"));
    }

    const tasks = (await this.storage.listTasks(user.id)).filter((t) => ACTIVE_STATUSES.includes(t.status));
    if (tasks.length === 0) {
      return err(new ValidationError("There are no open tasks to review tonight.", "tasks"));
    }

    const reviews: TaskReviewItem[] = tasks.map((task) => ({
      taskId: task.id,
      taskTitle: task.title,
      progressDescription: "",
      needsHelp: false,
      helpProvided: "",
      aiSupport: "",
      completed: false,
    }));

    const reply =
      `Let's look back at your day. We'll go through ${reviews.length} open ` +
      `${reviews.length === 1 ? "task" : "tasks"}, then finish with one thing you're grateful for.\n` +
      `Ready when you are.`;

    const session: EveningSession = {
      ownerId: user.id,
      date,
      state: REFLECTION_SEQUENCE.first,
      reviews,
      currentIndex: 0,
      gratitude: "",
      summary: "",
      transcript: [{ role: "assistant", content: reply }],
      startedAt: now.toISOString(),
    };

    const created = await this.storage.createEveningSession(session);
    if (!created.ok) return created;

    log.info(`Started evening session for ${user.id} (${date}, ${reviews.length} tasks)`);
    return ok({ session, reply });
  }

  /**
   * Apply one user reply to the session and persist the result
   */
  async handle(
    user: UserProfile,
    current: EveningSession,
    text: string
  ): Promise<Result<ReflectionTurn, NotFoundError | PersistenceError>> {
    const session = structuredClone(current);
    session.transcript.push({ role: "user", content: text });

    let reply: string;
    let summary: DailySummary | undefined;

    switch (session.state) {
      case "starting":
        this.move(session, "task_review");
        reply = this.taskPrompt(session);
        break;

      case "task_review":
        reply = await this.reviewTurn(user, session, text);
        break;

      case "gratitude": {
        session.gratitude = text.trim();
        this.move(session, "summary");
        const closing = await this.closeSession(user, session);
        summary = closing.summary;
        reply = closing.reply;
        break;
      }

      case "summary":
      case "completed":
        return ok({ session, reply: "Tonight's review is already finished.", completed: true });
    }

    session.transcript.push({ role: "assistant", content: reply });

    if (summary) {
      const saved = await this.storage.completeEveningSession(session, summary);
      if (!saved.ok) return saved;
      log.info(`Completed evening session for ${user.id} (${session.date})`);
      return ok({ session, reply, completed: true, summary });
    }

    const saved = await this.storage.saveEveningSession(session);
    if (!saved.ok) return saved;
    return ok({ session, reply, completed: false });
  }

  // ---- Task Review ----

  private async reviewTurn(user: UserProfile, session: EveningSession, text: string): Promise<string> {
    const item = session.reviews[session.currentIndex];

    if (!item.progressDescription) {
      item.progressDescription = text.trim();

      if (indicatesNoProgress(text)) {
        item.needsHelp = true;
        const offer = await this.generate(
          user,
          `The user made no progress on "${item.taskTitle}" today and said: "${text}". ` +
            `Reassure them without judgement.`,
          `That's okay, some days are like that. Nothing is lost on "${item.taskTitle}".`
        );
        return `${offer}\n\nWhat got in the way? Tell me and we'll find a next step.`;
      }

      item.aiSupport = await this.generate(
        user,
        `The user reported progress on "${item.taskTitle}": "${text}". Encourage them.`,
        `Good work on "${item.taskTitle}". Every step counts.`
      );
      item.completed = true;
      return `${item.aiSupport}\n\n${this.advance(session)}`;
    }

    // Second reply on an item that needed help
    item.helpProvided = text.trim();
    item.aiSupport = await this.generate(
      user,
      `The user is stuck on "${item.taskTitle}" and explained: "${text}". ` +
        `Suggest two or three concrete, small next steps.`,
      `Try picking the smallest first step for "${item.taskTitle}" and doing it first thing tomorrow.`
    );
    item.completed = true;
    return `${item.aiSupport}\n\n${this.advance(session)}`;
  }

  private advance(session: EveningSession): string {
    session.currentIndex += 1;
    if (session.currentIndex < session.reviews.length) {
      return this.taskPrompt(session);
    }
    this.move(session, "gratitude");
    return "Last question: what are you grateful to yourself for today? Big or small, anything counts.";
  }

  private taskPrompt(session: EveningSession): string {
    const item = session.reviews[session.currentIndex];
    return (
      `Task ${session.currentIndex + 1}/${session.reviews.length}: ${item.taskTitle}\n` +
      `What did you get done on it today? If nothing, just say "nothing".`
    );
  }

  // ---- Summary ----

  private async closeSession(
    user: UserProfile,
    session: EveningSession
  ): Promise<{ reply: string; summary: DailySummary }> {
    const tally = tallyReviews(session);
    const reviewLines = session.reviews.map((r) => `- ${r.taskTitle}: ${r.progressDescription}`).join("\n");
    const summaryText = await this.generate(
      user,
      `Write a short, encouraging summary of the user's day (three or four sentences).\n` +
        `Task review:\n${reviewLines}\nGrateful for: ${session.gratitude}\n` +
        `${tally.tasksWithProgress} of ${tally.tasksReviewed} tasks moved forward.`,
      tally.text
    );

    return {
      summary: this.finish(session, tally, summaryText),
      reply: `Thank you for sharing that.\n\nToday's summary:\n${summaryText}\n\nThe evening review is done. Rest well!`,
    };
  }

  private async closeUnfinished(current: EveningSession): Promise<Result<void, NotFoundError | PersistenceError>> {
    const session = structuredClone(current);
    const tally = tallyReviews(session);
    const summary = this.finish(session, tally, `${tally.text} The review was left unfinished.`);
    const saved = await this.storage.completeEveningSession(session, summary);
    if (saved.ok) log.info(`Closed stale evening session for ${session.ownerId} (${session.date})`);
    return saved;
  }

  private finish(session: EveningSession, tally: ReviewTally, summaryText: string): DailySummary {
    const now = this.clock().toISOString();
    session.summary = summaryText;
    session.completedAt = now;
    this.move(session, "completed");

    return {
      date: session.date,
      tasksReviewed: tally.tasksReviewed,
      tasksWithProgress: tally.tasksWithProgress,
      tasksNeedingHelp: tally.tasksNeedingHelp,
      gratitudeTheme: session.gratitude.slice(0, GRATITUDE_THEME_LENGTH),
      productivityLevel: tally.level,
      summaryText,
      createdAt: now,
    };
  }

  // ---- Helpers ----

  private generate(user: UserProfile, prompt: string, fallback: string): Promise<string> {
    const context = describeUser(user);
    return completeOr(
      this.completion,
      { system: context ? `${SYSTEM_PROMPT}\nAbout the user: ${context}` : SYSTEM_PROMPT, prompt },
      fallback
    );
  }

  private move(session: EveningSession, to: EveningSessionState): void {
    session.state = REFLECTION_SEQUENCE.advance(session.state, to);
  }
}
