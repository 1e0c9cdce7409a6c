import { Clock, Notification, Task, UserProfile, createUserProfile } from "../src/types/index.js";
import { SQLiteStorage } from "../src/storage/index.js";
import { CompletionRequest, CompletionService } from "../src/llm/index.js";
import { DuskError, ResolverFailure, Result } from "../src/errors/index.js";
import { Notifier } from "../src/notifications/index.js";

// ---- Clock ----

export interface TestClock {
  clock: Clock;
  set(iso: string): void;
  advance(ms: number): void;
}

export function createTestClock(start: string): TestClock {
  let now = new Date(start);
  return {
    clock: () => new Date(now.getTime()),
    set(iso) {
      now = new Date(iso);
    },
    advance(ms) {
      now = new Date(now.getTime() + ms);
    },
  };
}

// ---- Storage ----

export async function createMemoryStorage(clock?: Clock): Promise<SQLiteStorage> {
  const storage = new SQLiteStorage({ type: "sqlite", path: ":memory:" }, clock);
  await storage.initialize();
  return storage;
}

/** A profile that has finished onboarding */
export function onboardedUser(id: string, now: Date, patch: Partial<UserProfile> = {}): UserProfile {
  return { ...createUserProfile(id, now), onboardingStep: "completed", ...patch };
}

// ---- Completion Service ----

type Reply = string | Error | ((request: CompletionRequest) => string);

/**
 * Plays back replies in order; throws ResolverFailure once they run out
 */
export class ScriptedCompletion implements CompletionService {
  readonly requests: CompletionRequest[] = [];
  private replies: Reply[];

  constructor(replies: Reply[] = []) {
    this.replies = [...replies];
  }

  push(...replies: Reply[]): void {
    this.replies.push(...replies);
  }

  async complete(request: CompletionRequest): Promise<string> {
    this.requests.push(request);
    const reply = this.replies.shift();
    if (reply === undefined) throw new ResolverFailure("No scripted reply left");
    if (reply instanceof Error) throw reply;
    return typeof reply === "function" ? reply(request) : reply;
  }
}

/** Every call fails the way a timed-out model call does */
export class UnavailableCompletion implements CompletionService {
  calls = 0;

  async complete(): Promise<string> {
    this.calls += 1;
    throw new ResolverFailure("Completion timed out after 20000ms");
  }
}

// ---- Notifier ----

export class RecordingNotifier implements Notifier {
  readonly delivered: Notification[] = [];

  async deliver(notification: Notification): Promise<void> {
    this.delivered.push(notification);
  }
}

// ---- Fixtures ----

/** The value of a successful result; rethrows the error otherwise */
export function expectOk<T, E extends DuskError>(result: Result<T, E>): T {
  if (!result.ok) throw result.error;
  return result.value;
}

export function makeTask(id: string, title: string, patch: Partial<Task> = {}): Task {
  return {
    id,
    ownerId: "alice",
    title,
    description: "",
    priority: "medium",
    status: "pending",
    createdAt: "2026-03-10T12:00:00.000Z",
    updatedAt: "2026-03-10T12:00:00.000Z",
    ...patch,
  };
}
