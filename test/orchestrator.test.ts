import { describe, it, expect, beforeEach, afterEach } from "vitest";

import { Orchestrator, EMPTY_MESSAGE_REPLY, UserLocks, describePending } from "../src/orchestrator/index.js";
import { IntentResolver } from "../src/resolver/index.js";
import { OnboardingFlow } from "../src/sessions/onboarding.js";
import { ReflectionFlow } from "../src/sessions/reflection.js";
import { Mentor, MENTOR_FALLBACK_REPLY } from "../src/mentor/index.js";
import { CompletionService } from "../src/llm/index.js";
import { SQLiteStorage } from "../src/storage/index.js";
import { UserProfile } from "../src/types/index.js";
import { ValidationError } from "../src/errors/index.js";
import {
  RecordingNotifier,
  ScriptedCompletion,
  TestClock,
  UnavailableCompletion,
  createMemoryStorage,
  createTestClock,
  expectOk,
  onboardedUser,
} from "./helpers.js";

describe("Orchestrator", () => {
  let time: TestClock;
  let storage: SQLiteStorage;
  let notifier: RecordingNotifier;

  beforeEach(async () => {
    time = createTestClock("2026-03-10T12:00:00.000Z");
    storage = await createMemoryStorage(time.clock);
    notifier = new RecordingNotifier();
  });

  afterEach(async () => {
    await storage.close();
  });

  function build(completion: CompletionService = new UnavailableCompletion()): Orchestrator {
    const mentor = new Mentor(completion);
    return new Orchestrator({
      storage,
      resolver: new IntentResolver(completion),
      onboarding: new OnboardingFlow(mentor, time.clock),
      reflection: new ReflectionFlow(storage, completion, time.clock),
      mentor,
      notifier,
      locks: new UserLocks(),
      clock: time.clock,
    });
  }

  async function saveAlice(patch: Partial<UserProfile> = {}): Promise<void> {
    expectOk(await storage.saveUser(onboardedUser("alice", time.clock(), patch)));
  }

  async function say(orchestrator: Orchestrator, text: string): Promise<string> {
    const { reply } = await orchestrator.handleMessage({ userId: "alice", text });
    return reply;
  }

  it("runs a task through create, complete and delete", async () => {
    await saveAlice();
    const orchestrator = build();

    const added = await say(orchestrator, "add task Buy milk with low priority");
    expect(added.startsWith("Added ○ Buy milk [low] (")).toBe(true);

    const [task] = await storage.listTasks("alice");
    const id = task.id.slice(0, 8);

    const stats = await say(orchestrator, "how am i doing");
    expect(stats).toContain("Total: 1");
    expect(stats).toContain("Completion rate: 0%");

    expect(await say(orchestrator, "mark buy milk as done")).toBe(
      `Found "Buy milk" (${id}). Shall I mark it as completed? Reply "yes" to confirm.`
    );
    expect((await storage.getTask(task.id, "alice"))?.status).toBe("pending");

    expect(await say(orchestrator, "yes")).toBe(`Done: ✓ Buy milk [low] (${id})`);
    const completed = await storage.getTask(task.id, "alice");
    expect(completed?.status).toBe("completed");
    expect(completed?.completedAt).toBe("2026-03-10T12:00:00.000Z");
    expect((await storage.getAnalytics("alice")).completionRate).toBe(100);

    expect(await say(orchestrator, "delete the milk task")).toBe(
      `Delete "Buy milk" (${id})? This can't be undone. Reply "yes" to confirm.`
    );
    expect(await storage.listTasks("alice")).toHaveLength(1);

    expect(await say(orchestrator, "yes")).toBe('Deleted "Buy milk".');
    expect(await storage.listTasks("alice")).toEqual([]);
  });

  it("keeps the pending action on the profile between turns", async () => {
    await saveAlice();
    const orchestrator = build();
    await say(orchestrator, "add task Buy milk");
    await say(orchestrator, "delete milk");

    const user = await storage.loadUser("alice");
    expect(user?.pendingAction?.kind).toBe("delete");
    if (user?.pendingAction) expect(describePending(user.pendingAction)).toBe('delete "Buy milk"');
  });

  it("drops the pending action on a refusal", async () => {
    await saveAlice();
    const orchestrator = build();
    await say(orchestrator, "add task Buy milk");
    await say(orchestrator, "delete milk");

    expect(await say(orchestrator, "no")).toBe('Okay, I won\'t touch "Buy milk".');
    expect((await storage.loadUser("alice"))?.pendingAction).toBeNull();
    expect(await storage.listTasks("alice")).toHaveLength(1);
  });

  it("does not take a new command on the pending task as a confirmation", async () => {
    await saveAlice();
    const orchestrator = build();
    await say(orchestrator, "add task Buy milk");
    await say(orchestrator, "delete milk");
    const [task] = await storage.listTasks("alice");
    const id = task.id.slice(0, 8);

    expect(await say(orchestrator, `mark ${id} as done`)).toBe(
      `Found "Buy milk" (${id}). Shall I mark it as completed? Reply "yes" to confirm.`
    );
    expect(await storage.listTasks("alice")).toHaveLength(1);
    expect((await storage.loadUser("alice"))?.pendingAction?.kind).toBe("update");
  });

  it("re-resolves an affirmative that names a different task", async () => {
    await saveAlice();
    const orchestrator = build();
    await say(orchestrator, "add task Buy milk");
    await say(orchestrator, "add task Buy bread");
    await say(orchestrator, "delete milk");
    const bread = (await storage.listTasks("alice")).find((t) => t.title === "Buy bread");
    const breadId = bread?.id ?? "";

    expect(await say(orchestrator, "yes delete bread")).toBe(
      `Delete "Buy bread" (${breadId.slice(0, 8)})? This can't be undone. Reply "yes" to confirm.`
    );
    expect(await storage.listTasks("alice")).toHaveLength(2);
    expect((await storage.loadUser("alice"))?.pendingAction?.taskId).toBe(breadId);
  });

  it("never acts on a bare yes", async () => {
    await saveAlice();
    const orchestrator = build();
    await say(orchestrator, "add task Buy milk");

    expect(await say(orchestrator, "yes")).toBe(MENTOR_FALLBACK_REPLY);
    expect(await storage.listTasks("alice")).toHaveLength(1);
  });

  it("falls back to keywords when the model is unavailable", async () => {
    await saveAlice();
    const completion = new UnavailableCompletion();
    const orchestrator = build(completion);

    const reply = await say(orchestrator, "add task Call the bank");
    expect(reply.startsWith("Added ○ Call the bank [medium] (")).toBe(true);
    expect(completion.calls).toBe(1);
  });

  it("uses the model's classification when it answers", async () => {
    await saveAlice();
    const orchestrator = build(
      new ScriptedCompletion(['{"action": "create", "title": "Book flights", "priority": "high", "confidence": 0.9}'])
    );

    const reply = await say(orchestrator, "I need to sort out flights, it's important");
    expect(reply.startsWith("Added ○ Book flights [high] (")).toBe(true);
  });

  it("answers a resend with the stored reply", async () => {
    await saveAlice();
    const orchestrator = build();

    const first = await orchestrator.handleMessage({ userId: "alice", text: "add task Buy milk", messageId: "m-1" });
    const second = await orchestrator.handleMessage({ userId: "alice", text: "add task Buy milk", messageId: "m-1" });

    expect(first.duplicate).toBe(false);
    expect(second).toEqual({ userId: "alice", reply: first.reply, duplicate: true });
    expect(await storage.listTasks("alice")).toHaveLength(1);
  });

  it("processes one turn at a time per user", async () => {
    await saveAlice();
    const orchestrator = build();

    await Promise.all([say(orchestrator, "add task Walk the dog"), say(orchestrator, "add task Water plants")]);

    expect(await storage.listTasks("alice")).toHaveLength(2);
    expect((await storage.loadUser("alice"))?.history).toHaveLength(4);
  });

  it("keeps the dialogue window bounded", async () => {
    await saveAlice();
    const orchestrator = build();
    for (let i = 0; i < 11; i++) {
      await say(orchestrator, "show my tasks");
    }
    const user = await storage.loadUser("alice");
    expect(user?.history).toHaveLength(20);
    expect(user?.history[19]).toEqual({
      role: "assistant",
      content: "You have no open tasks. Tell me what you'd like to add.",
    });
    expect(user?.currentView).toBe("tasks");
  });

  it("ignores empty messages", async () => {
    const orchestrator = build();
    const reply = await orchestrator.handleMessage({ userId: "bob", text: "   " });
    expect(reply.reply).toBe(EMPTY_MESSAGE_REPLY);
    expect(await storage.loadUser("bob")).toBeNull();
  });

  it("sends a notice for a new task when the user asked for it", async () => {
    await saveAlice({
      notifications: {
        enabled: true,
        dailyDigest: false,
        deadlineReminders: false,
        newTaskNotifications: true,
        sendTime: "09:00",
        timezone: "UTC",
      },
    });
    const orchestrator = build();
    await say(orchestrator, "add task Buy milk with low priority");

    expect(notifier.delivered).toEqual([
      { userId: "alice", kind: "new_task", text: "New task: Buy milk [low]", createdAt: "2026-03-10T12:00:00.000Z" },
    ]);
  });

  it("sends no notice by default", async () => {
    await saveAlice();
    await say(build(), "add task Buy milk");
    expect(notifier.delivered).toEqual([]);
  });

  describe("onboarding", () => {
    it("creates the profile on first contact and starts setup", async () => {
      const orchestrator = build();
      const reply = await orchestrator.handleMessage({ userId: "zoe", text: "hello" });

      expect(reply.reply.startsWith("●●○○○○ 2/6")).toBe(true);
      expect((await storage.loadUser("zoe"))?.onboardingStep).toBe("anxiety_intro");
    });

    it("takes button presses while setup runs", async () => {
      const orchestrator = build();
      await orchestrator.handleMessage({ userId: "zoe", text: "hello" });
      await orchestrator.handleAction("zoe", { type: "skip" });

      expect((await storage.loadUser("zoe"))?.onboardingStep).toBe("goals");
    });

    it("refuses button presses after setup", async () => {
      await saveAlice();
      const reply = await build().handleAction("alice", { type: "next" });
      expect(reply.reply).toBe("Setup is already complete.");
    });
  });

  describe("evening review", () => {
    it("explains why it cannot start", async () => {
      await saveAlice();
      expect(await say(build(), "let's do the evening review")).toBe("There are no open tasks to review tonight.");
    });

    it("routes later turns into the running review", async () => {
      await saveAlice();
      const orchestrator = build();
      await say(orchestrator, "add task Draft report");

      const opening = await say(orchestrator, "let's do the evening review");
      expect(opening.startsWith("Let's look back at your day. We'll go through 1 open task,")).toBe(true);

      expect(await say(orchestrator, "ready")).toBe(
        'Task 1/1: Draft report\nWhat did you get done on it today? If nothing, just say "nothing".'
      );
    });

    it("drops a pending action once the review takes over", async () => {
      await saveAlice();
      const orchestrator = build();
      await say(orchestrator, "add task Buy milk");
      await say(orchestrator, "delete milk");
      expectOk(await orchestrator.startReflection("alice"));

      await say(orchestrator, "ready");
      expect((await storage.loadUser("alice"))?.pendingAction).toBeNull();

      await say(orchestrator, "bought it");
      expect(await say(orchestrator, "my patience")).toContain("The evening review is done. Rest well!");
      expect(await say(orchestrator, "yes")).toBe(MENTOR_FALLBACK_REPLY);
      expect(await storage.listTasks("alice")).toHaveLength(1);
    });

    it("keeps a review going past midnight", async () => {
      await saveAlice();
      const orchestrator = build();
      time.set("2026-03-10T23:58:00.000Z");
      await say(orchestrator, "add task Draft report");
      await say(orchestrator, "let's do the evening review");
      await say(orchestrator, "ready");

      time.set("2026-03-11T00:01:00.000Z");
      expect(await say(orchestrator, "wrote the intro")).toBe(
        'Good work on "Draft report". Every step counts.\n\n' +
          "Last question: what are you grateful to yourself for today? Big or small, anything counts."
      );
      await say(orchestrator, "my patience");
      const [summary] = await storage.listDailySummaries("alice");
      expect(summary.date).toBe("2026-03-10");
    });

    it("starts outside a chat turn", async () => {
      await saveAlice();
      const orchestrator = build();
      await say(orchestrator, "add task Draft report");

      const started = expectOk(await orchestrator.startReflection("alice"));
      expect(started.startsWith("Let's look back at your day.")).toBe(true);
    });
  });

  describe("updateSettings", () => {
    it("keeps both timezones in step", async () => {
      await saveAlice();
      const updated = expectOk(
        await build().updateSettings("alice", { timezone: "Europe/Berlin", dailyDigest: true, sendTime: "07:30" })
      );

      expect(updated.timezone).toBe("Europe/Berlin");
      expect(updated.notifications).toMatchObject({ timezone: "Europe/Berlin", dailyDigest: true, sendTime: "07:30" });
      expect((await storage.loadUser("alice"))?.timezone).toBe("Europe/Berlin");
    });

    it("rejects an unknown timezone", async () => {
      const result = await build().updateSettings("alice", { timezone: "Mars/Olympus" });
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(ValidationError);
        expect(result.error.message).toBe("Unknown timezone: Mars/Olympus");
      }
    });

    it("rejects a malformed send time", async () => {
      const result = await build().updateSettings("alice", { sendTime: "9am" });
      expect(result.ok).toBe(false);
    });
  });
});
