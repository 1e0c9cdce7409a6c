import { describe, it, expect, beforeEach, afterEach } from "vitest";

import { appRouter } from "../src/server/router.js";
import { NotificationHub } from "../src/server/hub.js";
import { AppContext, createAppContext } from "../src/app/context.js";
import { createDefaultConfig } from "../src/config/index.js";
import { SQLiteStorage } from "../src/storage/index.js";
import { Notification } from "../src/types/index.js";
import { TestClock, UnavailableCompletion, createTestClock, expectOk, onboardedUser } from "./helpers.js";

describe("appRouter", () => {
  let time: TestClock;
  let hub: NotificationHub;
  let app: AppContext;

  beforeEach(async () => {
    time = createTestClock("2026-03-10T12:00:00.000Z");
    hub = new NotificationHub();
    app = await createAppContext(createDefaultConfig(), {
      storage: new SQLiteStorage({ type: "sqlite", path: ":memory:" }, time.clock),
      completion: new UnavailableCompletion(),
      notifier: hub,
      clock: time.clock,
    });
    expectOk(await app.storage.saveUser(onboardedUser("alice", time.clock())));
  });

  afterEach(async () => {
    await app.close();
  });

  function caller() {
    return appRouter.createCaller({ app, hub });
  }

  it("chats through the orchestrator", async () => {
    const reply = await caller().chat.send({ userId: "alice", text: "add task Buy milk", messageId: "m-1" });
    expect(reply.duplicate).toBe(false);
    expect(reply.reply.startsWith("Added ○ Buy milk [medium] (")).toBe(true);

    const { tasks, total } = await caller().task.list({ userId: "alice" });
    expect(total).toBe(1);
    expect(tasks[0].title).toBe("Buy milk");
  });

  it("manages tasks directly", async () => {
    const api = caller();
    const task = await api.task.create({ userId: "alice", title: "File taxes", priority: "urgent" });

    const done = await api.task.updateStatus({ userId: "alice", taskId: task.id, status: "completed" });
    expect(done.completedAt).toBe("2026-03-10T12:00:00.000Z");

    const analytics = await api.task.analytics({ userId: "alice" });
    expect(analytics.completionRate).toBe(100);
    expect(analytics.priorityDistribution.urgent).toBe(1);

    expect(await api.task.delete({ userId: "alice", taskId: task.id })).toEqual({ deleted: task.id });
  });

  it("hides other users' tasks", async () => {
    const task = await caller().task.create({ userId: "alice", title: "Private" });
    await expect(caller().task.get({ userId: "mallory", taskId: task.id })).rejects.toMatchObject({ code: "NOT_FOUND" });
    await expect(caller().task.delete({ userId: "mallory", taskId: task.id })).rejects.toMatchObject({
      code: "NOT_FOUND",
    });
  });

  it("maps store validation errors to BAD_REQUEST", async () => {
    await expect(caller().task.create({ userId: "alice", title: "   " })).rejects.toMatchObject({
      code: "BAD_REQUEST",
      message: "Task title is required",
    });
  });

  it("updates settings and rejects an unknown timezone", async () => {
    const api = caller();
    const settings = await api.settings.update({ userId: "alice", patch: { timezone: "Asia/Tokyo", dailyDigest: true } });
    expect(settings.timezone).toBe("Asia/Tokyo");
    expect(settings.notifications.dailyDigest).toBe(true);

    await expect(api.settings.update({ userId: "alice", patch: { timezone: "Nowhere/Land" } })).rejects.toMatchObject({
      code: "BAD_REQUEST",
    });
  });

  it("reports why an evening review cannot start", async () => {
    await expect(caller().session.start({ userId: "alice" })).rejects.toMatchObject({
      code: "BAD_REQUEST",
      message: "There are no open tasks to review tonight.",
    });
    expect(await caller().session.current({ userId: "alice" })).toBeNull();
  });

  it("delivers an on-demand digest to live subscribers", async () => {
    const received: Notification[] = [];
    const unsubscribe = hub.subscribe("alice", (n) => received.push(n));

    expect(await caller().notifications.sendDigest({ userId: "alice" })).toEqual({ outcome: "sent" });
    expect(received).toHaveLength(1);
    expect(received[0].text).toBe("Good morning! Your list is empty. Tell me what you'd like to work on today.");

    unsubscribe();
    expect(hub.listenerCount("alice")).toBe(0);
  });

  it("describes the service", async () => {
    const info = await caller().system.info();
    expect(info.name).toBe("dusk");
    expect(info.scheduler).toEqual({ running: false, digestTime: "09:00", timezone: "UTC" });
    expect((await caller().system.health()).status).toBe("ok");
  });
});
