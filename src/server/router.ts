// ============================================================================
// tRPC ROUTER - Conversation and Task API
// ============================================================================
// Every procedure is scoped by userId. Chat goes through the orchestrator;
// the task procedures call the store directly for clients with their own UI.

import { TRPCError } from "@trpc/server";
import { observable } from "@trpc/server/observable";

import {
  router,
  publicProcedure,
  unwrap,
  UserInputSchema,
  ChatMessageInputSchema,
  OnboardingActionSchema,
  CreateTaskInputSchema,
  TaskRefInputSchema,
  ListTasksInputSchema,
  SettingsPatchSchema,
} from "./trpc.js";
import { TaskPrioritySchema, TaskStatusSchema } from "../storage/records.js";
import { getStorageTypeName } from "../storage/index.js";
import { Notification } from "../types/index.js";

// ============================================================================
// CHAT ROUTER
// ============================================================================

export const chatRouter = router({
  /**
   * Send one utterance and get the reply
   */
  send: publicProcedure.input(ChatMessageInputSchema).mutation(async ({ ctx, input }) => {
    return ctx.app.orchestrator.handleMessage(input);
  }),

  /**
   * Structured onboarding action (a button press)
   */
  action: publicProcedure
    .input(UserInputSchema.extend({ action: OnboardingActionSchema }))
    .mutation(async ({ ctx, input }) => {
      return ctx.app.orchestrator.handleAction(input.userId, input.action);
    }),
});

// ============================================================================
// TASK ROUTER
// ============================================================================

export const taskRouter = router({
  list: publicProcedure.input(ListTasksInputSchema).query(async ({ ctx, input }) => {
    const tasks = await ctx.app.storage.listTasks(input.userId, input.status);
    return { tasks, total: tasks.length };
  }),

  get: publicProcedure.input(TaskRefInputSchema).query(async ({ ctx, input }) => {
    const task = await ctx.app.storage.getTask(input.taskId, input.userId);
    if (!task) {
      throw new TRPCError({
        code: "NOT_FOUND",
        message: `Task not found: ${input.taskId}`,
      });
    }
    return task;
  }),

  create: publicProcedure.input(CreateTaskInputSchema).mutation(async ({ ctx, input }) => {
    const { userId, ...fields } = input;
    return unwrap(await ctx.app.storage.createTask({ ownerId: userId, ...fields }));
  }),

  updateStatus: publicProcedure
    .input(TaskRefInputSchema.extend({ status: TaskStatusSchema }))
    .mutation(async ({ ctx, input }) => {
      return unwrap(await ctx.app.storage.updateTaskStatus(input.taskId, input.userId, input.status));
    }),

  updatePriority: publicProcedure
    .input(TaskRefInputSchema.extend({ priority: TaskPrioritySchema }))
    .mutation(async ({ ctx, input }) => {
      return unwrap(await ctx.app.storage.updateTaskPriority(input.taskId, input.userId, input.priority));
    }),

  delete: publicProcedure.input(TaskRefInputSchema).mutation(async ({ ctx, input }) => {
    const deleted = unwrap(await ctx.app.storage.deleteTask(input.taskId, input.userId));
    if (!deleted) {
      throw new TRPCError({
        code: "NOT_FOUND",
        message: `Task not found: ${input.taskId}`,
      });
    }
    return { deleted: input.taskId };
  }),

  analytics: publicProcedure.input(UserInputSchema).query(async ({ ctx, input }) => {
    return ctx.app.storage.getAnalytics(input.userId);
  }),
});

// ============================================================================
// SESSION ROUTER
// ============================================================================

export const sessionRouter = router({
  /**
   * The unfinished evening review, or null
   */
  current: publicProcedure.input(UserInputSchema).query(async ({ ctx, input }) => {
    return ctx.app.orchestrator.currentReflection(input.userId);
  }),

  start: publicProcedure.input(UserInputSchema).mutation(async ({ ctx, input }) => {
    return { reply: unwrap(await ctx.app.orchestrator.startReflection(input.userId)) };
  }),

  summaries: publicProcedure.input(UserInputSchema).query(async ({ ctx, input }) => {
    return ctx.app.storage.listDailySummaries(input.userId);
  }),
});

// ============================================================================
// SETTINGS ROUTER
// ============================================================================

export const settingsRouter = router({
  get: publicProcedure.input(UserInputSchema).query(async ({ ctx, input }) => {
    const user = await ctx.app.orchestrator.getUser(input.userId);
    return { timezone: user.timezone, notifications: user.notifications };
  }),

  update: publicProcedure
    .input(UserInputSchema.extend({ patch: SettingsPatchSchema }))
    .mutation(async ({ ctx, input }) => {
      const user = unwrap(await ctx.app.orchestrator.updateSettings(input.userId, input.patch));
      return { timezone: user.timezone, notifications: user.notifications };
    }),
});

// ============================================================================
// NOTIFICATIONS ROUTER
// ============================================================================

export const notificationsRouter = router({
  /**
   * Live notifications for one user (WebSocket only)
   */
  onNotification: publicProcedure.input(UserInputSchema).subscription(({ ctx, input }) => {
    return observable<Notification>((emit) => ctx.hub.subscribe(input.userId, (n) => emit.next(n)));
  }),

  /**
   * Send today's digest now, regardless of the daily marker
   */
  sendDigest: publicProcedure.input(UserInputSchema).mutation(async ({ ctx, input }) => {
    return { outcome: await ctx.app.scheduler.sendDigestNow(input.userId) };
  }),
});

// ============================================================================
// SYSTEM ROUTER
// ============================================================================

export const systemRouter = router({
  health: publicProcedure.query(async ({ ctx }) => {
    const storageReady = await ctx.app.storage.isReady();
    return {
      status: storageReady ? "ok" : "degraded",
      storage: storageReady,
      timestamp: new Date().toISOString(),
    };
  }),

  info: publicProcedure.query(({ ctx }) => {
    return {
      name: "dusk",
      storage: getStorageTypeName(ctx.app.config.storage),
      llm: ctx.app.config.llm.provider,
      scheduler: {
        running: ctx.app.scheduler.isRunning,
        digestTime: ctx.app.config.scheduler.digestTime,
        timezone: ctx.app.config.scheduler.timezone,
      },
    };
  }),
});

export const appRouter = router({
  chat: chatRouter,
  task: taskRouter,
  session: sessionRouter,
  settings: settingsRouter,
  notifications: notificationsRouter,
  system: systemRouter,
});

export type AppRouter = typeof appRouter;
