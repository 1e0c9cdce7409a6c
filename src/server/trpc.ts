// ============================================================================
// tRPC SETUP
// ============================================================================
// Base tRPC configuration for the server.

import { initTRPC, TRPCError } from "@trpc/server";
import { z } from "zod";
import { AppContext } from "../app/context.js";
import { DuskError, ErrorKind, Result } from "../errors/index.js";
import { TaskPrioritySchema, TaskStatusSchema } from "../storage/records.js";
import { NotificationHub } from "./hub.js";

// ---- Context ----

export interface TRPCContext {
  app: AppContext;
  hub: NotificationHub;
}

// ---- tRPC Instance ----

const t = initTRPC.context<TRPCContext>().create({
  errorFormatter({ shape, error }) {
    return {
      ...shape,
      data: {
        ...shape.data,
        stack: process.env.NODE_ENV === "development" ? error.stack : undefined,
      },
    };
  },
});

// ---- Exports ----

export const router = t.router;
export const publicProcedure = t.procedure;

// ---- Result Mapping ----

const ERROR_CODES: Record<ErrorKind, TRPCError["code"]> = {
  validation: "BAD_REQUEST",
  not_found: "NOT_FOUND",
  resolver_failure: "INTERNAL_SERVER_ERROR",
  persistence: "INTERNAL_SERVER_ERROR",
};

export function toTRPCError(error: DuskError): TRPCError {
  return new TRPCError({ code: ERROR_CODES[error.kind], message: error.message, cause: error });
}

/**
 * Return the value of a successful result or throw the matching TRPCError
 */
export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) throw toTRPCError(result.error);
  return result.value;
}

// ---- Zod Schemas for Validation ----

const TimeOfDaySchema = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, "Expected HH:MM");

export const UserInputSchema = z.object({
  userId: z.string().min(1),
});

export const ChatMessageInputSchema = UserInputSchema.extend({
  text: z.string(),
  messageId: z.string().min(1).optional(),
});

export const OnboardingActionSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("next") }),
  z.object({ type: z.literal("skip") }),
  z.object({ type: z.literal("answer"), value: z.number().int().min(1).max(5) }),
  z.object({
    type: z.literal("toggle_goal"),
    goal: z.enum(["task_management", "stress_reduction", "productivity", "time_organization"]),
  }),
  z.object({
    type: z.literal("toggle_notification"),
    flag: z.enum(["dailyDigest", "deadlineReminders", "newTaskNotifications"]),
  }),
  z.object({ type: z.literal("meet_mentor") }),
]);

export const CreateTaskInputSchema = UserInputSchema.extend({
  title: z.string().min(1, "Title is required"),
  description: z.string().optional(),
  priority: TaskPrioritySchema.optional(),
  dueAt: z.string().optional(),
});

export const TaskRefInputSchema = UserInputSchema.extend({
  taskId: z.string().min(1),
});

export const ListTasksInputSchema = UserInputSchema.extend({
  status: TaskStatusSchema.optional(),
});

export const SettingsPatchSchema = z
  .object({
    enabled: z.boolean(),
    dailyDigest: z.boolean(),
    deadlineReminders: z.boolean(),
    newTaskNotifications: z.boolean(),
    sendTime: TimeOfDaySchema,
    timezone: z.string().min(1),
  })
  .partial();
