// ============================================================================
// INTENT RESOLVER
// ============================================================================
// Turns one utterance plus the owner's tasks into an IntentDecision.
//
// The completion service classifies the turn; the keyword classifier stands in
// when it fails. Either way the same selection policy picks tasks for
// update/delete, and nothing is ever mutated here: a single match only asks
// for confirmation, and a confirmation only counts against the pending action
// the previous turn surfaced.

import { z } from "zod";

import {
  ACTIVE_STATUSES,
  DialogueTurn,
  PendingAction,
  Task,
  TaskChange,
} from "../types/index.js";
import { CompletionService, requestStructured } from "../llm/index.js";
import { TaskPrioritySchema, TaskStatusSchema } from "../storage/records.js";
import { STATUS_LABELS, formatTaskLine, shortId } from "../format/index.js";
import { TaskMatch, findMatches, findTasksById } from "./matching.js";
import {
  Classification,
  CreateRequest,
  IntentAction,
  IntentRoute,
  ViewKind,
  classifyByKeywords,
  confirmationRemainder,
  isAffirmative,
  isNegative,
} from "./keywords.js";

export * from "./matching.js";
export * from "./keywords.js";

export const MAX_SUGGESTIONS = 5;
export const MAX_DISAMBIGUATION = 10;
export const RESOLVER_HISTORY_TURNS = 6;

export interface SelectedTask {
  taskId: string;
  title: string;
  confidence: number;
  reasoning: string;
}

export type DecisionSource = "model" | "keywords" | "context";

export interface IntentDecision {
  action: IntentAction;
  route: IntentRoute;
  selectedTasks: SelectedTask[];
  requiresConfirmation: boolean;
  /** The turn confirmed the pending action; execute it */
  confirmed: boolean;
  /** The turn declined the pending action */
  cancelled: boolean;
  /** Offered when a search phrase matched nothing */
  suggestions: SelectedTask[];
  suggestedResponse: string;
  create?: CreateRequest;
  change?: TaskChange;
  view?: ViewKind;
  searchPhrase?: string;
  source: DecisionSource;
}

export interface ResolveInput {
  utterance: string;
  tasks: Task[];
  history: DialogueTurn[];
  pendingAction: PendingAction | null;
  timezone?: string;
}

// ---- Model Reply Schema ----

const ModelClassificationSchema = z
  .object({
    action: z.enum(["create", "update", "delete", "view", "unknown"]),
    route: z.enum(["tasks", "reflection", "advice"]).default("tasks"),
    search_phrase: z.string().nullish(),
    task_ids: z.array(z.string()).default([]),
    title: z.string().nullish(),
    description: z.string().nullish(),
    priority: TaskPrioritySchema.nullish(),
    new_status: TaskStatusSchema.nullish(),
    new_priority: TaskPrioritySchema.nullish(),
    view: z.enum(["tasks", "analytics"]).nullish(),
    confidence: z.number().min(0).max(1).default(0.5),
    reasoning: z.string().default(""),
    response: z.string().nullish(),
  })
  .transform((reply): Classification => {
    const classification: Classification = {
      action: reply.action,
      route: reply.action === "unknown" && reply.route === "tasks" ? "advice" : reply.route,
      taskIds: reply.task_ids,
      confidence: reply.confidence,
      reasoning: reply.reasoning,
    };
    if (reply.search_phrase) classification.searchPhrase = reply.search_phrase;
    if (reply.response) classification.suggestedResponse = reply.response;
    if (reply.view) classification.view = reply.view;
    if (reply.action === "create") {
      classification.create = {
        title: (reply.title ?? "").trim(),
        description: (reply.description ?? "").trim(),
        priority: reply.priority ?? "medium",
      };
    }
    if (reply.new_status) {
      classification.change = { field: "status", value: reply.new_status };
    } else if (reply.new_priority) {
      classification.change = { field: "priority", value: reply.new_priority };
    }
    return classification;
  });

function buildSystemPrompt(input: ResolveInput): string {
  const tasks = input.tasks.length
    ? input.tasks
        .map((t) => `- id=${t.id} | ${t.title} | ${t.status} | ${t.priority}${t.description ? ` | ${t.description}` : ""}`)
        .join("\n")
    : "(no tasks)";

  return `You classify one message from a user of a task tracker.

The user's tasks:
${tasks}

Reply with JSON:
{
  "action": "create" | "update" | "delete" | "view" | "unknown",
  "route": "tasks" | "reflection" | "advice",
  "search_phrase": words from the message that name the task to update or delete,
  "task_ids": ids from the list above the message clearly refers to,
  "title": title for a new task,
  "description": optional description for a new task,
  "priority": "low" | "medium" | "high" | "urgent" for a new task,
  "new_status": "pending" | "in_progress" | "completed" | "cancelled" for an update,
  "new_priority": "low" | "medium" | "high" | "urgent" for an update,
  "view": "tasks" | "analytics" when the user wants to see tasks or statistics,
  "confidence": 0..1,
  "reasoning": one short sentence,
  "response": a short reply when the action is unknown
}

Use route "reflection" when the user wants to review their day, and "advice"
for anything that is not about managing tasks. Never pick a task the message
does not name.`;
}

// ---- Resolver ----

export class IntentResolver {
  constructor(private completion: CompletionService) {}

  /**
   * Resolve with the completion service. Throws ResolverFailure when it times
   * out or replies with something unusable.
   */
  async resolve(input: ResolveInput): Promise<IntentDecision> {
    const contextual = this.resolveFromContext(input);
    if (contextual) return contextual;

    const classification = await requestStructured(
      this.completion,
      {
        system: buildSystemPrompt(input),
        history: input.history.slice(-RESOLVER_HISTORY_TURNS),
        prompt: input.utterance,
      },
      ModelClassificationSchema
    );
    return this.decide(classification, input, "model");
  }

  /**
   * Resolve with the keyword classifier only
   */
  resolveWithKeywords(input: ResolveInput): IntentDecision {
    const contextual = this.resolveFromContext(input);
    if (contextual) return contextual;
    return this.decide(classifyByKeywords(input.utterance), input, "keywords");
  }

  /**
   * Confirmation or refusal of the pending action. Only an affirmative
   * confirms; a task id in the reply can narrow it but never stands in for
   * one. Returns null when the turn does not answer the pending action,
   * including an affirmative whose task no longer exists and one that names a
   * different task ("yes, delete bread" while milk is pending).
   */
  resolveFromContext(input: ResolveInput): IntentDecision | null {
    const pending = input.pendingAction;
    if (!pending) return null;

    const task = input.tasks.find((t) => t.id === pending.taskId);

    if (task && isAffirmative(input.utterance)) {
      if (namesOtherTask(input, pending.taskId)) return null;
      const decision = baseDecision(pending.kind, "context");
      decision.confirmed = true;
      decision.selectedTasks = [{ taskId: task.id, title: task.title, confidence: 1, reasoning: "Confirmed by the user" }];
      if (pending.kind === "update") decision.change = pending.change;
      return decision;
    }

    if (isNegative(input.utterance)) {
      const decision = baseDecision("unknown", "context");
      decision.cancelled = true;
      decision.suggestedResponse = `Okay, I won't touch "${pending.title}".`;
      return decision;
    }

    return null;
  }

  /**
   * Apply the selection policy to a classification
   */
  decide(classification: Classification, input: ResolveInput, source: DecisionSource): IntentDecision {
    const timezone = input.timezone ?? "UTC";

    if (classification.route === "reflection") {
      return baseDecision("unknown", source, "reflection");
    }

    switch (classification.action) {
      case "unknown": {
        const decision = baseDecision("unknown", source, "advice");
        decision.suggestedResponse = classification.suggestedResponse ?? "";
        return decision;
      }

      case "view": {
        const decision = baseDecision("view", source);
        decision.view = classification.view ?? "tasks";
        return decision;
      }

      case "create": {
        const decision = baseDecision("create", source);
        if (!classification.create || !classification.create.title) {
          decision.suggestedResponse = "What should the new task be called?";
          return decision;
        }
        decision.create = classification.create;
        return decision;
      }

      case "update":
      case "delete":
        return this.select(classification, input, source, timezone);
    }
  }

  // ---- Selection Policy ----

  private select(
    classification: Classification,
    input: ResolveInput,
    source: DecisionSource,
    timezone: string
  ): IntentDecision {
    const decision = baseDecision(classification.action, source);
    const phrase = (classification.searchPhrase ?? "").trim();
    if (phrase) decision.searchPhrase = phrase;
    if (classification.change) decision.change = classification.change;

    const matches = this.findCandidates(classification, input, phrase);

    if (matches.length === 0) {
      const active = input.tasks.filter((t) => ACTIVE_STATUSES.includes(t.status));
      decision.suggestions = active.slice(0, MAX_SUGGESTIONS).map((t) => ({
        taskId: t.id,
        title: t.title,
        confidence: 0,
        reasoning: "Open task",
      }));
      const lead = phrase ? `I couldn't find a task matching "${phrase}".` : "Which task do you mean?";
      decision.suggestedResponse = decision.suggestions.length
        ? `${lead} Your open tasks:\n${active
            .slice(0, MAX_SUGGESTIONS)
            .map((t) => `- ${formatTaskLine(t, timezone)}`)
            .join("\n")}`
        : `${lead} You have no open tasks.`;
      return decision;
    }

    if (matches.length > 1) {
      const ranked = [...matches].sort((a, b) => b.confidence - a.confidence).slice(0, MAX_DISAMBIGUATION);
      decision.selectedTasks = ranked.map(toSelected);
      decision.suggestedResponse =
        `Several tasks match${phrase ? ` "${phrase}"` : ""}:\n` +
        ranked.map((m, i) => `${i + 1}. ${formatTaskLine(m.task, timezone)}`).join("\n") +
        `\nPlease use a more specific name or the task id.`;
      return decision;
    }

    const [match] = matches;
    decision.selectedTasks = [toSelected(match)];

    if (classification.action === "update" && !classification.change) {
      decision.suggestedResponse = `What should I change about "${match.task.title}"?`;
      return decision;
    }

    decision.requiresConfirmation = true;
    decision.suggestedResponse = confirmationPrompt(match.task, classification.action, classification.change);
    return decision;
  }

  private findCandidates(classification: Classification, input: ResolveInput, phrase: string): TaskMatch[] {
    const byId = findTasksById(input.utterance, input.tasks);
    if (byId.length > 0) {
      return byId.map((task): TaskMatch => ({ task, tier: "id", confidence: 1, reasoning: "Task id given directly" }));
    }

    if (phrase) return findMatches(phrase, input.tasks);

    // The model may point at tasks without quoting a phrase; only ids it was shown count
    const ids = new Set(classification.taskIds ?? []);
    return input.tasks
      .filter((task) => ids.has(task.id))
      .map((task): TaskMatch => ({
        task,
        tier: "id",
        confidence: classification.confidence,
        reasoning: classification.reasoning || "Chosen by the model",
      }));
  }
}

// ---- Helpers ----

function baseDecision(action: IntentAction, source: DecisionSource, route: IntentRoute = "tasks"): IntentDecision {
  return {
    action,
    route,
    selectedTasks: [],
    requiresConfirmation: false,
    confirmed: false,
    cancelled: false,
    suggestions: [],
    suggestedResponse: "",
    source,
  };
}

/**
 * Whether a confirming reply points at some task other than the pending one,
 * by id or by the words left after the agreement
 */
function namesOtherTask(input: ResolveInput, pendingTaskId: string): boolean {
  const byId = findTasksById(input.utterance, input.tasks);
  if (byId.some((t) => t.id !== pendingTaskId)) return true;
  if (byId.length > 0) return false;

  const matches = findMatches(confirmationRemainder(input.utterance), input.tasks);
  return matches.length > 0 && !matches.some((m) => m.task.id === pendingTaskId);
}

function toSelected(match: TaskMatch): SelectedTask {
  return {
    taskId: match.task.id,
    title: match.task.title,
    confidence: match.confidence,
    reasoning: match.reasoning,
  };
}

export function describeChange(change: TaskChange): string {
  return change.field === "status"
    ? `mark it as ${STATUS_LABELS[change.value]}`
    : `set its priority to ${change.value}`;
}

function confirmationPrompt(task: Task, action: IntentAction, change: TaskChange | undefined): string {
  const label = `"${task.title}" (${shortId(task.id)})`;
  if (action === "delete") {
    return `Delete ${label}? This can't be undone. Reply "yes" to confirm.`;
  }
  return `Found ${label}. Shall I ${change ? describeChange(change) : "update it"}? Reply "yes" to confirm.`;
}
