// ============================================================================
// KEYWORD CLASSIFIER
// ============================================================================
// Deterministic fallback used when the completion service cannot classify a
// turn. Covers the small task vocabulary only; anything else is "unknown" and
// goes to the mentor.

import { TaskChange, TaskPriority, TASK_PRIORITIES } from "../types/index.js";
import { containsPhrase, looseText } from "./matching.js";
import { loadVocabulary, type Vocabulary } from "./vocabulary.js";

export type IntentAction = "create" | "update" | "delete" | "view" | "unknown";

export type IntentRoute = "tasks" | "reflection" | "advice";

export type ViewKind = "tasks" | "analytics";

export interface CreateRequest {
  title: string;
  description: string;
  priority: TaskPriority;
}

/** What a classifier (model or keywords) read out of one utterance */
export interface Classification {
  action: IntentAction;
  route: IntentRoute;
  searchPhrase?: string;
  taskIds?: string[];
  create?: CreateRequest;
  change?: TaskChange;
  view?: ViewKind;
  confidence: number;
  reasoning: string;
  suggestedResponse?: string;
}

// ---- Phrase Helpers ----

function firstPhrase(text: string, phrases: readonly string[]): string | undefined {
  return phrases.find((phrase) => containsPhrase(text, phrase));
}

function startsWithPhrase(text: string, phrases: readonly string[], maxWords: number): boolean {
  const loose = looseText(text);
  if (!loose || loose.split(" ").length > maxWords) return false;
  return phrases.some((phrase) => loose === phrase || loose.startsWith(`${phrase} `));
}

/** A short reply that agrees ("yes", "do it", "ok, delete it") */
export function isAffirmative(text: string): boolean {
  return startsWithPhrase(text, loadVocabulary().affirmative, 5);
}

/** A short reply that declines ("no", "never mind") */
export function isNegative(text: string): boolean {
  return startsWithPhrase(text, loadVocabulary().negative, 5);
}

/** Whether a progress report says nothing was done */
export function indicatesNoProgress(text: string): boolean {
  return firstPhrase(text, loadVocabulary().noProgress) !== undefined;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function detectPriority(text: string): TaskPriority | undefined {
  const loose = looseText(text);
  for (const priority of TASK_PRIORITIES) {
    if (containsPhrase(loose, `${priority} priority`) || containsPhrase(loose, `priority ${priority}`)) {
      return priority;
    }
  }
  if (containsPhrase(loose, "urgent") || containsPhrase(loose, "asap")) return "urgent";
  return undefined;
}

/**
 * Strip command words and fillers, leaving the words that name a task
 */
export function extractSearchPhrase(text: string, commandPhrases: readonly string[] = []): string {
  const vocabulary = loadVocabulary();
  let loose = ` ${looseText(text)} `;
  const phrases = [...commandPhrases].sort((a, b) => b.length - a.length);
  for (const phrase of phrases) {
    loose = loose.split(` ${looseText(phrase)} `).join(" ");
  }
  for (const priority of TASK_PRIORITIES) {
    loose = loose.split(` ${priority} `).join(" ");
  }
  const stopwords = new Set(vocabulary.stopwords);
  return loose
    .split(" ")
    .filter((word) => word && !stopwords.has(word) && word !== "priority")
    .join(" ");
}

/**
 * What is left of a confirming reply once agreement and command words are
 * gone: "yes delete bread" leaves "bread", "ok do it" leaves nothing.
 */
export function confirmationRemainder(text: string): string {
  const vocabulary = loadVocabulary();
  return extractSearchPhrase(text, [
    ...vocabulary.affirmative,
    ...vocabulary.delete,
    ...Object.values(vocabulary.status).flat(),
  ]);
}

/**
 * The task title following a create trigger, in the user's own casing
 */
export function extractTitle(text: string, trigger: string): string {
  const pattern = new RegExp(`\\b${escapeRegExp(trigger).replace(/ /g, "\\s+")}\\b`, "i");
  const match = pattern.exec(text);
  const rest = match ? text.slice(match.index + match[0].length) : text;

  return rest
    .replace(/^\s*(?:a\s+)?(?:new\s+)?(?:task|todo|reminder)?\s*(?:to\s+)?[:\-]?\s*/i, "")
    .replace(/[,;]?\s*(?:with\s+)?(?:a\s+)?(?:low|medium|high|urgent)\s+priority\s*[.!]?$/i, "")
    .replace(/[,;]?\s*(?:it'?s\s+)?(?:urgent|asap)\s*[.!]?$/i, "")
    .replace(/[.!?]+$/, "")
    .trim();
}

// ---- Classification ----

export function classifyByKeywords(text: string): Classification {
  const vocabulary = loadVocabulary();

  if (firstPhrase(text, vocabulary.reflection)) {
    return {
      action: "unknown",
      route: "reflection",
      confidence: 0.7,
      reasoning: "Asked for the evening reflection",
    };
  }

  const deleteWord = firstPhrase(text, vocabulary.delete);
  if (deleteWord) {
    return {
      action: "delete",
      route: "tasks",
      searchPhrase: extractSearchPhrase(text, vocabulary.delete),
      confidence: 0.7,
      reasoning: `Found "${deleteWord}"`,
    };
  }

  const priorityWord = firstPhrase(text, vocabulary.priority);
  const newPriority = detectPriority(text);

  const createWord = firstPhrase(text, vocabulary.create);
  if (createWord) {
    const title = extractTitle(text, createWord);
    return {
      action: "create",
      route: "tasks",
      create: { title, description: "", priority: newPriority ?? "medium" },
      confidence: 0.7,
      reasoning: `Found "${createWord}"`,
    };
  }

  if (priorityWord && newPriority) {
    return {
      action: "update",
      route: "tasks",
      searchPhrase: extractSearchPhrase(text, [...vocabulary.priority, "urgent", "asap"]),
      change: { field: "priority", value: newPriority },
      confidence: 0.6,
      reasoning: `Found "${priorityWord}" with ${newPriority}`,
    };
  }

  const statuses: Array<keyof Vocabulary["status"]> = ["completed", "in_progress", "cancelled"];
  for (const status of statuses) {
    const phrases = vocabulary.status[status];
    const statusWord = firstPhrase(text, phrases);
    if (statusWord) {
      return {
        action: "update",
        route: "tasks",
        searchPhrase: extractSearchPhrase(text, phrases),
        change: { field: "status", value: status },
        confidence: 0.6,
        reasoning: `Found "${statusWord}"`,
      };
    }
  }

  if (firstPhrase(text, vocabulary.analytics)) {
    return { action: "view", route: "tasks", view: "analytics", confidence: 0.7, reasoning: "Asked for statistics" };
  }

  if (firstPhrase(text, vocabulary.view)) {
    return { action: "view", route: "tasks", view: "tasks", confidence: 0.7, reasoning: "Asked to see tasks" };
  }

  return { action: "unknown", route: "advice", confidence: 0.3, reasoning: "No task keywords" };
}
