// ============================================================================
// TASK MATCHING
// ============================================================================
// Tiered lookup of a search phrase against an owner's tasks. A tier is only
// consulted when every earlier tier found nothing:
//   1. substring of title + description
//   2. every word of a multi-word phrase present
//   3. the same after naive suffix folding

import { Task } from "../types/index.js";

export type MatchTier = "id" | "substring" | "all_words" | "stemmed";

export interface TaskMatch {
  task: Task;
  tier: MatchTier;
  confidence: number;
  reasoning: string;
}

const TIER_CONFIDENCE: Record<MatchTier, number> = {
  id: 1,
  substring: 0.9,
  all_words: 0.75,
  stemmed: 0.6,
};

/** Shortest id prefix accepted as a reference to a task */
export const SHORT_ID_LENGTH = 8;

// ---- Text Helpers ----

/**
 * Lowercase, curly quotes straightened, everything but letters, digits and
 * apostrophes turned into single spaces
 */
export function looseText(text: string): string {
  return text
    .toLowerCase()
    .replace(/[‘’]/g, "'")
    .replace(/[^\p{L}\p{N}']+/gu, " ")
    .trim();
}

/**
 * Lowercase words only, for comparisons that ignore punctuation entirely
 */
export function normalize(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, " ")
    .trim();
}

export function tokenize(text: string): string[] {
  const normalized = normalize(text);
  return normalized ? normalized.split(" ") : [];
}

/**
 * Whether `phrase` occurs in `text` on word boundaries (both loosened)
 */
export function containsPhrase(text: string, phrase: string): boolean {
  const needle = looseText(phrase);
  if (!needle) return false;
  return ` ${looseText(text)} `.includes(` ${needle} `);
}

/**
 * Naive suffix folding: ies→y, ing, ed, es (after a sibilant), ly, s
 */
export function stem(word: string): string {
  const w = word.toLowerCase();
  if (w.length > 4 && w.endsWith("ies")) return `${w.slice(0, -3)}y`;
  if (w.length > 5 && w.endsWith("ing")) return w.slice(0, -3);
  if (w.length > 4 && w.endsWith("ed")) return w.slice(0, -2);
  if (w.length > 4 && /(?:ch|sh|ss|x|z)es$/.test(w)) return w.slice(0, -2);
  if (w.length > 4 && w.endsWith("ly")) return w.slice(0, -2);
  if (w.length > 3 && w.endsWith("s") && !w.endsWith("ss")) return w.slice(0, -1);
  return w;
}

function searchableText(task: Task): string {
  return `${task.title} ${task.description}`;
}

function describeTier(tier: MatchTier, phrase: string): string {
  switch (tier) {
    case "id":
      return "Task id given directly";
    case "substring":
      return `Contains "${phrase}"`;
    case "all_words":
      return `Contains every word of "${phrase}"`;
    case "stemmed":
      return `Contains every word of "${phrase}" ignoring word endings`;
  }
}

// ---- Matching ----

/**
 * Tasks whose full id, or an id prefix of at least SHORT_ID_LENGTH characters,
 * appears as a word in the text
 */
export function findTasksById(text: string, tasks: Task[]): Task[] {
  const words = new Set(text.toLowerCase().match(/[0-9a-f-]{8,}/g) ?? []);
  if (words.size === 0) return [];
  return tasks.filter((task) => {
    const id = task.id.toLowerCase();
    for (const word of words) {
      if (word.length >= SHORT_ID_LENGTH && id.startsWith(word)) return true;
    }
    return false;
  });
}

/**
 * Run the matching tiers in order and return the first tier's matches.
 * An empty phrase matches nothing.
 */
export function findMatches(phrase: string, tasks: Task[]): TaskMatch[] {
  const needle = normalize(phrase);
  if (!needle) return [];

  const toMatches = (matched: Task[], tier: MatchTier): TaskMatch[] =>
    matched.map((task) => ({
      task,
      tier,
      confidence: normalize(task.title) === needle ? 1 : TIER_CONFIDENCE[tier],
      reasoning: describeTier(tier, phrase.trim()),
    }));

  const bySubstring = tasks.filter((task) => normalize(searchableText(task)).includes(needle));
  if (bySubstring.length > 0) return toMatches(bySubstring, "substring");

  const words = needle.split(" ");
  if (words.length > 1) {
    const byWords = tasks.filter((task) => {
      const have = new Set(tokenize(searchableText(task)));
      return words.every((word) => have.has(word));
    });
    if (byWords.length > 0) return toMatches(byWords, "all_words");
  }

  const stems = words.map(stem);
  const byStem = tasks.filter((task) => {
    const have = new Set(tokenize(searchableText(task)).map(stem));
    return stems.every((s) => have.has(s));
  });
  return toMatches(byStem, "stemmed");
}
