// ============================================================================
// KEYWORD VOCABULARY
// ============================================================================
// Phrase lists for the keyword classifier, the confirmation gate and the
// reflection flow, read once from data/vocabulary.json.

import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { z } from "zod";

const VocabularySchema = z.object({
  affirmative: z.array(z.string()),
  negative: z.array(z.string()),
  create: z.array(z.string()),
  delete: z.array(z.string()),
  status: z.object({
    completed: z.array(z.string()),
    in_progress: z.array(z.string()),
    cancelled: z.array(z.string()),
  }),
  priority: z.array(z.string()),
  view: z.array(z.string()),
  analytics: z.array(z.string()),
  reflection: z.array(z.string()),
  stopwords: z.array(z.string()),
  noProgress: z.array(z.string()),
});

export type Vocabulary = z.infer<typeof VocabularySchema>;

// src/resolver and dist/resolver sit at the same depth below the package root
const VOCABULARY_PATH = fileURLToPath(new URL("../../data/vocabulary.json", import.meta.url));

let cached: Vocabulary | null = null;

export function loadVocabulary(): Vocabulary {
  if (!cached) {
    cached = VocabularySchema.parse(JSON.parse(readFileSync(VOCABULARY_PATH, "utf-8")));
  }
  return cached;
}
