// ============================================================================
// MENTOR
// ============================================================================
// General advice for turns that are not about managing tasks. Always answers:
// a failed completion call yields a fixed reply.

import { UserProfile } from "../types/index.js";
import { CompletionService, completeOr } from "../llm/index.js";
import { describeUser } from "../sessions/profile.js";

export const MENTOR_FALLBACK_REPLY =
  "I can't put together a proper answer right now. Try breaking the problem into one small next step, " +
  "and ask me again in a moment.";

const MENTOR_HISTORY_TURNS = 10;

export class Mentor {
  constructor(private completion: CompletionService) {}

  async advise(user: UserProfile, text: string): Promise<string> {
    const context = describeUser(user);
    const system = [
      "You are a calm, practical mentor inside a task tracker.",
      "Give short, concrete advice about work, focus, planning and stress.",
      "Keep replies under 120 words. Do not invent tasks the user has not mentioned.",
      context ? `About the user: ${context}` : "",
    ]
      .filter(Boolean)
      .join("\n");

    return completeOr(
      this.completion,
      { system, history: user.history.slice(-MENTOR_HISTORY_TURNS), prompt: text },
      MENTOR_FALLBACK_REPLY
    );
  }
}
