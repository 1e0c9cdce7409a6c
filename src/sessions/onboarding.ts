// ============================================================================
// ONBOARDING FLOW
// ============================================================================
// greeting → anxiety_intro → anxiety_survey → goals → notifications →
// mentor_intro → completion → completed
//
// Each turn is either a structured action (a button press on the transport) or
// free text read against the current step. The flow returns an updated copy of
// the profile; the caller persists it.

import {
  Clock,
  GoalId,
  NotificationFlag,
  NotificationSettings,
  OnboardingStep,
  UserProfile,
  systemClock,
} from "../types/index.js";
import { Mentor } from "../mentor/index.js";
import { containsPhrase, tokenize } from "../resolver/matching.js";
import { StepSequence } from "./flow.js";
import {
  ANXIETY_QUESTIONS,
  GOALS,
  GOAL_LABELS,
  NOTIFICATION_FLAGS,
  NOTIFICATION_LABELS,
  anxietyBand,
  anxietyLevel,
} from "./profile.js";

export const ONBOARDING_SEQUENCE = new StepSequence<OnboardingStep>([
  "greeting",
  "anxiety_intro",
  "anxiety_survey",
  "goals",
  "notifications",
  "mentor_intro",
  "completion",
  "completed",
]);

export type OnboardingAction =
  | { type: "next" }
  | { type: "skip" }
  | { type: "answer"; value: number }
  | { type: "toggle_goal"; goal: GoalId }
  | { type: "toggle_notification"; flag: NotificationFlag }
  | { type: "meet_mentor" };

export type FlowInput = { kind: "text"; text: string } | { kind: "action"; action: OnboardingAction };

export interface OnboardingTurn {
  user: UserProfile;
  reply: string;
  completed: boolean;
}

// Position shown in the progress bar; the survey shares a slot with its intro
const PROGRESS: Record<OnboardingStep, number> = {
  greeting: 1,
  anxiety_intro: 2,
  anxiety_survey: 2,
  goals: 3,
  notifications: 4,
  mentor_intro: 5,
  completion: 6,
  completed: 6,
};

const PROGRESS_TOTAL = 6;

const NEXT_WORDS = new Set(["next", "done", "continue", "ready", "finish", "finished", "go"]);

const GOAL_KEYWORDS: Record<GoalId, string[]> = {
  task_management: ["tasks", "task management", "priorities"],
  stress_reduction: ["stress", "anxiety"],
  productivity: ["productivity", "productive"],
  time_organization: ["time", "schedule"],
};

export function progressBar(step: OnboardingStep): string {
  const done = PROGRESS[step];
  return `${"●".repeat(done)}${"○".repeat(PROGRESS_TOTAL - done)} ${done}/${PROGRESS_TOTAL}`;
}

// ---- Input Helpers ----

function isNext(input: FlowInput): boolean {
  if (input.kind === "action") return input.action.type === "next";
  return tokenize(input.text).some((word) => NEXT_WORDS.has(word));
}

function isSkip(input: FlowInput): boolean {
  if (input.kind === "action") return input.action.type === "skip";
  return tokenize(input.text).includes("skip");
}

function parseAnswer(input: FlowInput): number | null {
  if (input.kind === "action") {
    return input.action.type === "answer" && Number.isInteger(input.action.value) && input.action.value >= 1 && input.action.value <= 5
      ? input.action.value
      : null;
  }
  const digits = input.text.match(/\d+/g) ?? [];
  if (digits.length !== 1) return null;
  const value = Number(digits[0]);
  return value >= 1 && value <= 5 ? value : null;
}

function numbersIn(text: string, max: number): number[] {
  const found = (text.match(/\d+/g) ?? []).map(Number).filter((n) => n >= 1 && n <= max);
  return [...new Set(found)];
}

function withFlag(settings: NotificationSettings, flag: NotificationFlag, value: boolean): NotificationSettings {
  const next = { ...settings };
  next[flag] = value;
  return next;
}

function toggle<T>(list: T[], item: T): T[] {
  return list.includes(item) ? list.filter((x) => x !== item) : [...list, item];
}

// ---- Flow ----

export class OnboardingFlow {
  constructor(
    private mentor: Mentor,
    private clock: Clock = systemClock
  ) {}

  isActive(user: UserProfile): boolean {
    return user.onboardingStep !== "completed";
  }

  async handle(user: UserProfile, input: FlowInput): Promise<OnboardingTurn> {
    const next = structuredClone(user);
    const reply = await this.step(next, input);
    next.updatedAt = this.clock().toISOString();
    return { user: next, reply, completed: next.onboardingStep === "completed" };
  }

  /**
   * The prompt for the user's current step
   */
  render(user: UserProfile): string {
    const bar = progressBar(user.onboardingStep);

    switch (user.onboardingStep) {
      case "greeting":
        return (
          `${bar}\n\nHi! I'll help you keep track of what matters and look back on each day.\n` +
          `Setup takes about a minute. Say "next" to begin.`
        );

      case "anxiety_intro":
        return (
          `${bar}\n\nA short check-in helps me tune my advice: ${ANXIETY_QUESTIONS.length} statements, ` +
          `each rated from 1 (not at all) to 5 (very much).\nSay "start" to begin or "skip" to skip it.`
        );

      case "anxiety_survey": {
        const index = Math.min(user.anxietyAnswers.length, ANXIETY_QUESTIONS.length - 1);
        return (
          `${bar}\n\nQuestion ${index + 1} of ${ANXIETY_QUESTIONS.length}:\n${ANXIETY_QUESTIONS[index]}\n\n` +
          `Answer with a number from 1 to 5.`
        );
      }

      case "goals": {
        const lines = GOALS.map((goal, i) => `${i + 1}. [${user.goals.includes(goal) ? "x" : " "}] ${GOAL_LABELS[goal]}`);
        return `${bar}\n\nWhat do you want help with? Toggle goals by number, then say "done".\n${lines.join("\n")}`;
      }

      case "notifications": {
        const lines = NOTIFICATION_FLAGS.map(
          (flag, i) => `${i + 1}. [${user.notifications[flag] ? "x" : " "}] ${NOTIFICATION_LABELS[flag]}`
        );
        return (
          `${bar}\n\nWhich notifications would you like? Toggle by number, "all" or "none", then say "done".\n` +
          lines.join("\n")
        );
      }

      case "mentor_intro":
        return (
          `${bar}\n\nLast step: meet your mentor. Ask anything about work, focus or stress, ` +
          `or say "next" to finish setup.`
        );

      case "completion":
        return `${bar}\n\n${this.recap(user)}\n\nSay anything to start using the tracker.`;

      case "completed":
        return "Setup is complete. Tell me about a task, or ask for advice any time.";
    }
  }

  recap(user: UserProfile): string {
    const anxiety =
      user.anxietyLevel === null ? "not measured" : `${user.anxietyLevel}/5.0 (${anxietyBand(user.anxietyLevel)})`;
    const goals = user.goals.length ? user.goals.map((g) => GOAL_LABELS[g]).join(", ") : "none selected";
    const enabled = NOTIFICATION_FLAGS.filter((flag) => user.notifications[flag]).map((flag) => NOTIFICATION_LABELS[flag]);
    const notifications = enabled.length ? enabled.join(", ") : "off";

    return [
      "Here's your setup:",
      `- Check-in score: ${anxiety}`,
      `- Goals: ${goals}`,
      `- Notifications: ${notifications} (at ${user.notifications.sendTime}, ${user.notifications.timezone})`,
      `- Mentor: ${user.metMentor ? "met" : "not yet"}`,
    ].join("\n");
  }

  // ---- Step Handlers ----

  private async step(user: UserProfile, input: FlowInput): Promise<string> {
    switch (user.onboardingStep) {
      case "greeting":
        this.move(user, "anxiety_intro");
        return this.render(user);

      case "anxiety_intro":
        if (isSkip(input)) {
          this.move(user, "goals");
          return `No problem, we'll skip the check-in.\n\n${this.render(user)}`;
        }
        user.anxietyAnswers = [];
        this.move(user, "anxiety_survey");
        return this.render(user);

      case "anxiety_survey":
        return this.handleSurvey(user, input);

      case "goals":
        return this.handleGoals(user, input);

      case "notifications":
        return this.handleNotifications(user, input);

      case "mentor_intro":
        return this.handleMentor(user, input);

      case "completion":
        this.move(user, "completed");
        return this.render(user);

      case "completed":
        return this.render(user);
    }
  }

  private handleSurvey(user: UserProfile, input: FlowInput): string {
    if (isSkip(input)) {
      user.anxietyAnswers = [];
      user.anxietyLevel = null;
      this.move(user, "goals");
      return `Skipped the check-in.\n\n${this.render(user)}`;
    }

    const value = parseAnswer(input);
    if (value === null) {
      return `Please answer with a number from 1 to 5.\n\n${this.render(user)}`;
    }

    user.anxietyAnswers = [...user.anxietyAnswers, value];
    if (user.anxietyAnswers.length < ANXIETY_QUESTIONS.length) {
      return this.render(user);
    }

    const level = anxietyLevel(user.anxietyAnswers);
    user.anxietyLevel = level;
    this.move(user, "goals");
    const summary = level === null ? "" : `Your check-in score is ${level}/5.0 (${anxietyBand(level)}). I'll keep it in mind.\n\n`;
    return `${summary}${this.render(user)}`;
  }

  private handleGoals(user: UserProfile, input: FlowInput): string {
    if (input.kind === "action") {
      if (input.action.type === "toggle_goal") {
        user.goals = toggle(user.goals, input.action.goal);
      } else if (isNext(input) || isSkip(input)) {
        this.move(user, "notifications");
      }
      return this.render(user);
    }

    const picked = new Set<GoalId>(numbersIn(input.text, GOALS.length).map((n) => GOALS[n - 1]));
    for (const goal of GOALS) {
      if (GOAL_KEYWORDS[goal].some((keyword) => containsPhrase(input.text, keyword))) picked.add(goal);
    }
    for (const goal of picked) {
      user.goals = toggle(user.goals, goal);
    }

    if (isNext(input) || isSkip(input)) {
      this.move(user, "notifications");
      return this.render(user);
    }
    if (picked.size === 0) {
      return `Pick goals by number (1-${GOALS.length}), then say "done".\n\n${this.render(user)}`;
    }
    return this.render(user);
  }

  private handleNotifications(user: UserProfile, input: FlowInput): string {
    if (input.kind === "action") {
      if (input.action.type === "toggle_notification") {
        const flag = input.action.flag;
        user.notifications = withFlag(user.notifications, flag, !user.notifications[flag]);
      } else if (isNext(input) || isSkip(input)) {
        this.move(user, "mentor_intro");
      }
      return this.render(user);
    }

    const words = tokenize(input.text);
    const bulk = words.includes("all") ? true : words.includes("none") ? false : null;
    const picked = numbersIn(input.text, NOTIFICATION_FLAGS.length).map((n) => NOTIFICATION_FLAGS[n - 1]);

    if (bulk !== null) {
      for (const flag of NOTIFICATION_FLAGS) {
        user.notifications = withFlag(user.notifications, flag, bulk);
      }
      if (bulk) user.notifications = { ...user.notifications, enabled: true };
    } else {
      for (const flag of picked) {
        user.notifications = withFlag(user.notifications, flag, !user.notifications[flag]);
      }
    }

    if (isNext(input) || isSkip(input)) {
      this.move(user, "mentor_intro");
      return this.render(user);
    }
    if (bulk === null && picked.length === 0) {
      return (
        `Toggle notifications by number (1-${NOTIFICATION_FLAGS.length}), "all" or "none", then say "done".\n\n` +
        this.render(user)
      );
    }
    return this.render(user);
  }

  private async handleMentor(user: UserProfile, input: FlowInput): Promise<string> {
    if (input.kind === "action" && input.action.type === "meet_mentor") {
      user.metMentor = true;
      return `Nice to meet you! Ask me anything, or say "next" to finish setup.`;
    }
    if (isNext(input) || isSkip(input)) {
      this.move(user, "completion");
      return this.render(user);
    }
    if (input.kind === "action") {
      return this.render(user);
    }

    user.metMentor = true;
    const advice = await this.mentor.advise(user, input.text);
    return `${advice}\n\nSay "next" when you're ready to finish setup.`;
  }

  private move(user: UserProfile, to: OnboardingStep): void {
    user.onboardingStep = ONBOARDING_SEQUENCE.advance(user.onboardingStep, to);
  }
}
