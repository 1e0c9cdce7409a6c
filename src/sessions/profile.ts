// ============================================================================
// PROFILE DESCRIPTIONS
// ============================================================================
// Labels for what onboarding collects, and the one-paragraph user context the
// mentor and the reflection prompts share.

import { GoalId, NotificationFlag, UserProfile } from "../types/index.js";

export const ANXIETY_QUESTIONS: readonly string[] = [
  "I often worry about my work",
  "I find it hard to concentrate on tasks",
  "I feel overloaded with responsibilities",
  "I tend to put things off until later",
  "Stressful situations throw me off balance easily",
];

export const GOALS: readonly GoalId[] = ["task_management", "stress_reduction", "productivity", "time_organization"];

export const GOAL_LABELS: Record<GoalId, string> = {
  task_management: "Managing tasks and setting priorities",
  stress_reduction: "Reducing stress and anxiety",
  productivity: "Becoming more productive",
  time_organization: "Organizing working time",
};

export const NOTIFICATION_FLAGS: readonly NotificationFlag[] = [
  "dailyDigest",
  "deadlineReminders",
  "newTaskNotifications",
];

export const NOTIFICATION_LABELS: Record<NotificationFlag, string> = {
  dailyDigest: "Daily digest of today's tasks",
  deadlineReminders: "Reminders about approaching deadlines",
  newTaskNotifications: "Notices about new tasks",
};

export type AnxietyBand = "low" | "moderate" | "elevated";

export function anxietyBand(level: number): AnxietyBand {
  if (level <= 2.0) return "low";
  if (level <= 3.5) return "moderate";
  return "elevated";
}

/**
 * Mean of the survey answers rounded to one decimal, or null without answers
 */
export function anxietyLevel(answers: readonly number[]): number | null {
  if (answers.length === 0) return null;
  const mean = answers.reduce((sum, a) => sum + a, 0) / answers.length;
  return Math.round(mean * 10) / 10;
}

export function describeUser(user: UserProfile): string {
  const parts: string[] = [];
  if (user.anxietyLevel !== null) {
    parts.push(`Anxiety: ${anxietyBand(user.anxietyLevel)} (${user.anxietyLevel}/5.0).`);
  }
  if (user.goals.length > 0) {
    parts.push(`Goals: ${user.goals.map((g) => GOAL_LABELS[g].toLowerCase()).join(", ")}.`);
  }
  return parts.join(" ");
}
