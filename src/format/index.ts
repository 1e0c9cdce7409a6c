// ============================================================================
// REPLY FORMATTING
// ============================================================================
// Plain-text renderings shared by chat replies and notifications. No colour
// codes here: the transport decides how text is shown.

import { Task, TaskAnalytics, TaskStatus } from "../types/index.js";
import { formatLocal } from "../time/index.js";

const STATUS_MARKS: Record<TaskStatus, string> = {
  pending: "○",
  in_progress: "◐",
  completed: "✓",
  cancelled: "✗",
};

export const STATUS_LABELS: Record<TaskStatus, string> = {
  pending: "pending",
  in_progress: "in progress",
  completed: "completed",
  cancelled: "cancelled",
};

export function shortId(id: string): string {
  return id.slice(0, 8);
}

export function formatTaskLine(task: Task, timeZone = "UTC"): string {
  const due = task.dueAt ? `, due ${formatLocal(new Date(task.dueAt), timeZone)}` : "";
  return `${STATUS_MARKS[task.status]} ${task.title} [${task.priority}${due}] (${shortId(task.id)})`;
}

export function formatTaskList(tasks: Task[], timeZone = "UTC"): string {
  return tasks.map((task, i) => `${i + 1}. ${formatTaskLine(task, timeZone)}`).join("\n");
}

export function formatAnalytics(analytics: TaskAnalytics): string {
  const lines = [
    `Total: ${analytics.total}`,
    `Completed: ${analytics.completed}`,
    `In progress: ${analytics.inProgress}`,
    `Pending: ${analytics.pending}`,
    `Cancelled: ${analytics.cancelled}`,
    `Completion rate: ${analytics.completionRate}%`,
    `By priority: urgent ${analytics.priorityDistribution.urgent}, high ${analytics.priorityDistribution.high}, ` +
      `medium ${analytics.priorityDistribution.medium}, low ${analytics.priorityDistribution.low}`,
  ];
  return lines.join("\n");
}
