import { describe, it, expect } from "vitest";

import { OnboardingFlow, FlowInput, ONBOARDING_SEQUENCE, progressBar } from "../src/sessions/onboarding.js";
import { StepSequence } from "../src/sessions/flow.js";
import { anxietyBand, anxietyLevel } from "../src/sessions/profile.js";
import { Mentor, MENTOR_FALLBACK_REPLY } from "../src/mentor/index.js";
import { UserProfile, createUserProfile } from "../src/types/index.js";
import { ScriptedCompletion, UnavailableCompletion, createTestClock } from "./helpers.js";

const time = createTestClock("2026-03-10T08:00:00.000Z");

function text(value: string): FlowInput {
  return { kind: "text", text: value };
}

async function say(flow: OnboardingFlow, user: UserProfile, ...messages: string[]) {
  let current = user;
  let reply = "";
  for (const message of messages) {
    const turn = await flow.handle(current, text(message));
    current = turn.user;
    reply = turn.reply;
  }
  return { user: current, reply };
}

describe("StepSequence", () => {
  const seq = new StepSequence(["a", "b", "c"]);

  it("moves forward only", () => {
    expect(seq.advance("a", "c")).toBe("c");
    expect(() => seq.advance("c", "b")).toThrow("Cannot move from c back to b");
    expect(() => seq.advance("b", "b")).toThrow();
  });

  it("knows its ends", () => {
    expect(seq.first).toBe("a");
    expect(seq.next("b")).toBe("c");
    expect(seq.next("c")).toBeNull();
    expect(seq.isLast("c")).toBe(true);
  });

  it("rejects duplicate steps", () => {
    expect(() => new StepSequence(["a", "a"])).toThrow("Step names must be unique");
  });
});

describe("anxiety scoring", () => {
  it("averages to one decimal", () => {
    expect(anxietyLevel([3, 4, 2, 5, 1])).toBe(3);
    expect(anxietyLevel([4, 4, 5])).toBe(4.3);
    expect(anxietyLevel([])).toBeNull();
  });

  it("bands the score", () => {
    expect(anxietyBand(2)).toBe("low");
    expect(anxietyBand(3.5)).toBe("moderate");
    expect(anxietyBand(3.6)).toBe("elevated");
  });
});

describe("OnboardingFlow", () => {
  it("walks every step with free text", async () => {
    const completion = new ScriptedCompletion(["Start with five minutes."]);
    const flow = new OnboardingFlow(new Mentor(completion), time.clock);
    let user = createUserProfile("alice", time.clock());

    let step = await say(flow, user, "hi");
    expect(step.user.onboardingStep).toBe("anxiety_intro");
    expect(step.reply.startsWith("●●○○○○ 2/6")).toBe(true);

    step = await say(flow, step.user, "start", "3", "4", "2", "5", "1");
    expect(step.user.onboardingStep).toBe("goals");
    expect(step.user.anxietyAnswers).toEqual([3, 4, 2, 5, 1]);
    expect(step.user.anxietyLevel).toBe(3);
    expect(step.reply.startsWith("Your check-in score is 3/5.0 (moderate).")).toBe(true);

    step = await say(flow, step.user, "1 3 done");
    expect(step.user.goals).toEqual(["task_management", "productivity"]);
    expect(step.user.onboardingStep).toBe("notifications");

    step = await say(flow, step.user, "1", "done");
    expect(step.user.notifications.dailyDigest).toBe(true);
    expect(step.user.notifications.deadlineReminders).toBe(false);
    expect(step.user.onboardingStep).toBe("mentor_intro");

    step = await say(flow, step.user, "How do I stop procrastinating?");
    expect(step.reply).toBe('Start with five minutes.\n\nSay "next" when you\'re ready to finish setup.');
    expect(step.user.metMentor).toBe(true);
    expect(completion.requests[0].prompt).toBe("How do I stop procrastinating?");

    step = await say(flow, step.user, "next");
    expect(step.user.onboardingStep).toBe("completion");
    expect(step.reply).toContain("- Check-in score: 3/5.0 (moderate)");
    expect(step.reply).toContain("- Goals: Managing tasks and setting priorities, Becoming more productive");
    expect(step.reply).toContain("- Notifications: Daily digest of today's tasks (at 09:00, UTC)");
    expect(step.reply).toContain("- Mentor: met");

    user = step.user;
    const last = await flow.handle(user, text("thanks"));
    expect(last.completed).toBe(true);
    expect(flow.isActive(last.user)).toBe(false);
  });

  it("skips the check-in", async () => {
    const flow = new OnboardingFlow(new Mentor(new ScriptedCompletion()), time.clock);
    const { user, reply } = await say(flow, createUserProfile("bob", time.clock()), "hello", "skip");
    expect(user.onboardingStep).toBe("goals");
    expect(user.anxietyLevel).toBeNull();
    expect(reply.startsWith("No problem, we'll skip the check-in.")).toBe(true);
  });

  it("asks again on an answer out of range", async () => {
    const flow = new OnboardingFlow(new Mentor(new ScriptedCompletion()), time.clock);
    const start = await say(flow, createUserProfile("bob", time.clock()), "hello", "start");

    for (const answer of ["maybe", "12", "0"]) {
      const turn = await flow.handle(start.user, text(answer));
      expect(turn.user.anxietyAnswers).toEqual([]);
      expect(turn.reply.startsWith("Please answer with a number from 1 to 5.")).toBe(true);
    }
  });

  it("takes structured actions", async () => {
    const flow = new OnboardingFlow(new Mentor(new ScriptedCompletion()), time.clock);
    let user = (await say(flow, createUserProfile("carol", time.clock()), "hello", "skip")).user;

    user = (await flow.handle(user, { kind: "action", action: { type: "toggle_goal", goal: "stress_reduction" } })).user;
    expect(user.goals).toEqual(["stress_reduction"]);
    user = (await flow.handle(user, { kind: "action", action: { type: "next" } })).user;
    expect(user.onboardingStep).toBe("notifications");

    user = (await flow.handle(user, { kind: "action", action: { type: "toggle_notification", flag: "deadlineReminders" } }))
      .user;
    expect(user.notifications.deadlineReminders).toBe(true);
    user = (await flow.handle(user, { kind: "action", action: { type: "next" } })).user;

    const met = await flow.handle(user, { kind: "action", action: { type: "meet_mentor" } });
    expect(met.user.metMentor).toBe(true);
    expect(met.user.onboardingStep).toBe("mentor_intro");
  });

  it("turns all notifications on or off in one go", async () => {
    const flow = new OnboardingFlow(new Mentor(new ScriptedCompletion()), time.clock);
    const at = (await say(flow, createUserProfile("dan", time.clock()), "hello", "skip", "done")).user;

    const all = (await flow.handle(at, text("all"))).user;
    expect(all.notifications).toMatchObject({ dailyDigest: true, deadlineReminders: true, newTaskNotifications: true });

    const none = (await flow.handle(all, text("none"))).user;
    expect(none.notifications).toMatchObject({ dailyDigest: false, deadlineReminders: false, newTaskNotifications: false });
    expect(none.onboardingStep).toBe("notifications");
  });

  it("answers with a fixed reply when the mentor is unavailable", async () => {
    const flow = new OnboardingFlow(new Mentor(new UnavailableCompletion()), time.clock);
    const at = (await say(flow, createUserProfile("erin", time.clock()), "hello", "skip", "done", "done")).user;
    expect(at.onboardingStep).toBe("mentor_intro");

    const turn = await flow.handle(at, text("What should I focus on?"));
    expect(turn.reply.startsWith(MENTOR_FALLBACK_REPLY)).toBe(true);
  });

  it("leaves the caller's profile untouched", async () => {
    const flow = new OnboardingFlow(new Mentor(new ScriptedCompletion()), time.clock);
    const user = createUserProfile("fay", time.clock());
    await flow.handle(user, text("hello"));
    expect(user.onboardingStep).toBe("greeting");
  });

  it("draws the progress bar", () => {
    expect(progressBar("greeting")).toBe("●○○○○○ 1/6");
    expect(progressBar("completed")).toBe("●●●●●● 6/6");
    expect(ONBOARDING_SEQUENCE.last).toBe("completed");
  });
});
