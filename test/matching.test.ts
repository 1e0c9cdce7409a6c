import { describe, it, expect } from "vitest";

import { findMatches, findTasksById, stem, containsPhrase } from "../src/resolver/matching.js";
import {
  classifyByKeywords,
  extractSearchPhrase,
  extractTitle,
  indicatesNoProgress,
  isAffirmative,
  isNegative,
} from "../src/resolver/keywords.js";
import { makeTask } from "./helpers.js";

describe("stem", () => {
  it("folds common endings", () => {
    expect(stem("parties")).toBe("party");
    expect(stem("boxes")).toBe("box");
    expect(stem("watering")).toBe("water");
    expect(stem("painted")).toBe("paint");
    expect(stem("quickly")).toBe("quick");
    expect(stem("emails")).toBe("email");
  });

  it("leaves short words and double s alone", () => {
    expect(stem("bus")).toBe("bus");
    expect(stem("class")).toBe("class");
    expect(stem("sing")).toBe("sing");
  });
});

describe("containsPhrase", () => {
  it("matches on word boundaries only", () => {
    expect(containsPhrase("Please add task: milk", "add task")).toBe(true);
    expect(containsPhrase("I am adding things", "add")).toBe(false);
  });
});

describe("findMatches", () => {
  const tasks = [
    makeTask("t1", "Buy milk"),
    makeTask("t2", "Milkshake recipe"),
    makeTask("t3", "Write quarterly report"),
    makeTask("t4", "Answer email"),
    makeTask("t5", "Water the plant"),
    makeTask("t6", "Groceries", { description: "oat milk and eggs" }),
  ];

  it("matches substrings of title and description", () => {
    const matches = findMatches("milk", tasks);
    expect(matches.map((m) => m.task.id)).toEqual(["t1", "t2", "t6"]);
    expect(matches.every((m) => m.tier === "substring" && m.confidence === 0.9)).toBe(true);
  });

  it("gives an exact title full confidence", () => {
    const [match] = findMatches("BUY MILK", tasks);
    expect(match.task.id).toBe("t1");
    expect(match.confidence).toBe(1);
  });

  it("falls back to all words present", () => {
    const matches = findMatches("report quarterly", tasks);
    expect(matches).toHaveLength(1);
    expect(matches[0].task.id).toBe("t3");
    expect(matches[0].tier).toBe("all_words");
    expect(matches[0].confidence).toBe(0.75);
  });

  it("falls back to folded word endings", () => {
    const single = findMatches("emails", tasks);
    expect(single.map((m) => [m.task.id, m.tier])).toEqual([["t4", "stemmed"]]);

    const multi = findMatches("watering plants", tasks);
    expect(multi.map((m) => [m.task.id, m.tier])).toEqual([["t5", "stemmed"]]);
    expect(multi[0].confidence).toBe(0.6);
  });

  it("matches nothing for an empty phrase or unknown words", () => {
    expect(findMatches("   ", tasks)).toEqual([]);
    expect(findMatches("dentist", tasks)).toEqual([]);
  });
});

describe("findTasksById", () => {
  const tasks = [
    makeTask("3f2a9c1e-0000-4000-8000-000000000001", "First"),
    makeTask("3f2a9c1f-0000-4000-8000-000000000002", "Second"),
  ];

  it("accepts an id prefix of eight characters", () => {
    expect(findTasksById("delete 3f2a9c1e please", tasks).map((t) => t.title)).toEqual(["First"]);
  });

  it("ignores shorter prefixes", () => {
    expect(findTasksById("delete 3f2a9c", tasks)).toEqual([]);
  });
});

describe("reply phrases", () => {
  it("recognises short affirmatives", () => {
    expect(isAffirmative("yes")).toBe(true);
    expect(isAffirmative("Yes, delete it!")).toBe(true);
    expect(isAffirmative("ok")).toBe(true);
  });

  it("does not read long or unrelated text as agreement", () => {
    expect(isAffirmative("yesterday I went out")).toBe(false);
    expect(isAffirmative("yes I would like to add a task for tomorrow")).toBe(false);
  });

  it("recognises refusals", () => {
    expect(isNegative("no thanks")).toBe(true);
    expect(isNegative("never mind")).toBe(true);
    expect(isNegative("notes")).toBe(false);
  });

  it("spots reports of no progress", () => {
    expect(indicatesNoProgress("I didn't get to it")).toBe(true);
    expect(indicatesNoProgress("Got stuck on the intro")).toBe(true);
    expect(indicatesNoProgress("Finished the draft")).toBe(false);
  });
});

describe("extractTitle", () => {
  it("strips the trigger, fillers and a trailing priority", () => {
    expect(extractTitle("add task Buy milk with low priority", "add task")).toBe("Buy milk");
    expect(extractTitle("Please add a new task: Call the bank.", "add")).toBe("Call the bank");
    expect(extractTitle("remind me to water the plants, urgent", "remind me to")).toBe("water the plants");
  });
});

describe("extractSearchPhrase", () => {
  it("drops command words and stopwords", () => {
    expect(extractSearchPhrase("delete the milk task", ["delete"])).toBe("milk");
    expect(extractSearchPhrase("mark buy milk as done", ["done"])).toBe("buy milk");
  });
});

describe("classifyByKeywords", () => {
  it("reads a create with its priority", () => {
    const result = classifyByKeywords("add task Buy milk with low priority");
    expect(result.action).toBe("create");
    expect(result.create).toEqual({ title: "Buy milk", description: "", priority: "low" });
  });

  it("reads a delete with a search phrase", () => {
    const result = classifyByKeywords("delete the milk task");
    expect(result.action).toBe("delete");
    expect(result.searchPhrase).toBe("milk");
  });

  it("reads a status change", () => {
    const result = classifyByKeywords("mark buy milk as done");
    expect(result.action).toBe("update");
    expect(result.change).toEqual({ field: "status", value: "completed" });
    expect(result.searchPhrase).toBe("buy milk");
  });

  it("reads a priority change", () => {
    const result = classifyByKeywords("set gym high priority");
    expect(result.action).toBe("update");
    expect(result.change).toEqual({ field: "priority", value: "high" });
    expect(result.searchPhrase).toBe("gym");
  });

  it("reads views", () => {
    expect(classifyByKeywords("how am i doing").view).toBe("analytics");
    expect(classifyByKeywords("show my tasks").view).toBe("tasks");
  });

  it("routes the evening review", () => {
    expect(classifyByKeywords("let's do the evening review").route).toBe("reflection");
  });

  it("sends anything else to advice", () => {
    const result = classifyByKeywords("I feel overwhelmed today");
    expect(result.action).toBe("unknown");
    expect(result.route).toBe("advice");
  });
});
