import { describe, it, expect } from "vitest";

import { DEFAULT_SERVER_URL, toWebSocketUrl } from "../src/client/index.js";

describe("toWebSocketUrl", () => {
  it("maps http to ws and https to wss", () => {
    expect(toWebSocketUrl(DEFAULT_SERVER_URL)).toBe("ws://localhost:3847");
    expect(toWebSocketUrl("https://tasks.example.com/api")).toBe("wss://tasks.example.com/api");
  });
});
