import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";

import {
  createDefaultConfig,
  describeConfig,
  getConfigPath,
  loadConfig,
  parseConfig,
  updateLLMConfig,
} from "../src/config/index.js";

describe("config", () => {
  let home: string;

  beforeEach(() => {
    home = mkdtempSync(join(tmpdir(), "dusk-config-"));
    vi.stubEnv("DUSK_HOME", home);
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    rmSync(home, { recursive: true, force: true });
  });

  describe("parseConfig", () => {
    it("fills in defaults", () => {
      const config = parseConfig({});
      expect(config.llm.provider).toBe("bedrock");
      expect(config.llm.timeoutMs).toBe(20_000);
      expect(config.storage).toEqual({ type: "sqlite", path: join(home, "data", "dusk.db") });
      expect(config.scheduler).toEqual({
        enabled: true,
        digestTime: "09:00",
        timezone: "UTC",
        deadlineIntervalMinutes: 120,
        deadlineHorizonHours: 24,
        tickSeconds: 60,
      });
      expect(config.server).toEqual({ host: "0.0.0.0", port: 3847 });
      expect(config.log.level).toBe("info");
    });

    it("keeps given values", () => {
      const config = parseConfig({
        llm: { provider: "local", local: { baseUrl: "http://localhost:1234/v1", model: "qwen" }, timeoutMs: 5000 },
        scheduler: { digestTime: "07:45", timezone: "Europe/Berlin" },
      });
      expect(config.llm.local?.model).toBe("qwen");
      expect(config.llm.timeoutMs).toBe(5000);
      expect(config.scheduler.digestTime).toBe("07:45");
      expect(config.scheduler.tickSeconds).toBe(60);
    });

    it("names every invalid field", () => {
      expect(() => parseConfig({ scheduler: { digestTime: "9am" }, server: { port: 70000 } })).toThrow(
        /^Invalid config: scheduler\.digestTime: Expected HH:MM; server\.port: /
      );
    });

    it("rejects an unknown scheduler timezone", () => {
      expect(() => parseConfig({ scheduler: { timezone: "Mars/Olympus" } })).toThrow(
        "Invalid config: scheduler.timezone: Unknown timezone"
      );
      expect(parseConfig({ scheduler: { timezone: "Europe/Berlin" } }).scheduler.timezone).toBe("Europe/Berlin");
    });
  });

  describe("loadConfig", () => {
    it("writes a default file on first run", () => {
      const config = loadConfig();
      expect(config).toEqual(createDefaultConfig());
      expect(JSON.parse(readFileSync(getConfigPath(), "utf-8"))).toEqual(config);
    });

    it("reads the saved file back", () => {
      writeFileSync(getConfigPath(), JSON.stringify({ server: { port: 4000 } }));
      expect(loadConfig().server).toEqual({ host: "0.0.0.0", port: 4000 });
    });

    it("rejects a file that is not JSON", () => {
      loadConfig();
      writeFileSync(getConfigPath(), "{ port: ");
      expect(() => loadConfig()).toThrow(`Config at ${getConfigPath()} is not valid JSON`);
    });
  });

  it("updates the LLM section without touching the rest", () => {
    const config = createDefaultConfig();
    const updated = updateLLMConfig(config, { provider: "openai", openai: { baseUrl: "https://example.test/v1", apiKey: "test-key", model: "gpt-4o-mini" } });

    expect(updated.llm.provider).toBe("openai");
    expect(updated.llm.timeoutMs).toBe(20_000);
    expect(updated.scheduler).toEqual(config.scheduler);
    expect(describeConfig(updated).split("\n").slice(0, 3)).toEqual([
      "LLM Provider: openai",
      "  Base URL: https://example.test/v1",
      "  Model: gpt-4o-mini",
    ]);
  });
});
