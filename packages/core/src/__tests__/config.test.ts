import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { loadConfig, resetConfig } from "../config.js";

describe("loadConfig", () => {
  const originalEnv = process.env;

  beforeEach(() => {
    resetConfig();
    process.env = { ...originalEnv };
    delete process.env.LOG_LEVEL;
    delete process.env.DATA_DIR;
    delete process.env.DEFAULT_CURRENCY;
    delete process.env.COLLABORATOR_TIMEOUT_MS;
    delete process.env.COLLABORATOR_MAX_ATTEMPTS;
    delete process.env.RESPONSE_SEED;
    delete process.env.MIN_INTENT_CONFIDENCE;
    delete process.env.PERSIST_CONVERSATIONS;
    delete process.env.TIPS_ENABLED;
  });

  afterEach(() => {
    process.env = originalEnv;
    resetConfig();
  });

  it("uses default values when optional vars are not set", () => {
    const config = loadConfig();

    expect(config.logLevel).toBe("info");
    expect(config.dataDir).toBe("./data");
    expect(config.defaultCurrency).toBe("USD");
    expect(config.collaboratorTimeoutMs).toBe(8000);
    expect(config.collaboratorMaxAttempts).toBe(2);
    expect(config.minIntentConfidence).toBe(0.7);
    expect(config.persistConversations).toBe(true);
    expect(config.responseSeed).toBeUndefined();
    expect(config.tipsEnabled).toBe(true);
  });

  it("turns tips off with TIPS_ENABLED=false", () => {
    process.env.TIPS_ENABLED = "false";
    expect(loadConfig().tipsEnabled).toBe(false);
  });

  it("loads values from the environment", () => {
    process.env.LOG_LEVEL = "debug";
    process.env.DATA_DIR = "/tmp/wallet-chat";
    process.env.DEFAULT_CURRENCY = "eur";
    process.env.COLLABORATOR_TIMEOUT_MS = "1500";
    process.env.RESPONSE_SEED = "42";
    process.env.PERSIST_CONVERSATIONS = "false";

    const config = loadConfig();

    expect(config.logLevel).toBe("debug");
    expect(config.dataDir).toBe("/tmp/wallet-chat");
    expect(config.defaultCurrency).toBe("EUR");
    expect(config.collaboratorTimeoutMs).toBe(1500);
    expect(config.responseSeed).toBe(42);
    expect(config.persistConversations).toBe(false);
  });

  it("throws on an invalid currency code", () => {
    process.env.DEFAULT_CURRENCY = "dollars";

    expect(() => loadConfig()).toThrow("Invalid configuration");
  });

  it("throws on a non-numeric timeout", () => {
    process.env.COLLABORATOR_TIMEOUT_MS = "soon";

    expect(() => loadConfig()).toThrow("collaboratorTimeoutMs");
  });

  it("caches until reset", () => {
    const first = loadConfig();
    process.env.DATA_DIR = "/elsewhere";
    expect(loadConfig()).toBe(first);

    resetConfig();
    expect(loadConfig().dataDir).toBe("/elsewhere");
  });
});
