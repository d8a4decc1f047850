import { homedir } from "node:os";
import { join } from "node:path";
import { describe, expect, it } from "vitest";
import { createTempWorkspace } from "../../testing/src/index.js";
import { ConfigError, getMethodologyDir, loadConfig, resolveModelSettings, validateConfig } from "./config.js";

describe("validateConfig", () => {
  it("accepts every section", () => {
    const raw = {
      global: { "log-level": "debug" },
      model: { "base-url": "http://localhost:8080/v1", model: "local-model", temperature: 0.2 },
      agent: { "max-turns-before-reminder": 20, methodology: false },
      code: { "confirm-result": false },
    };

    expect(validateConfig(raw)).toEqual(raw);
  });

  it("rejects unknown sections", () => {
    expect(() => validateConfig({ plugins: {} }, "/etc/codeloop.toml")).toThrow(
      new ConfigError("[plugins] is not a valid option", "/etc/codeloop.toml"),
    );
  });

  it("rejects unknown keys inside a section", () => {
    expect(() => validateConfig({ model: { provider: "x" } })).toThrow("[model].provider is not a valid option");
  });

  it("names the key of an invalid value", () => {
    expect(() => validateConfig({ model: { temperature: 5 } })).toThrow("[model].temperature: ");
    expect(() => validateConfig({ global: { "log-level": "loud" } })).toThrow("[global].log-level: ");
  });

  it("prefixes messages with the file path", () => {
    const error = new ConfigError("bad", "/home/me/.codeloop/config.toml");

    expect(error.message).toBe("/home/me/.codeloop/config.toml: bad");
    expect(error.path).toBe("/home/me/.codeloop/config.toml");
  });
});

describe("loadConfig", () => {
  it("returns an empty config for a missing file", () => {
    expect(loadConfig("/nonexistent/codeloop/config.toml")).toEqual({});
  });

  it("parses TOML", async () => {
    const workspace = await createTempWorkspace({
      "config.toml": '[model]\nmodel = "local-model"\napi-key-env = "LOCAL_KEY"\n\n[code]\nconfirm-result = false\n',
    });
    try {
      expect(loadConfig(workspace.path("config.toml"))).toEqual({
        model: { model: "local-model", "api-key-env": "LOCAL_KEY" },
        code: { "confirm-result": false },
      });
    } finally {
      await workspace.cleanup();
    }
  });

  it("reports TOML syntax errors", async () => {
    const workspace = await createTempWorkspace({ "config.toml": "[model\nmodel = \n" });
    try {
      expect(() => loadConfig(workspace.path("config.toml"))).toThrow(
        `${workspace.path("config.toml")}: Invalid TOML syntax: `,
      );
    } finally {
      await workspace.cleanup();
    }
  });
});

describe("resolveModelSettings", () => {
  const config = { model: "config-model", "base-url": "http://config/v1", "api-key-env": "MY_KEY" };

  it("prefers the flag over the environment and the config", () => {
    const settings = resolveModelSettings(config, { model: "flag-model" }, { CODELOOP_MODEL: "env-model" });

    expect(settings.model).toBe("flag-model");
  });

  it("prefers the environment over the config", () => {
    const settings = resolveModelSettings(
      config,
      {},
      { CODELOOP_MODEL: "env-model", CODELOOP_BASE_URL: "http://env/v1", MY_KEY: "test-secret" },
    );

    expect(settings).toEqual({
      model: "env-model",
      apiKeyEnv: "MY_KEY",
      baseURL: "http://env/v1",
      apiKey: "test-secret",
      maxTokens: undefined,
      temperature: undefined,
    });
  });

  it("falls back to the defaults", () => {
    const settings = resolveModelSettings(undefined, {}, { CODELOOP_API_KEY: "test-secret" });

    expect(settings.model).toBe("gpt-4o");
    expect(settings.apiKeyEnv).toBe("CODELOOP_API_KEY");
    expect(settings.apiKey).toBe("test-secret");
    expect(settings.baseURL).toBeUndefined();
  });
});

describe("getMethodologyDir", () => {
  it("uses the environment override", () => {
    expect(getMethodologyDir({ CODELOOP_METHODOLOGY_DIR: "/data/methodology" })).toBe("/data/methodology");
  });

  it("defaults to the home directory", () => {
    expect(getMethodologyDir({})).toBe(join(homedir(), ".codeloop", "methodology"));
  });
});
