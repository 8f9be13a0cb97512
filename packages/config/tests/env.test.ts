import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { WiregraphConfig, toParameterName } from "../src/env";

/**
 * Collects all WIREGRAPH_* keys currently in process.env so they can
 * be cleaned up after each test.
 */
function wiregraphKeys(): string[] {
  return Object.keys(process.env).filter((k) => k.startsWith("WIREGRAPH_"));
}

describe("WiregraphConfig", () => {
  let preExistingKeys: Set<string>;

  beforeEach(() => {
    preExistingKeys = new Set(wiregraphKeys());
  });

  afterEach(() => {
    for (const key of wiregraphKeys()) {
      if (!preExistingKeys.has(key)) {
        delete process.env[key];
      }
    }
  });

  // ---------------------------------------------------------------
  // getAppVar
  // ---------------------------------------------------------------
  describe("getAppVar", () => {
    it("returns the value of a WIREGRAPH_APP_ prefixed env var", () => {
      // Arrange
      process.env.WIREGRAPH_APP_DATABASE_URL = "postgres://localhost/test";

      // Act
      const result = WiregraphConfig.getAppVar("DATABASE_URL");

      // Assert
      expect(result).toBe("postgres://localhost/test");
    });

    it("returns undefined when the env var does not exist", () => {
      // Act
      const result = WiregraphConfig.getAppVar("NONEXISTENT_KEY_FOR_TEST");

      // Assert
      expect(result).toBeUndefined();
    });

    it("reads from a given source instead of process.env", () => {
      // Act
      const result = WiregraphConfig.getAppVar("PORT", { WIREGRAPH_APP_PORT: "80" });

      // Assert
      expect(result).toBe("80");
    });
  });

  // ---------------------------------------------------------------
  // getAllAppVars
  // ---------------------------------------------------------------
  describe("getAllAppVars", () => {
    it("returns prefixed vars with the prefix stripped", () => {
      // Arrange
      process.env.WIREGRAPH_APP_TEST_ONE = "1";
      process.env.WIREGRAPH_APP_TEST_TWO = "2";
      process.env.WIREGRAPH_OTHER_TEST = "ignored";

      // Act
      const result = WiregraphConfig.getAllAppVars();

      // Assert
      expect(result.TEST_ONE).toBe("1");
      expect(result.TEST_TWO).toBe("2");
      expect(result).not.toHaveProperty("OTHER_TEST");
    });

    it("takes a custom prefix and source", () => {
      // Act
      const result = WiregraphConfig.getAllAppVars("SVC_", {
        SVC_PORT: "1",
        SVC_TOKEN: undefined,
        OTHER: "x",
      });

      // Assert
      expect(result).toEqual({ PORT: "1" });
    });
  });
});

describe("toParameterName", () => {
  it("camel-cases multi-word keys", () => {
    expect(toParameterName("DATABASE_URL")).toBe("databaseUrl");
    expect(toParameterName("SMTP_MAX_RETRIES")).toBe("smtpMaxRetries");
  });

  it("lower-cases single-word keys", () => {
    expect(toParameterName("PORT")).toBe("port");
  });

  it("ignores repeated and trailing underscores", () => {
    expect(toParameterName("LOG__LEVEL_")).toBe("logLevel");
  });

  it("returns an empty name for an empty key", () => {
    expect(toParameterName("")).toBe("");
  });
});
