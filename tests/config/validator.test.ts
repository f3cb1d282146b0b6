import { describe, expect, test } from "vitest";
import { ConfigError, validateConfig } from "../../src/config/validator";
import { makeConfig } from "../helpers";

function withChange(mutate: (config: Record<string, unknown>) => void): unknown {
  const config: Record<string, unknown> = JSON.parse(JSON.stringify(makeConfig("/tmp/guard")));
  mutate(config);
  return config;
}

function sectionOf(config: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = config[key];
  if (typeof value !== "object" || value === null) throw new Error(`missing ${key}`);
  return Object.fromEntries(Object.entries(value));
}

function replaceIn(key: string, field: string, value: unknown): unknown {
  return withChange((c) => {
    c[key] = { ...sectionOf(c, key), [field]: value };
  });
}

describe("validateConfig", () => {
  test("accepts a complete config", () => {
    expect(() => validateConfig(makeConfig("/tmp/guard"))).not.toThrow();
  });

  test("rejects non-objects", () => {
    expect(() => validateConfig(null)).toThrow("Config must be an object");
    expect(() => validateConfig([])).toThrow(ConfigError);
  });

  test("requires a version", () => {
    expect(() => validateConfig(withChange((c) => delete c.version))).toThrow(
      "Config must have a 'version' field",
    );
  });

  test("rejects unknown log levels", () => {
    expect(() => validateConfig(withChange((c) => (c.logLevel = "trace")))).toThrow(ConfigError);
  });

  test("rejects an uppercase archive prefix", () => {
    expect(() => validateConfig(replaceIn("archive", "prefix", "Guard"))).toThrow(
      "archive.prefix must contain only lowercase letters",
    );
  });

  test("bounds compression", () => {
    expect(() => validateConfig(replaceIn("archive", "compression", 0))).toThrow(
      "archive.compression must be a number >= 1",
    );
    expect(() => validateConfig(replaceIn("archive", "compression", 10))).toThrow(
      "archive.compression must be a number <= 9",
    );
  });

  test("requires a positive retention age", () => {
    expect(() => validateConfig(replaceIn("retention", "maxAgeDays", 0))).toThrow(
      "retention.maxAgeDays must be a number >= 1",
    );
  });

  test("requires the rclone remote only when enabled", () => {
    const disabled = withChange((c) => {
      c.remote = { ...sectionOf(c, "remote"), enabled: false, name: "" };
    });
    expect(() => validateConfig(disabled)).not.toThrow();

    const enabled = withChange((c) => {
      c.remote = { ...sectionOf(c, "remote"), enabled: true, name: "" };
    });
    expect(() => validateConfig(enabled)).toThrow("remote.name must be a non-empty string");
  });

  test("validates schedules", () => {
    const missingTarget = withChange((c) => {
      c.schedules = { nightly: { cron: "0 3 * * *", kind: "project" } };
    });
    expect(() => validateConfig(missingTarget)).toThrow(
      "schedules.nightly.target is required when kind is 'project'",
    );

    const badKind = withChange((c) => {
      c.schedules = { nightly: { cron: "0 3 * * *", kind: "weekly" } };
    });
    expect(() => validateConfig(badKind)).toThrow(
      "schedules.nightly.kind must be 'project', 'full' or 'config'",
    );
  });

  test("validates notification endpoints", () => {
    const config = withChange((c) => {
      c.notifications = { gotify: { url: "http://gotify.local" } };
    });
    expect(() => validateConfig(config)).toThrow(
      "notifications.gotify.token must be a non-empty string",
    );
  });

  test("validates docker exclude paths", () => {
    expect(() => validateConfig(replaceIn("docker", "excludePaths", [1]))).toThrow(
      "docker.excludePaths must be an array of strings",
    );
  });
});
