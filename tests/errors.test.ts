import { describe, expect, test } from "vitest";
import {
  ConfigError,
  CopyError,
  describeError,
  JobAlreadyRunningError,
  PruneEntryError,
  RestartFailedError,
} from "../src/errors";

describe("errors", () => {
  test("code is the class name", () => {
    const err = new ConfigError("bad");
    expect(err.code).toBe("ConfigError");
    expect(err.name).toBe("ConfigError");
    expect(err.severity).toBe("error");
  });

  test("restart failures are critical", () => {
    const err = new RestartFailedError("db", ["db-1"], null);
    expect(err.severity).toBe("critical");
    expect(err.message).toBe('Workload "db" left stopped: failed to restart db-1');
  });

  test("keeps the cause", () => {
    const cause = new Error("EACCES");
    const err = new CopyError("wiki", "permission denied", cause);
    expect(err.cause).toBe(cause);
    expect(err.message).toBe('Copy failed for workload "wiki": permission denied');
  });

  test("PruneEntryError describes its cause", () => {
    expect(new PruneEntryError("/a/b", new Error("busy")).message).toBe("Failed to delete /a/b: busy");
    expect(new PruneEntryError("/a/b", "gone").message).toBe("Failed to delete /a/b: gone");
  });

  test("JobAlreadyRunningError names both targets", () => {
    const err = new JobAlreadyRunningError("wiki", "all");
    expect(err.target).toBe("wiki");
    expect(err.heldBy).toBe("all");
  });

  describe("describeError", () => {
    test("engine errors", () => {
      expect(describeError(new RestartFailedError("db", ["a"], "/tmp/x"))).toEqual({
        code: "RestartFailedError",
        message: 'Workload "db" left stopped: failed to restart a',
        severity: "critical",
      });
    });

    test("plain errors", () => {
      expect(describeError(new TypeError("nope"))).toEqual({
        code: "TypeError",
        message: "nope",
        severity: "error",
      });
    });

    test("non-error values", () => {
      expect(describeError(42)).toEqual({ code: "Error", message: "42", severity: "error" });
    });
  });
});
