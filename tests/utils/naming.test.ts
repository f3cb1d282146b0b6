import { describe, expect, test } from "vitest";
import {
  ARCHIVE_EXTENSION,
  generateArchiveName,
  isValidArchiveName,
  parseArchiveName,
  sanitizeTargetName,
} from "../../src/utils/naming";

describe("naming utilities", () => {
  describe("sanitizeTargetName", () => {
    test("lowercases and replaces disallowed characters", () => {
      expect(sanitizeTargetName("My_App.Prod")).toBe("my-app-prod");
    });

    test("collapses and trims separators", () => {
      expect(sanitizeTargetName("--web__stack--")).toBe("web-stack");
    });

    test("falls back when nothing is left", () => {
      expect(sanitizeTargetName("___")).toBe("unnamed");
    });
  });

  describe("generateArchiveName", () => {
    const now = new Date("2024-03-05T07:08:09.123Z");

    test("encodes prefix, target, kind and UTC timestamp", () => {
      const name = generateArchiveName("wiki", "project", "guard", now);
      expect(name).toMatch(/^guard_wiki_project_2024-03-05_070809_[a-z0-9]{6}\.tar\.gz\.enc$/);
      expect(name.endsWith(ARCHIVE_EXTENSION)).toBe(true);
    });

    test("uses the default prefix", () => {
      expect(generateArchiveName("all", "full", undefined, now).startsWith("guard_all_full_")).toBe(true);
    });

    test("generates distinct names for the same second", () => {
      const a = generateArchiveName("db", "project", "guard", now);
      const b = generateArchiveName("db", "project", "guard", now);
      expect(a).not.toBe(b);
    });
  });

  describe("parseArchiveName", () => {
    test("parses every component", () => {
      const parsed = parseArchiveName("guard_wiki-js_project_2024-03-05_070809_abc123.tar.gz.enc");
      expect(parsed).not.toBeNull();
      expect(parsed?.prefix).toBe("guard");
      expect(parsed?.target).toBe("wiki-js");
      expect(parsed?.kind).toBe("project");
      expect(parsed?.date).toBe("2024-03-05");
      expect(parsed?.time).toBe("070809");
      expect(parsed?.shortId).toBe("abc123");
      expect(parsed?.createdAt.toISOString()).toBe("2024-03-05T07:08:09.000Z");
    });

    test("round-trips a generated name", () => {
      const now = new Date("2025-12-31T23:59:58Z");
      const parsed = parseArchiveName(generateArchiveName("portainer", "config", "guard", now));
      expect(parsed?.kind).toBe("config");
      expect(parsed?.createdAt.getTime()).toBe(now.getTime());
    });

    test("rejects names outside the pattern", () => {
      expect(parseArchiveName("notes.txt")).toBeNull();
      expect(parseArchiveName("guard_wiki_project_2024-03-05_070809_abc123.tar.gz")).toBeNull();
      expect(parseArchiveName("guard_wiki_weekly_2024-03-05_070809_abc123.tar.gz.enc")).toBeNull();
    });

    test("rejects impossible dates", () => {
      expect(parseArchiveName("guard_wiki_project_2024-13-45_070809_abc123.tar.gz.enc")).toBeNull();
    });
  });

  describe("isValidArchiveName", () => {
    const name = "guard_db_full_2024-01-01_000000_zzz999.tar.gz.enc";

    test("requires the expected prefix", () => {
      expect(isValidArchiveName(name)).toBe(true);
      expect(isValidArchiveName(name, "other")).toBe(false);
    });
  });
});
