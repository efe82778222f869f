/**
 * Tests for the create-or-update lifecycle.
 *
 * These cover the branch between creating and updating, renames, and the
 * failure points around the record write: each failing step is injected
 * through a StoreFileOps wrapper over the real file system.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { applyRecord, inspectRecord } from "./lifecycle.js";
import { nodeFileOps, type StoreFileOps } from "./fileops.js";
import { listRecordFiles } from "./storage.js";
import { AdrError } from "./errors.js";

const NOW = new Date(2024, 2, 20, 10, 30);

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected function to throw");
}

describe("Record Lifecycle", () => {
  let tempDir: string;
  let storePath: string;

  function read(name: string): string {
    return fs.readFileSync(path.join(storePath, name), "utf-8");
  }

  function withOps(overrides: Partial<StoreFileOps>): StoreFileOps {
    return { ...nodeFileOps, ...overrides };
  }

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "adr-lifecycle-test-"));
    storePath = path.join(tempDir, "docs", "adr");
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe("creating", () => {
    it("should create the store and render the default template", () => {
      const outcome = applyRecord(
        storePath,
        { number: "001", status: "Proposed", title: "Use Postgres" },
        { now: NOW },
      );

      expect(outcome.action).toBe("created");
      expect(outcome.filename).toBe("adr-001-use-postgres.md");
      expect(outcome.path).toBe(path.join(storePath, "adr-001-use-postgres.md"));
      expect(outcome.renamed).toBe(false);
      expect(outcome.cleanup).toEqual({ status: "skipped" });
      expect(outcome.index).toEqual({ status: "rebuilt", count: 1 });

      const lines = read("adr-001-use-postgres.md").split("\n");
      expect(lines.slice(0, 4)).toEqual([
        "# ADR 001: Use Postgres",
        "",
        "**Status**: Proposed  ",
        "**Date**: 2024-03-20",
      ]);
    });

    it("should use template.md from the store", () => {
      fs.mkdirSync(storePath, { recursive: true });
      fs.writeFileSync(
        path.join(storePath, "template.md"),
        "{{number}}|{{title}}|{{status}}|{{date}}|{{owner}}",
      );

      applyRecord(storePath, { number: "003", status: "Proposed", title: "X" }, { now: NOW });

      expect(read("adr-003-x.md")).toBe("003|X|Proposed|2024-03-20|{{owner}}");
    });

    it("should fail with MissingTitle and write nothing", () => {
      const err = thrown(() => applyRecord(storePath, { number: "001", status: "Proposed" }));

      expect(err).toBeInstanceOf(AdrError);
      expect(err).toMatchObject({ kind: "MissingTitle" });
      expect(fs.existsSync(storePath)).toBe(false);
    });

    it("should refuse a blank status and write nothing", () => {
      const err = thrown(() =>
        applyRecord(storePath, { number: "002", status: "", title: "B" }),
      );

      expect(err).toMatchObject({ kind: "MissingArgument" });
      expect(fs.existsSync(storePath)).toBe(false);
    });

    it("should treat a blank title as missing", () => {
      const err = thrown(() =>
        applyRecord(storePath, { number: "001", status: "Proposed", title: "   " }),
      );
      expect(err).toMatchObject({ kind: "MissingTitle" });
    });

    it("should regenerate the index in number order", () => {
      applyRecord(storePath, { number: "002", status: "Proposed", title: "Second" }, { now: NOW });
      applyRecord(storePath, { number: "001", status: "Proposed", title: "First" }, { now: NOW });

      expect(read("README.md")).toBe(
        "# Architecture Decision Records\n\n" +
          "- [First](adr-001-first.md)\n" +
          "- [Second](adr-002-second.md)\n",
      );
    });

    it("should use the configured index heading", () => {
      applyRecord(
        storePath,
        { number: "001", status: "Proposed", title: "First" },
        { now: NOW, indexTitle: "Decisions" },
      );
      expect(read("README.md")).toBe("# Decisions\n\n- [First](adr-001-first.md)\n");
    });
  });

  describe("updating", () => {
    beforeEach(() => {
      applyRecord(
        storePath,
        { number: "001", status: "Proposed", title: "Use Postgres" },
        { now: NOW },
      );
    });

    it("should update the status without requiring a title", () => {
      const outcome = applyRecord(storePath, { number: "001", status: "Accepted" });

      expect(outcome.action).toBe("updated");
      expect(outcome.filename).toBe("adr-001-use-postgres.md");
      expect(outcome.title).toBe("Use Postgres");
      expect(outcome.statusChanged).toBe(true);
      expect(outcome.previousStatus).toBe("Proposed");
      expect(outcome.renamed).toBe(false);
      expect(listRecordFiles(storePath)).toEqual(["adr-001-use-postgres.md"]);

      const lines = read("adr-001-use-postgres.md").split("\n");
      expect(lines.slice(0, 5)).toEqual([
        "# ADR 001: Use Postgres",
        "",
        "**Status**: Accepted  ",
        "**Previous Status**: Proposed  ",
        "**Date**: 2024-03-20",
      ]);
    });

    it("should leave the file unchanged when the status is the same", () => {
      const before = read("adr-001-use-postgres.md");
      const outcome = applyRecord(storePath, { number: "001", status: "Proposed" });

      expect(outcome.statusChanged).toBe(false);
      expect(outcome.previousStatus).toBeNull();
      expect(read("adr-001-use-postgres.md")).toBe(before);
    });

    it("should ignore surrounding whitespace in the requested status", () => {
      const before = read("adr-001-use-postgres.md");
      const outcome = applyRecord(storePath, { number: "001", status: " Proposed " });

      expect(outcome.statusChanged).toBe(false);
      expect(outcome.status).toBe("Proposed");
      expect(read("adr-001-use-postgres.md")).toBe(before);
    });

    it("should refuse a blank status and leave the record alone", () => {
      const before = read("adr-001-use-postgres.md");
      const err = thrown(() => applyRecord(storePath, { number: "001", status: "  " }));

      expect(err).toMatchObject({ kind: "MissingArgument" });
      expect(read("adr-001-use-postgres.md")).toBe(before);
    });

    it("should keep the title when the same title is given", () => {
      const outcome = applyRecord(storePath, {
        number: "001",
        status: "Accepted",
        title: "Use Postgres",
      });
      expect(outcome.renamed).toBe(false);
      expect(outcome.cleanup).toEqual({ status: "skipped" });
    });

    it("should fail with RecordUnreadable when the file cannot be read", () => {
      const io = withOps({
        readFile(target) {
          if (target.endsWith("adr-001-use-postgres.md")) throw new Error("EIO");
          return nodeFileOps.readFile(target);
        },
      });
      const err = thrown(() => applyRecord(storePath, { number: "001", status: "Accepted" }, { io }));
      expect(err).toMatchObject({ kind: "RecordUnreadable" });
    });
  });

  describe("records with other number widths", () => {
    beforeEach(() => {
      fs.mkdirSync(storePath, { recursive: true });
      fs.writeFileSync(
        path.join(storePath, "adr-1-first.md"),
        "# ADR 1: First\n\n**Status**: Proposed\n",
      );
    });

    it("should update the existing file instead of creating a second one", () => {
      const outcome = applyRecord(storePath, { number: "001", status: "Accepted" });

      expect(outcome.action).toBe("updated");
      expect(outcome.number).toBe("1");
      expect(outcome.filename).toBe("adr-1-first.md");
      expect(listRecordFiles(storePath)).toEqual(["adr-1-first.md"]);
    });

    it("should keep the file's own number when renaming", () => {
      const outcome = applyRecord(storePath, { number: "001", status: "Accepted", title: "Other" });

      expect(outcome.filename).toBe("adr-1-other.md");
      expect(listRecordFiles(storePath)).toEqual(["adr-1-other.md"]);
      expect(read("adr-1-other.md")).toBe(
        "# ADR 1: Other\n\n**Status**: Accepted\n**Previous Status**: Proposed\n",
      );
    });
  });

  describe("renaming", () => {
    const ORIGINAL = "# ADR 005: Alpha\n\n**Status**: Proposed\n\nBody\n";

    beforeEach(() => {
      fs.mkdirSync(storePath, { recursive: true });
      fs.writeFileSync(path.join(storePath, "adr-005-alpha.md"), ORIGINAL);
    });

    it("should move the record to the new slug and remove the old file", () => {
      const outcome = applyRecord(storePath, { number: "005", status: "Accepted", title: "Beta" });

      expect(outcome.action).toBe("updated");
      expect(outcome.renamed).toBe(true);
      expect(outcome.filename).toBe("adr-005-beta.md");
      expect(outcome.previousFilename).toBe("adr-005-alpha.md");
      expect(outcome.cleanup).toEqual({ status: "removed", filename: "adr-005-alpha.md" });
      expect(listRecordFiles(storePath)).toEqual(["adr-005-beta.md"]);
      expect(read("adr-005-beta.md")).toBe(
        "# ADR 005: Beta\n\n**Status**: Accepted\n**Previous Status**: Proposed\n\nBody\n",
      );
      expect(read("README.md")).toBe(
        "# Architecture Decision Records\n\n- [Beta](adr-005-beta.md)\n",
      );
    });

    it("should rename even when the status is unchanged", () => {
      const outcome = applyRecord(storePath, { number: "005", status: "Proposed", title: "Beta" });

      expect(outcome.statusChanged).toBe(false);
      expect(outcome.renamed).toBe(true);
      expect(read("adr-005-beta.md")).toBe("# ADR 005: Beta\n\n**Status**: Proposed\n\nBody\n");
    });

    it("should report a failed cleanup as a warning and keep the new file", () => {
      const io = withOps({
        removeFile() {
          throw new Error("EBUSY");
        },
      });
      const outcome = applyRecord(
        storePath,
        { number: "005", status: "Accepted", title: "Beta" },
        { io },
      );

      expect(outcome.action).toBe("updated");
      expect(outcome.cleanup.status).toBe("failed");
      expect(fs.existsSync(path.join(storePath, "adr-005-beta.md"))).toBe(true);
      expect(fs.existsSync(path.join(storePath, "adr-005-alpha.md"))).toBe(true);
      expect(outcome.index).toEqual({ status: "rebuilt", count: 2 });
    });
  });

  describe("write failures", () => {
    it("should throw RecordWriteFailed and not build the index", () => {
      const io = withOps({
        writeFile() {
          throw new Error("EROFS");
        },
      });
      const err = thrown(() =>
        applyRecord(storePath, { number: "001", status: "Proposed", title: "A" }, { io }),
      );

      expect(err).toMatchObject({ kind: "RecordWriteFailed" });
      expect(fs.existsSync(path.join(storePath, "README.md"))).toBe(false);
    });

    it("should throw StoreUnavailable when the directory cannot be created", () => {
      const io = withOps({
        ensureDir() {
          throw new Error("EACCES");
        },
      });
      const err = thrown(() =>
        applyRecord(storePath, { number: "001", status: "Proposed", title: "A" }, { io }),
      );
      expect(err).toMatchObject({ kind: "StoreUnavailable" });
    });

    it("should keep the record when the index cannot be written", () => {
      const io = withOps({
        writeFile(target, content) {
          if (target.endsWith("README.md")) throw new Error("ENOSPC");
          nodeFileOps.writeFile(target, content);
        },
      });
      const outcome = applyRecord(
        storePath,
        { number: "001", status: "Proposed", title: "A" },
        { io, now: NOW },
      );

      expect(outcome.action).toBe("created");
      expect(fs.existsSync(path.join(storePath, "adr-001-a.md"))).toBe(true);
      expect(outcome.index.status).toBe("failed");
      if (outcome.index.status === "failed") {
        expect(outcome.index.error).toMatchObject({ kind: "IndexWriteFailed" });
      }
    });

    it("should heal a stale index on the next run", () => {
      const io = withOps({
        writeFile(target, content) {
          if (target.endsWith("README.md")) throw new Error("ENOSPC");
          nodeFileOps.writeFile(target, content);
        },
      });
      applyRecord(storePath, { number: "001", status: "Proposed", title: "A" }, { io });
      applyRecord(storePath, { number: "002", status: "Proposed", title: "B" });

      expect(read("README.md")).toBe(
        "# Architecture Decision Records\n\n- [A](adr-001-a.md)\n- [B](adr-002-b.md)\n",
      );
    });
  });

  describe("inspectRecord", () => {
    it("should return null for an unknown number", () => {
      expect(inspectRecord(storePath, "001")).toBeNull();
    });

    it("should return the parsed record", () => {
      applyRecord(storePath, { number: "001", status: "Proposed", title: "A" }, { now: NOW });
      const record = inspectRecord(storePath, "001");

      expect(record?.filename).toBe("adr-001-a.md");
      expect(record?.parsed.title).toBe("A");
      expect(record?.parsed.status).toBe("Proposed");
    });
  });
});
