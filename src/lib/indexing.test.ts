/**
 * Tests for index generation.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { renderIndex, rebuildIndex, getIndexPath } from "./indexing.js";
import { nodeFileOps } from "./fileops.js";
import { AdrError } from "./errors.js";

describe("renderIndex", () => {
  it("should render an empty listing", () => {
    expect(renderIndex([])).toBe("# Architecture Decision Records\n\n");
  });

  it("should sort entries by filename", () => {
    expect(renderIndex(["adr-002-second.md", "adr-001-first.md"])).toBe(
      "# Architecture Decision Records\n\n" +
        "- [First](adr-001-first.md)\n" +
        "- [Second](adr-002-second.md)\n",
    );
  });

  it("should not depend on input order", () => {
    const files = ["adr-010-c.md", "adr-002-b.md", "adr-001-a.md"];
    expect(renderIndex(files)).toBe(renderIndex([...files].reverse()));
  });

  it("should use a custom heading", () => {
    expect(renderIndex([], "Decisions")).toBe("# Decisions\n\n");
  });
});

describe("rebuildIndex", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "adr-index-test-"));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("should write README.md from the records on disk", () => {
    fs.writeFileSync(path.join(tempDir, "adr-002-second-decision.md"), "test content");
    fs.writeFileSync(path.join(tempDir, "adr-001-first-decision.md"), "test content");
    fs.writeFileSync(path.join(tempDir, "template.md"), "{{title}}");

    const listed = rebuildIndex(tempDir);

    expect(listed).toEqual(["adr-001-first-decision.md", "adr-002-second-decision.md"]);
    expect(fs.readFileSync(getIndexPath(tempDir), "utf-8")).toBe(
      "# Architecture Decision Records\n\n" +
        "- [First Decision](adr-001-first-decision.md)\n" +
        "- [Second Decision](adr-002-second-decision.md)\n",
    );
  });

  it("should replace a hand-edited index completely", () => {
    fs.writeFileSync(path.join(tempDir, "README.md"), "# Old\n\n- [Gone](adr-009-gone.md)\n");
    fs.writeFileSync(path.join(tempDir, "adr-001-kept.md"), "x");

    rebuildIndex(tempDir);

    expect(fs.readFileSync(getIndexPath(tempDir), "utf-8")).toBe(
      "# Architecture Decision Records\n\n- [Kept](adr-001-kept.md)\n",
    );
  });

  it("should fail with StoreUnavailable when the directory is missing", () => {
    expect(() => rebuildIndex(path.join(tempDir, "missing"))).toThrow(AdrError);
  });

  it("should fail with StoreUnavailable when the index cannot be written", () => {
    fs.writeFileSync(path.join(tempDir, "adr-001-a.md"), "x");
    const io = {
      ...nodeFileOps,
      writeFile(): void {
        throw new Error("disk full");
      },
    };

    expect(() => rebuildIndex(tempDir, { io })).toThrow(/Cannot write index/);
  });
});
