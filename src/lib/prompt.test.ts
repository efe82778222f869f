/**
 * Tests for interactive prompting helpers.
 */

import { describe, it, expect } from "vitest";
import { PassThrough } from "node:stream";
import {
  createPrompter,
  formatStatusMenu,
  resolveStatusChoice,
  withDefault,
} from "./prompt.js";

const STATUSES = ["Proposed", "Accepted", "Superseded"];

describe("resolveStatusChoice", () => {
  it("should pick a menu entry by number", () => {
    expect(resolveStatusChoice("2", STATUSES)).toBe("Accepted");
  });

  it("should match menu entries case-insensitively", () => {
    expect(resolveStatusChoice("superseded", STATUSES)).toBe("Superseded");
  });

  it("should accept free text", () => {
    expect(resolveStatusChoice(" On Hold ", STATUSES)).toBe("On Hold");
  });

  it("should treat out-of-range numbers as free text", () => {
    expect(resolveStatusChoice("9", STATUSES)).toBe("9");
  });

  it("should fall back on a blank answer", () => {
    expect(resolveStatusChoice("  ", STATUSES, "Proposed")).toBe("Proposed");
    expect(resolveStatusChoice("", STATUSES)).toBe("");
  });
});

describe("formatStatusMenu", () => {
  it("should number the entries from one", () => {
    expect(formatStatusMenu(STATUSES)).toBe("  1) Proposed\n  2) Accepted\n  3) Superseded");
  });
});

describe("withDefault", () => {
  it("should show the default in brackets", () => {
    expect(withDefault("Status", "Accepted")).toBe("Status [Accepted]: ");
    expect(withDefault("Title", null)).toBe("Title: ");
  });
});

describe("createPrompter", () => {
  it("should return answers line by line", async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const prompter = createPrompter(input, output);

    const first = prompter.ask("Number: ");
    input.write("7\n");
    await expect(first).resolves.toBe("7");

    const second = prompter.ask("Title: ");
    input.write("Use Postgres\n");
    await expect(second).resolves.toBe("Use Postgres");

    prompter.close();
  });

  it("should reject when input ends before an answer", async () => {
    const input = new PassThrough();
    const prompter = createPrompter(input, new PassThrough());

    const pending = prompter.ask("Number: ");
    input.end();
    await expect(pending).rejects.toThrow(/Input closed/);
  });
});
