import { randomUUID } from "node:crypto";
import { mkdirSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { createErrorContext } from "@errtally/core";
import { FatalRecordError } from "@errtally/errors";
import { afterEach, beforeEach, describe, expect, it, type MockInstance, vi } from "vitest";
import { main } from "../../cli.js";

describe("main", () => {
  let dir: string;
  let logSpy: MockInstance<typeof console.log>;

  function output(): string {
    return logSpy.mock.calls.map((call) => call.map(String).join(" ")).join("\n");
  }

  beforeEach(() => {
    dir = join(tmpdir(), `errtally-cli-${randomUUID()}`);
    mkdirSync(dir, { recursive: true });
    writeFileSync(join(dir, "notes.txt"), "hello");
    logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    logSpy.mockRestore();
    rmSync(dir, { recursive: true, force: true });
  });

  it("prints help and exits 0", () => {
    expect(main(["--help"], createErrorContext())).toBe(0);
    expect(output()).toContain("-s, --strict   Abort if any file cannot be opened");
  });

  it("aborts on every unknown flag before opening anything", () => {
    const notes = join(dir, "notes.txt");

    expect(() => main(["--verbose", notes, "-x"], createErrorContext())).toThrow(
      "(EFLAG) Unknown option:[--verbose] (EFLAG) Unknown option:[-x]",
    );
    expect(logSpy).not.toHaveBeenCalled();
  });

  it("aborts when no file is given", () => {
    expect(() => main([], createErrorContext())).toThrow("(EARG) Missing argument:[file]");
  });

  it("lists opened files when every file opens", () => {
    const notes = join(dir, "notes.txt");

    expect(main([notes], createErrorContext())).toBe(0);
    expect(output()).toContain(notes);
    expect(output()).not.toContain("(WARNING)");
  });

  it("reports failures and keeps going when some files open", () => {
    const missing = join(dir, "a.nofile");

    expect(main([missing, join(dir, "notes.txt")], createErrorContext())).toBe(0);
    expect(output()).toContain("(WARNING) Some files could not be opened");
    expect(output()).toContain(`(WFILE) \t(ESTAT) Cannot stat file:[${missing}]`);
  });

  it("aborts when no file could be opened", () => {
    const missingA = join(dir, "a.nofile");
    const missingB = join(dir, "b.nofile");

    expect(() => main([missingA, missingB], createErrorContext())).toThrow(
      `(ESTAT) Cannot stat file:[${missingA}] (ESTAT) Cannot stat file:[${missingB}]`,
    );
  });

  it("aborts on any failure in strict mode", () => {
    const missing = join(dir, "a.nofile");

    expect(() => main(["--strict", missing, join(dir, "notes.txt")], createErrorContext())).toThrow(
      FatalRecordError,
    );
  });
});
