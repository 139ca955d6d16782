import { randomUUID } from "node:crypto";
import { mkdirSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { createErrorContext, isErrorValue, isOk } from "@errtally/core";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { openFiles } from "../../open-files.js";

describe("openFiles", () => {
  let dir: string;

  beforeEach(() => {
    dir = join(tmpdir(), `errtally-open-files-${randomUUID()}`);
    mkdirSync(dir, { recursive: true });
    writeFileSync(join(dir, "notes.txt"), "hello");
    writeFileSync(join(dir, "empty.txt"), "");
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("returns ok with every file when all open", () => {
    const errors = createErrorContext();
    const outcome = openFiles([join(dir, "notes.txt"), join(dir, "empty.txt")], errors);

    expect(isOk(outcome)).toBe(true);
    expect(outcome).toEqual({
      ok: true,
      value: [
        { path: join(dir, "notes.txt"), size: 5 },
        { path: join(dir, "empty.txt"), size: 0 },
      ],
    });
  });

  it("records a stat failure for every missing file", () => {
    const errors = createErrorContext();
    const missingA = join(dir, "a.nofile");
    const missingB = join(dir, "b.nofile");
    const outcome = openFiles([missingA, join(dir, "notes.txt"), missingB], errors);

    expect(isErrorValue(outcome)).toBe(true);
    if (!isErrorValue(outcome)) return;

    expect(outcome.tag).toBe("ESTAT");
    expect(outcome.allMessages()).toEqual([
      `(ESTAT) Cannot stat file:[${missingA}]`,
      `(ESTAT) Cannot stat file:[${missingB}]`,
    ]);
    expect(outcome.lastPayload()).toEqual([{ path: join(dir, "notes.txt"), size: 5 }]);
  });

  it("shares one payload list across events", () => {
    const errors = createErrorContext();
    const outcome = openFiles([join(dir, "a.nofile"), join(dir, "notes.txt")], errors);

    if (!isErrorValue(outcome)) throw new Error("expected an error record");

    // The first event was raised before notes.txt opened, but sees it
    expect(outcome.payloadAt(0)).toBe(outcome.lastPayload());
    expect(outcome.payloadAt(0)).toHaveLength(1);
  });

  it("treats a directory as a stat failure", () => {
    const errors = createErrorContext();
    const outcome = openFiles([dir], errors);

    if (!isErrorValue(outcome)) throw new Error("expected an error record");

    expect(outcome.render()).toBe(`(ESTAT) Cannot stat file:[${dir}]`);
    expect(outcome.lastPayload()).toEqual([]);
  });

  it("returns ok with an empty list for no paths", () => {
    expect(openFiles([], createErrorContext())).toEqual({ ok: true, value: [] });
  });
});
