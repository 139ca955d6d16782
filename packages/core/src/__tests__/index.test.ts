import { afterEach, describe, expect, it } from "vitest";
import {
  abortIfError,
  BUILTIN_TEMPLATES,
  defaultContext,
  ErrorRecord,
  isErrorValue,
  ok,
  PACKAGE_NAME,
  raise,
  registerTag,
  unwrapOrAbort,
} from "../index.js";

describe("@errtally/core", () => {
  afterEach(() => {
    defaultContext.registry.reset();
  });

  it("should export package name", () => {
    expect(PACKAGE_NAME).toBe("@errtally/core");
  });

  it("exposes the built-in table", () => {
    expect(Object.keys(BUILTIN_TEMPLATES)).toEqual([
      "EARG",
      "ELIB",
      "ENOTAG",
      "EOPEN",
      "ESTAT",
      "ETAG",
    ]);
  });

  describe("module-level API", () => {
    it("raise() builds an empty record", () => {
      const record = raise();

      expect(record).toBeInstanceOf(ErrorRecord);
      expect(record.count).toBe(0);
      expect(record.tag).toBeNull();
      expect(isErrorValue(record)).toBe(true);
    });

    it("registerTag feeds the default registry used by raise", () => {
      expect(registerTag("EDB", "Query failed:[%s]")).toBe("EDB");

      expect(raise(undefined, "EDB", "select 1").render()).toBe("(EDB) Query failed:[select 1]");
      expect(defaultContext.registry.has("EDB")).toBe(true);
    });

    it("abortIfError escalates a non-empty record", () => {
      const record = raise(undefined, "ESTAT", "a.nofile");

      expect(() => abortIfError(record)).toThrow("(ESTAT) Cannot stat file:[a.nofile]");
      expect(() => abortIfError(raise())).not.toThrow();
      expect(() => abortIfError(raise(), { abortOnEmpty: true })).toThrow();
    });

    it("unwrapOrAbort returns the value of an Ok", () => {
      expect(unwrapOrAbort(ok("value"))).toBe("value");
    });
  });
});
