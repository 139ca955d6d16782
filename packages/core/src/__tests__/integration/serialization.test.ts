import { MalformedRecordError } from "@errtally/errors";
import { describe, expect, it } from "vitest";
import { createErrorContext } from "../../context.js";
import { ErrorRecord } from "../../record.js";
import {
  deserializeRecord,
  safeDeserializeRecord,
  serializeRecord,
} from "../../serialization.js";

function malformedIssues(raw: unknown): readonly string[] {
  try {
    deserializeRecord(raw);
  } catch (error) {
    if (error instanceof MalformedRecordError) {
      return error.issues;
    }
    throw error;
  }
  throw new Error("expected a MalformedRecordError");
}

describe("record serialization", () => {
  it("survives a trip through JSON text", () => {
    const { raise } = createErrorContext();
    let record = raise(undefined, "ESTAT", "a.nofile", { attempt: 1 });
    record = raise(record, "EOPEN", "b.nofile", { attempt: 2 });

    const restored = deserializeRecord(JSON.parse(JSON.stringify(record)));

    expect(restored).toBeInstanceOf(ErrorRecord);
    expect(restored.tag).toBe("ESTAT");
    expect(restored.count).toBe(2);
    expect(restored.allMessages()).toEqual(record.allMessages());
    expect(restored.allPayloads()).toEqual([{ attempt: 1 }, { attempt: 2 }]);
  });

  it("serializes an empty record", () => {
    const { raise } = createErrorContext();

    expect(serializeRecord(raise())).toEqual({ tag: null, count: 0, messages: [], payloads: [] });
    expect(deserializeRecord({ tag: null, count: 0, messages: [], payloads: [] }).count).toBe(0);
  });

  it("keeps stored messages verbatim", () => {
    const restored = deserializeRecord({
      tag: "EDB",
      count: 1,
      messages: ["(EDB) Query failed:[select 1]"],
      payloads: [null],
    });

    expect(restored.render()).toBe("(EDB) Query failed:[select 1]");
    expect(restored.lastPayload()).toBeNull();
  });

  it("rebuilt records keep aggregating", () => {
    const { raise } = createErrorContext();
    const restored = deserializeRecord({
      tag: "ESTAT",
      count: 1,
      messages: ["(ESTAT) Cannot stat file:[a.nofile]"],
      payloads: [null],
    });

    raise(restored, "EOPEN", "b.nofile");

    expect(restored.tag).toBe("ESTAT");
    expect(restored.count).toBe(2);
  });
});

describe("deserializeRecord validation", () => {
  it("rejects sequences that do not match the count", () => {
    expect(
      malformedIssues({ tag: "ESTAT", count: 2, messages: ["(ESTAT) x"], payloads: [1] }),
    ).toEqual([
      "messages: Expected 2 messages, received 1",
      "payloads: Expected 2 payloads, received 1",
    ]);
  });

  it("rejects a non-empty record without a tag", () => {
    expect(malformedIssues({ tag: null, count: 1, messages: ["x"], payloads: [1] })).toEqual([
      "tag: A record with events must have a tag",
    ]);
  });

  it("rejects an empty record with a tag", () => {
    expect(malformedIssues({ tag: "ESTAT", count: 0, messages: [], payloads: [] })).toEqual([
      "tag: An empty record cannot have a tag",
    ]);
  });

  it("rejects a value that is not an object", () => {
    expect(malformedIssues("(ESTAT) x")).toEqual(["(root): Expected object, received string"]);
  });

  it("safeDeserializeRecord returns undefined instead of throwing", () => {
    expect(safeDeserializeRecord({ count: -1 })).toBeUndefined();
    expect(
      safeDeserializeRecord({ tag: "EARG", count: 1, messages: ["m"], payloads: [null] })?.tag,
    ).toBe("EARG");
  });
});
