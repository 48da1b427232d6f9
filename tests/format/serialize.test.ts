import { describe, it, expect } from "vitest";
import {
  contentTypeFor,
  isJsonFormat,
  parseFormat,
  serialize,
  type JobState,
} from "../../src/format/index.js";
import { SerializationError, ValidationError } from "../../src/errors.js";

const decoder = new TextDecoder();

function jobState(overrides?: Partial<JobState["build"]>): JobState {
  return { name: "café-build", build: { number: 3, phase: "FINALIZED", ...overrides } };
}

describe("serialize", () => {
  it("encodes JSON as UTF-8 bytes", () => {
    const bytes = serialize(jobState(), "JSON");
    expect(decoder.decode(bytes)).toBe('{"name":"café-build","build":{"number":3,"phase":"FINALIZED"}}');
    // "é" is two bytes in UTF-8.
    expect(bytes.byteLength).toBe(decoder.decode(bytes).length + 1);
  });

  it("encodes XML as UTF-8 bytes", () => {
    const text = decoder.decode(serialize(jobState(), "XML"));
    expect(text).toContain("<name>café-build</name>");
    expect(text).toContain("<phase>FINALIZED</phase>");
  });

  it.each(["JSON", "XML"] as const)("wraps %s encoder failures in SerializationError", (format) => {
    const err = (() => {
      try {
        serialize(jobState({ duration: Number.NaN }), format);
        return null;
      } catch (e) {
        return e;
      }
    })();

    expect(err).toBeInstanceOf(SerializationError);
    expect(err instanceof SerializationError && err.message).toBe(
      `Failed to encode job state 'café-build' as ${format}: Cannot encode non-finite number NaN`,
    );
    expect(err instanceof SerializationError && err.cause).toBeInstanceOf(TypeError);
  });
});

describe("formats", () => {
  it.each([
    ["json", "JSON"],
    ["Xml", "XML"],
    [" JSON ", "JSON"],
  ])("parseFormat reads %j as %s", (raw, format) => {
    expect(parseFormat(raw)).toBe(format);
  });

  it("parseFormat rejects unknown names", () => {
    expect(() => parseFormat("yaml")).toThrow(ValidationError);
    expect(() => parseFormat("yaml")).toThrow("Unknown format 'yaml'. Use one of: XML, JSON");
  });

  it("only JSON is JSON", () => {
    expect(isJsonFormat("JSON")).toBe(true);
    expect(isJsonFormat("XML")).toBe(false);
  });

  it("maps the flag to a Content-Type", () => {
    expect(contentTypeFor(true)).toBe("application/json;charset=UTF-8");
    expect(contentTypeFor(false)).toBe("application/xml;charset=UTF-8");
  });
});
