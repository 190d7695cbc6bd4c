import { describe, it, expect } from "vitest";
import { NotFoundError } from "../errors.js";
import { createSampleStore } from "../testing/catalogue.js";
import { FieldStore } from "./field-store.js";
import { EncodingResolver } from "./encoding-resolver.js";

describe("EncodingResolver", () => {
  const resolver = new EncodingResolver(createSampleStore());

  it("should resolve integer codes", () => {
    expect(resolver.resolve(9, 1)).toEqual({ code: 1, label: "Male" });
    expect(resolver.resolve(90, -3)).toEqual({ code: -3, label: "Prefer not to answer" });
  });

  it("should treat numeric strings as the same code", () => {
    expect(resolver.resolve(9, "0").label).toBe("Female");
    expect(resolver.resolve(9, " 1 ").label).toBe("Male");
  });

  it("should resolve string codes", () => {
    expect(resolver.resolve(19, "I10").label).toBe("I10 Essential hypertension");
  });

  it("should resolve string codes stored with surrounding spaces", () => {
    const padded = new EncodingResolver(
      FieldStore.fromCatalogue({
        fields: [],
        encodings: [{ ref: 7, title: "Padded", entries: [{ code: " A1 ", label: "First" }] }],
        recommended: [],
      })
    );
    const [entry] = padded.table(7).entries;
    expect(padded.resolve(7, entry.code).label).toBe("First");
    expect(padded.resolve(7, "A1").label).toBe("First");
  });

  it("should throw NotFoundError for an unknown code", () => {
    expect(() => resolver.resolve(9, 5)).toThrow(NotFoundError);
    expect(() => resolver.resolve(9, 5)).toThrow("Code 5 not found in encoding 9");
  });

  it("should throw NotFoundError for an unknown table", () => {
    try {
      resolver.table(12345);
      expect.fail("Should have thrown");
    } catch (error) {
      expect(error).toBeInstanceOf(NotFoundError);
      if (error instanceof NotFoundError) {
        expect(error.subject).toBe("encoding");
        expect(error.message).toBe("Encoding 12345 not found");
      }
    }
  });
});
