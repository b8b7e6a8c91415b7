import { describe, it, expect } from "vitest";
import { ValidationError } from "@logrecall/errors";
import { validateQueryFilter } from "./filter-validator.js";

describe("validateQueryFilter", () => {
  it("accepts a filter with sources", () => {
    expect(validateQueryFilter({ sources: ["input-logs/day1.json", "input-logs/day2.json"] })).toEqual({
      sources: ["input-logs/day1.json", "input-logs/day2.json"],
    });
  });

  it("accepts empty filter", () => {
    expect(validateQueryFilter({})).toEqual({});
  });

  it("rejects unknown filter fields", () => {
    expect(() => validateQueryFilter({ sources: ["a.json"], documentIds: ["doc-1"] })).toThrow(
      'Invalid filter field: "documentIds". Allowed fields: sources',
    );
  });

  it("rejects injection attempts via filter keys", () => {
    expect(() => validateQueryFilter({ "'; DROP TABLE points; --": "value" })).toThrow(ValidationError);
  });

  it("rejects a filter that is not an object", () => {
    expect(() => validateQueryFilter(["a.json"])).toThrow("filter must be a plain object");
    expect(() => validateQueryFilter(null)).toThrow("filter must be a plain object");
  });

  it("validates sources is an array", () => {
    expect(() => validateQueryFilter({ sources: "a.json" })).toThrow("filter.sources must be an array of strings");
  });

  it("validates each source is a non-empty string", () => {
    expect(() => validateQueryFilter({ sources: [123, "a.json"] })).toThrow("Each source must be a non-empty string");
    expect(() => validateQueryFilter({ sources: [""] })).toThrow("Each source must be a non-empty string");
  });
});
