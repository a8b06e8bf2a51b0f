import { describe, it, expect } from "vitest";
import { DEFAULT_MODEL, listModels, resolveModel } from "../models.js";

describe("resolveModel", () => {
  it("accepts every listed model", () => {
    for (const { name } of listModels()) {
      expect(resolveModel(name)).toBe(name);
    }
  });

  it("falls back to the default for unknown or missing selectors", () => {
    expect(DEFAULT_MODEL).toBe("gemini-2.5-flash");
    expect(resolveModel("gemini-2.0-flash-exp")).toBe("gemini-2.5-flash");
    expect(resolveModel("")).toBe("gemini-2.5-flash");
    expect(resolveModel(undefined)).toBe("gemini-2.5-flash");
  });
});
