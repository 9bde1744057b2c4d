import { describe, expect, it } from "vitest";

import { summarizeArticle } from "./summarize.js";

describe("summarizeArticle", () => {
  it("keeps up to three leading sentences longer than twenty characters", () => {
    expect(
      summarizeArticle(
        "Mumbai metro line opens",
        "The new line connects the suburbs to the business district. Officials expect heavy use. More later"
      )
    ).toBe(
      "Mumbai metro line opens. The new line connects the suburbs to the business district. Officials expect heavy use."
    );
  });

  it("returns the description when no sentence qualifies", () => {
    expect(summarizeArticle("Rain", "Heavy rain.")).toBe("Heavy rain.");
  });

  it("truncates a long description to 200 characters", () => {
    const description = "a.".repeat(150);
    expect(summarizeArticle("T", description)).toBe(`${"a.".repeat(100)}...`);
  });

  it("falls back to the title when there is no description", () => {
    expect(summarizeArticle("Hi", "")).toBe("Hi");
  });
});
