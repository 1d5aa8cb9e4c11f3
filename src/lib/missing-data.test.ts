import { describe, expect, it } from "vitest";
import { hasMissingDataMarker, isDeflection, missingDataSentence, splitSentences } from "./missing-data";

describe("hasMissingDataMarker", () => {
  it("detects missing-data wording", () => {
    expect(hasMissingDataMarker("Revenue for 2030 is not available.")).toBe(true);
    expect(hasMissingDataMarker("The filing does not contain segment data.")).toBe(true);
  });

  it("ignores ordinary answers", () => {
    expect(hasMissingDataMarker("Revenue was $391.0 billion in 2024.")).toBe(false);
  });
});

describe("isDeflection", () => {
  it("flags replies that point elsewhere", () => {
    expect(isDeflection("Please refer to the source documents for details.")).toBe(true);
    expect(isDeflection("I don't know.")).toBe(true);
    expect(isDeflection("   ")).toBe(true);
  });

  it("accepts an explanation", () => {
    expect(isDeflection("Revenue for 2030 is not available in the documents.")).toBe(false);
  });
});

describe("splitSentences", () => {
  it("splits before a capital letter or digit only", () => {
    expect(splitSentences("One. Two! three")).toEqual(["One.", "Two! three"]);
  });
});

describe("missingDataSentence", () => {
  it("returns the first sentence carrying a marker", () => {
    const text = "Apple reported revenue for 2022 to 2024. Figures for 2030 are not available. Ask about another year.";
    expect(missingDataSentence(text)).toBe("Figures for 2030 are not available.");
  });

  it("returns undefined when nothing is missing", () => {
    expect(missingDataSentence("Revenue was $391.0 billion in 2024.")).toBeUndefined();
  });
});
