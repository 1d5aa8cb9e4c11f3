import { describe, expect, it, vi } from "vitest";
import { KeywordEntityExtractor, LlmEntityExtractor, keywordEntities } from "./entities";
import type { LanguageModel } from "./llm";

function fakeModel(reply: string): LanguageModel {
  return { name: "fake", generate: vi.fn(async () => reply) };
}

describe("keywordEntities", () => {
  it("keeps company names and drops command words", () => {
    expect(keywordEntities("Create a chart showing Microsoft's revenue")).toEqual(["Microsoft"]);
  });

  it("keeps periods", () => {
    expect(keywordEntities("Show me revenue for 2030")).toEqual(["2030"]);
  });

  it("joins capitalised runs and strips a trailing period", () => {
    expect(keywordEntities("Compare Apple Inc. and Greater China sales in FY2024")).toEqual([
      "Apple Inc",
      "Greater China",
      "FY2024",
    ]);
  });
});

describe("KeywordEntityExtractor", () => {
  it("falls back to content words when no names are found", async () => {
    await expect(new KeywordEntityExtractor().extract("what is the trend of revenue?")).resolves.toEqual([
      "trend",
      "revenue",
    ]);
  });
});

describe("LlmEntityExtractor", () => {
  it("trims and de-duplicates the names the model returns", async () => {
    const extractor = new LlmEntityExtractor(fakeModel('{"names": [" Apple ", "Apple", ""]}'), 1000);
    await expect(extractor.extract("Apple revenue")).resolves.toEqual(["Apple"]);
  });

  it("uses keywords when the reply is unusable", async () => {
    const extractor = new LlmEntityExtractor(fakeModel("sorry, no idea"), 1000);
    await expect(extractor.extract("Revenue of Apple in 2023")).resolves.toEqual(["Apple", "2023"]);
  });
});
