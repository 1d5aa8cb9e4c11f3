import { describe, expect, it } from "vitest";
import { z } from "zod";
import { parseModelJson } from "./json";

const namesSchema = z.object({ names: z.array(z.string()) });

describe("parseModelJson", () => {
  it("reads fenced JSON", () => {
    expect(parseModelJson('```json\n{"names": ["Apple Inc"]}\n```', namesSchema)).toEqual({
      success: true,
      data: { names: ["Apple Inc"] },
    });
  });

  it("reads an object surrounded by prose", () => {
    expect(parseModelJson('Here you go: {"names": ["Greater China"]} hope it helps', namesSchema)).toEqual({
      success: true,
      data: { names: ["Greater China"] },
    });
  });

  it("reports schema issues for JSON of the wrong shape", () => {
    expect(parseModelJson('{"names": "Apple"}', namesSchema)).toEqual({
      success: false,
      issues: ["names: Expected array, received string"],
    });
    expect(parseModelJson("null", namesSchema)).toEqual({
      success: false,
      issues: ["reply: Expected object, received null"],
    });
  });

  it("reports a reply that is not JSON", () => {
    expect(parseModelJson("not json at all", namesSchema)).toEqual({ success: false, issues: ["reply is not JSON"] });
    expect(parseModelJson("", namesSchema)).toEqual({ success: false, issues: ["reply is not JSON"] });
  });
});
