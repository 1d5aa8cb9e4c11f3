import { describe, expect, it, vi } from "vitest";
import { ENTITY_INDEX, Neo4jGraphStore } from "./graph-store";
import type { CypherRunner, Params, Row } from "./neo4j";

function fakeCypher(read: (cypher: string, params?: Params) => Promise<Row[]>): CypherRunner {
  return {
    read: vi.fn(read),
    write: vi.fn(async () => []),
    verify: vi.fn(async () => undefined),
    close: vi.fn(async () => undefined),
  };
}

describe("Neo4jGraphStore.neighbourhood", () => {
  it("queries the entity index fuzzily and de-duplicates lines", async () => {
    const cypher = fakeCypher(async () => [
      { output: "Apple Inc - REPORTED -> Net Sales" },
      { output: "Apple Inc - REPORTED -> Net Sales" },
      { output: "Apple Inc - OPERATES_IN -> Greater China" },
      { unexpected: 1 },
    ]);
    const store = new Neo4jGraphStore(cypher);

    const lines = await store.neighbourhood(["Apple Inc", "Apple"]);
    expect(lines).toEqual(["Apple Inc - REPORTED -> Net Sales", "Apple Inc - OPERATES_IN -> Greater China"]);
    expect(cypher.read).toHaveBeenCalledTimes(2);
    expect(cypher.read).toHaveBeenNthCalledWith(1, expect.stringContaining("db.index.fulltext.queryNodes"), {
      index: ENTITY_INDEX,
      query: "Apple~2 AND Inc~2",
      limit: 50,
    });
  });

  it("skips names that leave nothing to search", async () => {
    const cypher = fakeCypher(async () => []);
    await expect(new Neo4jGraphStore(cypher).neighbourhood(["?!", ""])).resolves.toEqual([]);
    expect(cypher.read).not.toHaveBeenCalled();
  });
});

describe("Neo4jGraphStore.coverage", () => {
  it("splits entities from normalised, sorted periods", async () => {
    const cypher = fakeCypher(async (cypher) =>
      cypher.includes("=~")
        ? [{ id: "FY 2024" }, { id: "2023" }, { id: "2023" }, { id: "Q1 2024" }]
        : [{ id: "Apple Inc" }, { id: "2024" }, { id: "Net Sales" }]
    );
    await expect(new Neo4jGraphStore(cypher).coverage()).resolves.toEqual({
      entities: ["Apple Inc", "Net Sales"],
      periods: ["2023", "FY2024", "Q1 2024"],
    });
  });
});
