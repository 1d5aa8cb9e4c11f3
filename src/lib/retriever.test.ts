import { afterEach, describe, expect, it, vi } from "vitest";
import type { ChunkStore } from "./chunk-store";
import { EvidenceUnavailableError } from "./errors";
import type { GraphStore } from "./graph-store";
import { HybridRetriever } from "./retriever";
import type { Chunk, Coverage } from "./types";
import { NO_RELEVANT_INFORMATION } from "./types";

const COVERAGE: Coverage = { entities: ["Apple Inc"], periods: ["2022", "2023"] };

function graphStore(overrides: Partial<GraphStore> = {}): GraphStore {
  return {
    neighbourhood: vi.fn(async () => []),
    coverage: vi.fn(async () => COVERAGE),
    ...overrides,
  };
}

function chunkStore(search: ChunkStore["search"]): ChunkStore {
  return { name: "fake", search, verify: vi.fn(async () => undefined) };
}

const never = <T>() => new Promise<T>(() => undefined);

afterEach(() => {
  vi.restoreAllMocks();
});

describe("HybridRetriever", () => {
  it("returns the sentinel when both sources are empty", async () => {
    const retriever = new HybridRetriever({ graph: graphStore(), chunks: chunkStore(async () => []) });
    const res = await retriever.retrieve("Show me revenue for 2030");
    expect(res).toEqual({
      status: "ok",
      value: { kind: "none", coverage: COVERAGE, text: NO_RELEVANT_INFORMATION },
    });
  });

  it("formats structured then unstructured evidence", async () => {
    const chunk: Chunk = {
      text: "Net sales were $391.0 billion in 2024.",
      score: 0.9,
      title: "10-K 2024",
      company: "Apple",
    };
    const graph = graphStore({ neighbourhood: vi.fn(async () => ["Apple Inc - REPORTED -> Net Sales"]) });
    const retriever = new HybridRetriever({ graph, chunks: chunkStore(async () => [chunk]) });

    const res = await retriever.retrieve("What were Apple's net sales?");
    expect(res.status).toBe("ok");
    if (res.status !== "ok" || res.value.kind !== "evidence") throw new Error("expected evidence");
    expect(res.value.text).toBe(
      [
        "Structured data:",
        "Apple Inc - REPORTED -> Net Sales",
        "",
        "Unstructured data:",
        "#Document [S1] (10-K 2024 · Apple)",
        "Net sales were $391.0 billion in 2024.",
      ].join("\n")
    );
    expect(res.value.coverage.periods).toEqual(["2022", "2023", "2024"]);
    expect(graph.neighbourhood).toHaveBeenCalledWith(["Apple"]);
  });

  it("fails with EvidenceUnavailableError when a store cannot be queried", async () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    const retriever = new HybridRetriever({
      graph: graphStore(),
      chunks: chunkStore(async () => {
        throw new Error("connection refused");
      }),
    });
    const res = await retriever.retrieve("What were Apple's net sales?");
    expect(res.status).toBe("failed");
    if (res.status !== "failed") return;
    expect(res.error).toBeInstanceOf(EvidenceUnavailableError);
    expect(res.error.message).toBe("Could not query the fake store: connection refused");
  });

  it("continues without a source that times out", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const chunk: Chunk = { text: "Net sales were $391.0 billion in 2024.", score: 1 };
    const retriever = new HybridRetriever({
      graph: graphStore({ neighbourhood: vi.fn(() => never<string[]>()) }),
      chunks: chunkStore(async () => [chunk]),
      timeoutMs: 20,
    });
    const res = await retriever.retrieve("What were Apple's net sales?");
    expect(res.status).toBe("ok");
    if (res.status !== "ok" || res.value.kind !== "evidence") throw new Error("expected evidence");
    expect(res.value.structured).toEqual([]);
    expect(res.value.unstructured).toEqual([chunk]);
  });

  it("fails when both sources time out", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const retriever = new HybridRetriever({
      graph: graphStore({ neighbourhood: vi.fn(() => never<string[]>()) }),
      chunks: chunkStore(() => never<Chunk[]>()),
      timeoutMs: 20,
    });
    const res = await retriever.retrieve("What were Apple's net sales?");
    expect(res.status).toBe("failed");
    if (res.status === "failed") expect(res.error.kind).toBe("evidence_unavailable");
  });

  it("treats a coverage failure as empty coverage", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const graph = graphStore({
      coverage: vi.fn(async () => {
        throw new Error("index missing");
      }),
    });
    const retriever = new HybridRetriever({ graph, chunks: chunkStore(async () => []) });
    const res = await retriever.retrieve("Show me revenue for 2030");
    expect(res).toEqual({
      status: "ok",
      value: { kind: "none", coverage: { entities: [], periods: [] }, text: NO_RELEVANT_INFORMATION },
    });
    expect(warn).toHaveBeenCalledWith("Retrieval: coverage lookup failed:", "index missing");
  });
});
