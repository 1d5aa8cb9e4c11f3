import type { ChunkStore } from "./chunk-store";
import type { EntityExtractor } from "./entities";
import { KeywordEntityExtractor } from "./entities";
import { EvidenceUnavailableError, toErrorMessage } from "./errors";
import type { GraphStore } from "./graph-store";
import { TimeoutError, withTimeout } from "./llm";
import { findPeriods } from "./periods";
import type { Chunk, Coverage, EvidenceBundle, StageResult } from "./types";
import { NO_RELEVANT_INFORMATION, failed, ok } from "./types";

export type HybridRetrieverOptions = {
  graph: GraphStore;
  chunks: ChunkStore;
  entities?: EntityExtractor;
  topK?: number;
  timeoutMs?: number;
};

type SourceOutcome<T> = { value: T; timedOut: boolean } | { error: unknown };

function settle<T>(res: PromiseSettledResult<T>, empty: T, label: string): SourceOutcome<T> {
  if (res.status === "fulfilled") return { value: res.value, timedOut: false };
  if (res.reason instanceof TimeoutError) {
    console.warn(`Retrieval: ${label} timed out, continuing without it`);
    return { value: empty, timedOut: true };
  }
  return { error: res.reason };
}

export function formatChunk(c: Chunk, i: number): string {
  const meta = [c.title ?? c.source, c.company, c.published_date].filter(Boolean).join(" · ");
  return `#Document [S${i + 1}]${meta ? ` (${meta})` : ""}\n${c.text}`;
}

export function formatEvidence(structured: string[], unstructured: Chunk[]): string {
  const parts: string[] = [];
  if (structured.length > 0) parts.push(`Structured data:\n${structured.join("\n")}`);
  if (unstructured.length > 0) parts.push(`Unstructured data:\n${unstructured.map(formatChunk).join("\n\n")}`);
  return parts.join("\n\n");
}

/**
 * Gathers graph facts and document chunks for a question concurrently. Both empty
 * yields the "no relevant information" sentinel; a store that cannot be queried
 * yields a failed result, never an empty bundle.
 */
export class HybridRetriever {
  private readonly entities: EntityExtractor;
  private readonly topK: number;
  private readonly timeoutMs: number;

  constructor(private readonly opts: HybridRetrieverOptions) {
    this.entities = opts.entities ?? new KeywordEntityExtractor();
    this.topK = opts.topK ?? 6;
    this.timeoutMs = opts.timeoutMs ?? 15000;
  }

  private async structured(question: string): Promise<string[]> {
    let names: string[];
    try {
      names = await this.entities.extract(question);
    } catch (e) {
      console.warn("Entity extraction failed, using keywords:", toErrorMessage(e));
      names = await new KeywordEntityExtractor().extract(question);
    }
    if (names.length === 0) return [];
    return this.opts.graph.neighbourhood(names);
  }

  async retrieve(question: string): Promise<StageResult<EvidenceBundle>> {
    const [graphRes, chunkRes, coverageRes] = await Promise.allSettled([
      withTimeout(this.structured(question), this.timeoutMs, "graph retrieval"),
      withTimeout(this.opts.chunks.search(question, this.topK), this.timeoutMs, `${this.opts.chunks.name} retrieval`),
      withTimeout(this.opts.graph.coverage(), this.timeoutMs, "coverage"),
    ]);

    const graph = settle(graphRes, [], "graph retrieval");
    const chunks = settle(chunkRes, [], `${this.opts.chunks.name} retrieval`);
    if ("error" in graph || "error" in chunks) {
      const cause = "error" in graph ? graph.error : "error" in chunks ? chunks.error : undefined;
      const source = "error" in graph ? "graph store" : `${this.opts.chunks.name} store`;
      console.error(`Retrieval: ${source} query failed:`, toErrorMessage(cause));
      return failed(
        new EvidenceUnavailableError(`Could not query the ${source}: ${toErrorMessage(cause)}`, { cause, details: { source } })
      );
    }
    if (graph.timedOut && chunks.timedOut) {
      return failed(new EvidenceUnavailableError("Both evidence sources timed out", { details: { timeoutMs: this.timeoutMs } }));
    }

    let coverage: Coverage = { entities: [], periods: [] };
    if (coverageRes.status === "fulfilled") {
      coverage = coverageRes.value;
    } else {
      console.warn("Retrieval: coverage lookup failed:", toErrorMessage(coverageRes.reason));
    }

    const structured = graph.value;
    const unstructured = chunks.value;
    const hasStructured = structured.length > 0;
    const hasUnstructured = unstructured.length > 0;
    if (!hasStructured && !hasUnstructured) {
      return ok<EvidenceBundle>({ kind: "none", coverage, text: NO_RELEVANT_INFORMATION });
    }

    const text = formatEvidence(structured, unstructured);
    const periods = [...new Set([...coverage.periods, ...findPeriods(text)])];
    return ok<EvidenceBundle>({
      kind: "evidence",
      structured,
      unstructured,
      coverage: { entities: coverage.entities, periods },
      text,
    });
  }
}
