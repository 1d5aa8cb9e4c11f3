import { AnswerGenerator } from "./answer";
import type { ChartExtractor } from "./chart-extract";
import { FallbackChartExtractor, HeuristicChartExtractor, LlmChartExtractor } from "./chart-extract";
import type { ChunkStore } from "./chunk-store";
import { Neo4jChunkStore } from "./chunk-store";
import type { AppConfig } from "./config";
import { getEmbeddings } from "./embeddings";
import type { EntityExtractor } from "./entities";
import { KeywordEntityExtractor, LlmEntityExtractor } from "./entities";
import { toErrorMessage } from "./errors";
import { Neo4jGraphStore } from "./graph-store";
import { createAnswerModel, createChartModel } from "./llm";
import type { CypherRunner } from "./neo4j";
import { openNeo4j } from "./neo4j";
import { QdrantChunkStore, getQdrantClient } from "./qdrant";
import { RagPipeline } from "./rag";
import { HybridRetriever } from "./retriever";

export type HealthReport = {
  status: "ok" | "degraded";
  graph: "ok" | string;
  chunks: "ok" | string;
};

export type Services = {
  pipeline: RagPipeline;
  health(): Promise<HealthReport>;
  close(): Promise<void>;
};

async function probe(check: () => Promise<void>): Promise<string> {
  try {
    await check();
    return "ok";
  } catch (e) {
    return toErrorMessage(e);
  }
}

export async function checkHealth(cypher: Pick<CypherRunner, "verify">, chunks: Pick<ChunkStore, "verify">): Promise<HealthReport> {
  const [graph, chunkStatus] = await Promise.all([probe(() => cypher.verify()), probe(() => chunks.verify())]);
  const status = graph === "ok" && chunkStatus === "ok" ? "ok" : "degraded";
  if (status === "degraded") console.warn("Health check degraded:", { graph, chunks: chunkStatus });
  return { status, graph, chunks: chunkStatus };
}

/** Builds every client once; callers own the returned `close`. */
export function createServices(cfg: AppConfig): Services {
  const cypher = openNeo4j(cfg);
  const embeddings = getEmbeddings(cfg);

  const chunks: ChunkStore =
    cfg.vectorStore === "qdrant"
      ? new QdrantChunkStore(getQdrantClient(cfg), cfg.qdrantCollection, embeddings)
      : new Neo4jChunkStore(cypher, embeddings);

  const answerModel = createAnswerModel(cfg);
  const entities: EntityExtractor =
    cfg.entityExtractor === "llm" ? new LlmEntityExtractor(answerModel, cfg.llmTimeoutMs) : new KeywordEntityExtractor();

  const heuristic = new HeuristicChartExtractor();
  const extractor: ChartExtractor =
    cfg.chartExtractor === "llm"
      ? new FallbackChartExtractor(new LlmChartExtractor(createChartModel(cfg), cfg.llmTimeoutMs), heuristic)
      : heuristic;

  const retriever = new HybridRetriever({
    graph: new Neo4jGraphStore(cypher),
    chunks,
    entities,
    topK: cfg.retrievalTopK,
    timeoutMs: cfg.retrievalTimeoutMs,
  });
  const answerer = new AnswerGenerator({ llm: answerModel, timeoutMs: cfg.llmTimeoutMs });

  console.info(
    `Services: vector store '${chunks.name}', chart extractor '${extractor.name}', entity extractor '${cfg.entityExtractor}'`
  );

  return {
    pipeline: new RagPipeline({ retriever, answerer, extractor }),
    health: () => checkHealth(cypher, chunks),
    close: () => cypher.close(),
  };
}
