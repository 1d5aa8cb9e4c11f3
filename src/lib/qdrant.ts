import { QdrantClient } from "@qdrant/js-client-rest";
import type { AppConfig } from "./config";
import type { ChunkStore } from "./chunk-store";
import { toChunks } from "./chunk-store";
import type { Embeddings } from "./embeddings";
import type { Chunk } from "./types";

export function getQdrantClient(cfg: Pick<AppConfig, "qdrantUrl" | "qdrantApiKey">) {
  return new QdrantClient({
    url: cfg.qdrantUrl,
    apiKey: cfg.qdrantApiKey,
    // Avoid version fetch on startup which can fail on some networks
    checkCompatibility: false,
    timeout: 30000,
  });
}

export type QdrantPoint = {
  id: string | number;
  score: number;
  payload?: Record<string, unknown> | null;
};

/** The two client calls the store makes; QdrantClient satisfies it structurally. */
export interface QdrantSearchClient {
  search(
    collection: string,
    request: { vector: number[]; limit: number; with_payload: boolean; score_threshold: number }
  ): Promise<QdrantPoint[]>;
  getCollection(collection: string): Promise<unknown>;
}

export class QdrantChunkStore implements ChunkStore {
  readonly name = "qdrant";

  constructor(
    private readonly client: QdrantSearchClient,
    private readonly collection: string,
    private readonly embeddings: Embeddings,
    private readonly scoreThreshold = 0.2
  ) {}

  async search(question: string, k: number): Promise<Chunk[]> {
    const qvec = await this.embeddings.embedQuery(question);
    const points = await this.client.search(this.collection, {
      vector: qvec,
      limit: k,
      with_payload: true,
      score_threshold: this.scoreThreshold,
    });
    return toChunks(
      points.map((p) => ({
        ...(p.payload ?? {}),
        id: String(p.id),
        score: p.score,
        source: p.payload?.path ?? p.payload?.source,
      }))
    );
  }

  async verify(): Promise<void> {
    await this.client.getCollection(this.collection);
  }
}
