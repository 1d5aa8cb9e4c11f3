import type { EmbeddingsInterface as Embeddings } from "@langchain/core/embeddings";
import { GoogleGenerativeAIEmbeddings } from "@langchain/google-genai";
import type { AppConfig } from "./config";

export type { Embeddings };

/**
 * Question embeddings at search time and node embeddings in `buildIndex` come from
 * here; both sides must use one model or the vector index dimension will not match.
 */
export function getEmbeddings(cfg: Pick<AppConfig, "embeddingsModel" | "googleApiKey">): Embeddings {
  if (!cfg.googleApiKey) throw new Error("GOOGLE_API_KEY required for embeddings");
  return new GoogleGenerativeAIEmbeddings({ apiKey: cfg.googleApiKey, model: cfg.embeddingsModel });
}
