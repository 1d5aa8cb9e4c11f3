import { z } from "zod";

export type LlmProvider = "gemini" | "deepseek";

export type AppConfig = {
  neo4jUri: string;
  neo4jUsername: string;
  neo4jPassword: string;
  neo4jDatabase?: string;
  vectorStore: "neo4j" | "qdrant";
  qdrantUrl?: string;
  qdrantApiKey?: string;
  qdrantCollection: string;
  embeddingsModel: string;
  llmProvider: LlmProvider;
  llmModel: string;
  llmProviderChart?: LlmProvider;
  llmModelChart?: string;
  googleApiKey?: string;
  deepseekApiKey?: string;
  chartExtractor: "llm" | "heuristic";
  entityExtractor: "llm" | "keyword";
  retrievalTopK: number;
  retrievalTimeoutMs: number;
  llmTimeoutMs: number;
  port: number;
};

const providerSchema = z.enum(["gemini", "deepseek"]);

function pick<T extends string>(schema: z.ZodType<T>, name: string, raw: string | undefined, fallback: T): T {
  if (!raw) return fallback;
  const parsed = schema.safeParse(raw.trim().toLowerCase());
  if (!parsed.success) {
    throw new Error(`Invalid ${name}='${raw}'`);
  }
  return parsed.data;
}

function positiveInt(name: string, raw: string | undefined, fallback: number): number {
  if (!raw) return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n <= 0) {
    throw new Error(`Invalid ${name}='${raw}': expected a positive integer`);
  }
  return n;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const chartProviderRaw = env.LLM_PROVIDER_CHART;
  const cfg: AppConfig = {
    neo4jUri: env.NEO4J_URI || "",
    neo4jUsername: env.NEO4J_USERNAME || "",
    neo4jPassword: env.NEO4J_PASSWORD || "",
    neo4jDatabase: env.NEO4J_DATABASE || undefined,
    vectorStore: pick(z.enum(["neo4j", "qdrant"]), "VECTOR_STORE", env.VECTOR_STORE, "neo4j"),
    qdrantUrl: env.QDRANT_URL || undefined,
    qdrantApiKey: env.QDRANT_API_KEY || undefined,
    qdrantCollection: env.QDRANT_COLLECTION || "docs_text-embedding-004",
    embeddingsModel: env.EMBEDDINGS_MODEL || "text-embedding-004",
    llmProvider: pick(providerSchema, "LLM_PROVIDER", env.LLM_PROVIDER, "gemini"),
    llmModel: env.LLM_MODEL || "gemini-1.5-flash",
    llmProviderChart: chartProviderRaw ? pick(providerSchema, "LLM_PROVIDER_CHART", chartProviderRaw, "gemini") : undefined,
    llmModelChart: env.LLM_MODEL_CHART || undefined,
    googleApiKey: env.GOOGLE_API_KEY || undefined,
    deepseekApiKey: env.DEEPSEEK_API_KEY || undefined,
    chartExtractor: pick(z.enum(["llm", "heuristic"]), "CHART_EXTRACTOR", env.CHART_EXTRACTOR, "llm"),
    entityExtractor: pick(z.enum(["llm", "keyword"]), "ENTITY_EXTRACTOR", env.ENTITY_EXTRACTOR, "keyword"),
    retrievalTopK: positiveInt("RETRIEVAL_TOP_K", env.RETRIEVAL_TOP_K, 6),
    retrievalTimeoutMs: positiveInt("RETRIEVAL_TIMEOUT_MS", env.RETRIEVAL_TIMEOUT_MS, 15000),
    llmTimeoutMs: positiveInt("LLM_TIMEOUT_MS", env.LLM_TIMEOUT_MS, 60000),
    port: positiveInt("PORT", env.PORT, 8000),
  };

  if (!cfg.neo4jUri || !cfg.neo4jUsername || !cfg.neo4jPassword) {
    throw new Error("Neo4j credentials missing. Set NEO4J_URI, NEO4J_USERNAME and NEO4J_PASSWORD");
  }

  if (cfg.vectorStore === "qdrant" && (!cfg.qdrantUrl || !cfg.qdrantApiKey)) {
    throw new Error("Qdrant credentials missing. Set QDRANT_URL and QDRANT_API_KEY");
  }

  // Embeddings use Google only
  if (!cfg.googleApiKey) {
    throw new Error("GOOGLE_API_KEY required for embeddings");
  }

  if (cfg.llmProvider === "deepseek" && !cfg.deepseekApiKey) {
    throw new Error("DEEPSEEK_API_KEY required for DeepSeek LLM");
  }
  if (cfg.llmProviderChart === "deepseek" && !cfg.deepseekApiKey) {
    throw new Error("DEEPSEEK_API_KEY required for DeepSeek chart model");
  }

  return cfg;
}
