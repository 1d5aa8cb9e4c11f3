import { z } from "zod";
import type { Embeddings } from "./embeddings";
import type { CypherRunner } from "./neo4j";
import { escapeLucene } from "./neo4j";
import type { Chunk } from "./types";

/** Unstructured evidence: document chunks ranked against the question. */
export interface ChunkStore {
  readonly name: string;
  search(question: string, k: number): Promise<Chunk[]>;
  verify(): Promise<void>;
}

export const VECTOR_INDEX = "vector";
export const KEYWORD_INDEX = "keyword";

// Vector and keyword hits are each normalised by their best score, then merged per node.
const HYBRID_QUERY = `
CALL {
  CALL db.index.vector.queryNodes($vectorIndex, toInteger($k), $embedding)
  YIELD node, score
  WITH collect({node: node, score: score}) AS hits, max(score) AS top
  UNWIND hits AS hit
  RETURN hit.node AS node, hit.score / top AS score
  UNION
  CALL db.index.fulltext.queryNodes($keywordIndex, $query, {limit: toInteger($k)})
  YIELD node, score
  WITH collect({node: node, score: score}) AS hits, max(score) AS top
  UNWIND hits AS hit
  RETURN hit.node AS node, hit.score / top AS score
}
WITH node, max(score) AS score
ORDER BY score DESC
LIMIT toInteger($k)
RETURN node.text AS text, score, node.id AS id, node.source AS source, node.title AS title,
       node.company AS company, node.doc_type AS doc_type, node.published_date AS published_date`;

const VECTOR_ONLY_QUERY = `
CALL db.index.vector.queryNodes($vectorIndex, toInteger($k), $embedding)
YIELD node, score
RETURN node.text AS text, score, node.id AS id, node.source AS source, node.title AS title,
       node.company AS company, node.doc_type AS doc_type, node.published_date AS published_date`;

const optionalText = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((v) => (v === null || v === undefined ? undefined : String(v)));

export const chunkRowSchema = z.object({
  text: z.string().nullish().transform((v) => v ?? ""),
  score: z.number(),
  id: optionalText,
  source: optionalText,
  title: optionalText,
  company: optionalText,
  doc_type: optionalText,
  published_date: optionalText,
});

export function toChunks(rows: unknown[]): Chunk[] {
  const chunks: Chunk[] = [];
  for (const row of rows) {
    const parsed = chunkRowSchema.safeParse(row);
    if (parsed.success && parsed.data.text.trim()) chunks.push(parsed.data);
  }
  return chunks;
}

export class Neo4jChunkStore implements ChunkStore {
  readonly name = "neo4j";

  constructor(
    private readonly cypher: CypherRunner,
    private readonly embeddings: Embeddings
  ) {}

  async search(question: string, k: number): Promise<Chunk[]> {
    const embedding = await this.embeddings.embedQuery(question);
    const query = escapeLucene(question);
    const params = { vectorIndex: VECTOR_INDEX, keywordIndex: KEYWORD_INDEX, k, embedding, query };
    // An all-punctuation question leaves nothing for the keyword index to match.
    const rows = await this.cypher.read(query ? HYBRID_QUERY : VECTOR_ONLY_QUERY, params);
    return toChunks(rows);
  }

  async verify(): Promise<void> {
    await this.cypher.verify();
  }
}
