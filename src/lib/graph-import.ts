import crypto from "node:crypto";
import { z } from "zod";
import { KEYWORD_INDEX, VECTOR_INDEX } from "./chunk-store";
import type { Embeddings } from "./embeddings";
import { ENTITY_INDEX } from "./graph-store";
import type { CypherRunner } from "./neo4j";
import { quoteIdentifier } from "./neo4j";

const scalar = z.union([z.string(), z.number(), z.boolean()]);
const propertyValue = z.union([scalar, z.array(scalar)]);
const properties = z.record(propertyValue).default({});

const nodeRef = z.object({
  id: z.coerce.string(),
  type: z.string().default("Entity"),
});

const graphNodeSchema = nodeRef.extend({ properties });

const graphRelationshipSchema = z.object({
  source: nodeRef,
  target: nodeRef,
  type: z.string(),
  properties,
});

/** One source document and the entities and relationships extracted from it. */
export const graphDocumentSchema = z.object({
  nodes: z.array(graphNodeSchema).default([]),
  relationships: z.array(graphRelationshipSchema).default([]),
  source: z.object({
    page_content: z.string(),
    metadata: z.record(z.unknown()).default({}),
  }),
});

export const graphDocumentsSchema = z.array(graphDocumentSchema);

export type GraphDocument = z.infer<typeof graphDocumentSchema>;
type PropertyValue = z.infer<typeof propertyValue>;

export type GraphImportStats = {
  documents: number;
  nodes: number;
  relationships: number;
};

export type BuildIndexOptions = {
  sourceLabel?: string;
  textProperty?: string;
  embeddingProperty?: string;
  batch?: number;
};

export type BuildIndexStats = {
  embedded: number;
  dimension: number;
};

export function documentId(text: string): string {
  return crypto.createHash("md5").update(text).digest("hex");
}

function batches<T>(rows: T[], size: number): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < rows.length; i += size) out.push(rows.slice(i, i + size));
  return out;
}

function groupBy<T>(rows: T[], key: (row: T) => string): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const row of rows) {
    const k = key(row);
    const group = groups.get(k);
    if (group) group.push(row);
    else groups.set(k, [row]);
  }
  return groups;
}

// Neo4j only stores primitives and arrays of them; anything else in the metadata is dropped.
function storableMetadata(metadata: Record<string, unknown>): Record<string, PropertyValue> {
  const out: Record<string, PropertyValue> = {};
  for (const [k, v] of Object.entries(metadata)) {
    const parsed = propertyValue.safeParse(v);
    if (parsed.success) out[k] = parsed.data;
  }
  return out;
}

const DOCUMENT_QUERY = `
UNWIND $rows AS row
MERGE (d:Document {id: row.id})
SET d += row.metadata, d.text = row.text`;

const nodeQuery = (label: string) => `
UNWIND $rows AS row
MERGE (e:__Entity__ {id: row.id})
SET e:${label}, e += row.properties
WITH e, row
MATCH (d:Document {id: row.doc})
MERGE (d)-[:MENTIONS]->(e)`;

const relationshipQuery = (type: string) => `
UNWIND $rows AS row
MATCH (s:__Entity__ {id: row.source})
MATCH (t:__Entity__ {id: row.target})
MERGE (s)-[r:${type}]->(t)
SET r += row.properties`;

type NodeRow = { id: string; type: string; doc: string; properties: Record<string, PropertyValue> };
type RelationshipRow = { source: string; target: string; type: string; properties: Record<string, PropertyValue> };

/**
 * Writes graph documents: a Document node per source, an __Entity__ node per graph
 * node labelled with its type, MENTIONS edges and the typed relationships. Running
 * it twice over the same data is not guaranteed to leave the graph unchanged.
 */
export async function loadGraph(
  cypher: Pick<CypherRunner, "write">,
  docs: GraphDocument[],
  opts: { batch?: number } = {}
): Promise<GraphImportStats> {
  const size = Math.max(1, opts.batch ?? 50);
  const documents: { id: string; text: string; metadata: Record<string, PropertyValue> }[] = [];
  const nodes: NodeRow[] = [];
  const relationships: RelationshipRow[] = [];

  for (const doc of docs) {
    const id = documentId(doc.source.page_content);
    documents.push({ id, text: doc.source.page_content, metadata: storableMetadata(doc.source.metadata) });

    const seen = new Map<string, NodeRow>();
    for (const n of doc.nodes) {
      seen.set(n.id, { id: n.id, type: n.type, doc: id, properties: n.properties });
    }
    // Relationship endpoints missing from the node list still need a node to attach to.
    for (const r of doc.relationships) {
      for (const end of [r.source, r.target]) {
        if (!seen.has(end.id)) seen.set(end.id, { id: end.id, type: end.type, doc: id, properties: {} });
      }
      relationships.push({ source: r.source.id, target: r.target.id, type: r.type, properties: r.properties });
    }
    nodes.push(...seen.values());
  }

  for (const rows of batches(documents, size)) {
    await cypher.write(DOCUMENT_QUERY, { rows });
  }
  for (const [label, group] of groupBy(nodes, (n) => quoteIdentifier(n.type, "Entity"))) {
    for (const rows of batches(group, size)) {
      await cypher.write(nodeQuery(label), { rows });
    }
  }
  for (const [type, group] of groupBy(relationships, (r) => quoteIdentifier(r.type.toUpperCase(), "RELATED_TO"))) {
    for (const rows of batches(group, size)) {
      await cypher.write(relationshipQuery(type), { rows });
    }
  }

  return { documents: documents.length, nodes: nodes.length, relationships: relationships.length };
}

const pendingRow = z.object({ id: z.string(), text: z.string() });

/**
 * Embeds every `sourceLabel` node that has text but no embedding, then creates the
 * vector index and the keyword/entity full-text indexes the retriever queries.
 */
export async function buildIndex(
  cypher: Pick<CypherRunner, "read" | "write">,
  embeddings: Embeddings,
  opts: BuildIndexOptions = {}
): Promise<BuildIndexStats> {
  const label = quoteIdentifier(opts.sourceLabel ?? "Document", "Document");
  const textProp = quoteIdentifier(opts.textProperty ?? "text", "text");
  const embeddingProp = quoteIdentifier(opts.embeddingProperty ?? "embedding", "embedding");
  const size = Math.max(1, opts.batch ?? 32);

  const pendingQuery = `
MATCH (n:${label})
WHERE n.${embeddingProp} IS NULL AND n.${textProp} IS :: STRING NOT NULL AND n.${textProp} <> ''
RETURN elementId(n) AS id, n.${textProp} AS text
LIMIT toInteger($limit)`;
  const storeQuery = `
UNWIND $rows AS row
MATCH (n) WHERE elementId(n) = row.id
SET n.${embeddingProp} = row.embedding`;

  let embedded = 0;
  let dimension = 0;
  for (;;) {
    const raw = await cypher.read(pendingQuery, { limit: size });
    const rows = raw.flatMap((r) => {
      const parsed = pendingRow.safeParse(r);
      return parsed.success ? [parsed.data] : [];
    });
    if (rows.length < raw.length) {
      console.warn(`Skipped ${raw.length - rows.length} pending node(s) without a string id and text`);
    }
    // Unparseable rows stay pending; stop rather than fetch the same batch again.
    if (rows.length === 0) break;
    const vectors = await embeddings.embedDocuments(rows.map((r) => r.text));
    if (vectors.length !== rows.length) {
      throw new Error(`Embedding model returned ${vectors.length} vectors for ${rows.length} texts`);
    }
    dimension = dimension || vectors[0].length;
    await cypher.write(storeQuery, { rows: rows.map((r, i) => ({ id: r.id, embedding: vectors[i] })) });
    embedded += rows.length;
    console.info(`  Embedded ${embedded} node(s) so far`);
  }

  // Determine vector size by probing one embedding when nothing needed embedding.
  if (!dimension) dimension = (await embeddings.embedQuery("dimension probe")).length;
  if (!Number.isInteger(dimension) || dimension <= 0) {
    throw new Error(`Invalid embedding dimension ${dimension}`);
  }

  await cypher.write(
    `CREATE VECTOR INDEX ${VECTOR_INDEX} IF NOT EXISTS FOR (n:${label}) ON (n.${embeddingProp})
OPTIONS {indexConfig: {\`vector.dimensions\`: ${dimension}, \`vector.similarity_function\`: 'cosine'}}`
  );
  await cypher.write(`CREATE FULLTEXT INDEX ${KEYWORD_INDEX} IF NOT EXISTS FOR (n:${label}) ON EACH [n.${textProp}]`);
  await cypher.write(`CREATE FULLTEXT INDEX ${ENTITY_INDEX} IF NOT EXISTS FOR (e:__Entity__) ON EACH [e.id]`);

  return { embedded, dimension };
}
