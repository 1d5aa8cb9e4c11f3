#!/usr/bin/env tsx
/*
 Import precomputed graph documents into Neo4j and build the retrieval indexes.
 Usage:
   npm run import-graph -- --file graph_documents.json [--batch 50]
 Env (see .env.example):
   NEO4J_URI, NEO4J_USERNAME, NEO4J_PASSWORD, NEO4J_DATABASE
   EMBEDDINGS_MODEL, GOOGLE_API_KEY
*/
import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";
import { loadConfig } from "../src/lib/config";
import { getEmbeddings } from "../src/lib/embeddings";
import { toErrorMessage } from "../src/lib/errors";
import { buildIndex, graphDocumentsSchema, loadGraph } from "../src/lib/graph-import";
import { openNeo4j } from "../src/lib/neo4j";

function parseArgs(argv: string[]): Record<string, string> {
  const out: Record<string, string> = {};
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (a.startsWith("--")) {
      out[a.slice(2)] = argv[i + 1] ?? "";
      i++;
    }
  }
  return out;
}

async function main() {
  dotenv.config({ path: path.resolve(process.cwd(), ".env.local") });
  dotenv.config();
  const cfg = loadConfig();

  const args = parseArgs(process.argv.slice(2));
  const file = path.resolve(process.cwd(), args.file || "graph_documents.json");
  const batch = Number(args.batch) || 50;

  console.log("\n[1/4] Connecting to Neo4j...");
  const cypher = openNeo4j(cfg);
  try {
    try {
      await cypher.verify();
      console.log("  Connected to Neo4j successfully");
    } catch (e) {
      throw new Error(
        `Could not connect to Neo4j at ${cfg.neo4jUri}: ${toErrorMessage(e)}. Check that the database is running and NEO4J_URI, NEO4J_USERNAME and NEO4J_PASSWORD are correct.`
      );
    }

    console.log(`\n[2/4] Loading graph documents from ${path.basename(file)}...`);
    if (!fs.existsSync(file)) {
      throw new Error(`Input file not found: ${file}`);
    }
    const parsed = graphDocumentsSchema.safeParse(JSON.parse(fs.readFileSync(file, "utf8")));
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new Error(`Invalid graph documents at ${issue?.path.join(".") || "<root>"}: ${issue?.message ?? "unknown"}`);
    }
    const docs = parsed.data;
    console.log(`  Loaded ${docs.length} graph document(s)`);

    console.log("\n[3/4] Importing graph documents into Neo4j...");
    const stats = await loadGraph(cypher, docs, { batch });
    console.log(`  Imported ${stats.documents} document(s), ${stats.nodes} node(s), ${stats.relationships} relationship(s)`);

    console.log("\n[4/4] Creating vector and full-text indexes...");
    const embeddings = getEmbeddings(cfg);
    const index = await buildIndex(cypher, embeddings, {
      sourceLabel: "Document",
      textProperty: "text",
      embeddingProperty: "embedding",
    });
    console.log(`  Embedded ${index.embedded} document(s), vector size ${index.dimension}`);
  } finally {
    await cypher.close();
  }
  console.log("\nImport complete. Start the server with: npm start\n");
}

main().catch((e) => {
  console.error("import-graph error:", toErrorMessage(e));
  process.exit(1);
});
