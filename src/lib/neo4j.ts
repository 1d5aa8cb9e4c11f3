import neo4j, { type Driver, type Record as Neo4jRecord } from "neo4j-driver";
import type { AppConfig } from "./config";

export type Row = Record<string, unknown>;
export type Params = Record<string, unknown>;

/** The slice of a graph database the stores need; lets tests run against an in-process fake. */
export interface CypherRunner {
  read(cypher: string, params?: Params): Promise<Row[]>;
  write(cypher: string, params?: Params): Promise<Row[]>;
  verify(): Promise<void>;
  close(): Promise<void>;
}

function toPlain(value: unknown): unknown {
  if (neo4j.isInt(value)) return value.toNumber();
  if (Array.isArray(value)) return value.map(toPlain);
  if (value && typeof value === "object" && value.constructor === Object) {
    return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, toPlain(v)]));
  }
  return value;
}

function toRow(record: Neo4jRecord): Row {
  return Object.fromEntries(record.keys.map((k) => [String(k), toPlain(record.get(k))]));
}

export class Neo4jCypherRunner implements CypherRunner {
  constructor(private readonly driver: Driver, private readonly database?: string) {}

  async read(cypher: string, params: Params = {}): Promise<Row[]> {
    const session = this.driver.session({ database: this.database, defaultAccessMode: neo4j.session.READ });
    try {
      const res = await session.executeRead((tx) => tx.run(cypher, params));
      return res.records.map(toRow);
    } finally {
      await session.close();
    }
  }

  async write(cypher: string, params: Params = {}): Promise<Row[]> {
    const session = this.driver.session({ database: this.database, defaultAccessMode: neo4j.session.WRITE });
    try {
      const res = await session.executeWrite((tx) => tx.run(cypher, params));
      return res.records.map(toRow);
    } finally {
      await session.close();
    }
  }

  async verify(): Promise<void> {
    await this.driver.verifyConnectivity({ database: this.database });
  }

  async close(): Promise<void> {
    await this.driver.close();
  }
}

export function openNeo4j(cfg: Pick<AppConfig, "neo4jUri" | "neo4jUsername" | "neo4jPassword" | "neo4jDatabase">): CypherRunner {
  const driver = neo4j.driver(cfg.neo4jUri, neo4j.auth.basic(cfg.neo4jUsername, cfg.neo4jPassword), {
    // The driver pools connections; one instance serves concurrent requests.
    maxConnectionPoolSize: 50,
    connectionAcquisitionTimeout: 30000,
  });
  return new Neo4jCypherRunner(driver, cfg.neo4jDatabase);
}

/** Back-quotes a label or relationship type after dropping characters Cypher would reject. */
export function quoteIdentifier(raw: string, fallback: string): string {
  const cleaned = raw.replace(/[^A-Za-z0-9_]/g, "_").replace(/^_+|_+$/g, "");
  return "`" + (cleaned || fallback) + "`";
}

/** Lucene-escapes a term for db.index.fulltext.queryNodes. */
export function escapeLucene(term: string): string {
  return term.replace(/[+\-&|!(){}[\]^"~*?:\\/]/g, " ").replace(/\s+/g, " ").trim();
}

/** Fuzzy AND query over the words of `input`, e.g. "apple inc" -> "apple~2 AND inc~2". */
export function fuzzyFullTextQuery(input: string): string {
  const words = escapeLucene(input)
    .split(" ")
    .filter((w) => w.length > 0);
  return words.map((w) => `${w}~2`).join(" AND ");
}
