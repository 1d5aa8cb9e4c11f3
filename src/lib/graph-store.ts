import { z } from "zod";
import type { CypherRunner } from "./neo4j";
import { fuzzyFullTextQuery } from "./neo4j";
import { isPeriodLabel, normalizePeriod } from "./periods";
import type { Coverage } from "./types";

/** Structured evidence: facts around the entities a question names. */
export interface GraphStore {
  neighbourhood(entities: string[]): Promise<string[]>;
  coverage(): Promise<Coverage>;
}

export const ENTITY_INDEX = "entity";
const NEIGHBOURHOOD_LIMIT = 50;
const COVERAGE_LIMIT = 25;

const NEIGHBOURHOOD_QUERY = `
CALL db.index.fulltext.queryNodes($index, $query, {limit: 2})
YIELD node, score
CALL {
  WITH node
  MATCH (node)-[r:!MENTIONS]->(neighbor)
  RETURN node.id + ' - ' + type(r) + ' -> ' + neighbor.id AS output
  UNION ALL
  WITH node
  MATCH (node)<-[r:!MENTIONS]-(neighbor)
  RETURN neighbor.id + ' - ' + type(r) + ' -> ' + node.id AS output
}
RETURN output LIMIT toInteger($limit)`;

const COVERAGE_QUERY = `
MATCH (e:__Entity__)
WITH e, COUNT { (e)--() } AS degree
ORDER BY (e:Organization OR e:Company) DESC, degree DESC
LIMIT toInteger($limit)
RETURN e.id AS id`;

const PERIOD_QUERY = `
MATCH (e:__Entity__)
WHERE e.id =~ $pattern
RETURN DISTINCT e.id AS id
LIMIT toInteger($limit)`;

const PERIOD_PATTERN = String.raw`(?i)^(Q[1-4]\s*)?(FY\s?)?(19|20)?\d{2}$`;

const outputRow = z.object({ output: z.string() });
const idRow = z.object({ id: z.coerce.string() });

export class Neo4jGraphStore implements GraphStore {
  constructor(private readonly cypher: CypherRunner) {}

  async neighbourhood(entities: string[]): Promise<string[]> {
    const lines: string[] = [];
    const seen = new Set<string>();
    for (const entity of entities) {
      const query = fuzzyFullTextQuery(entity);
      if (!query) continue;
      const rows = await this.cypher.read(NEIGHBOURHOOD_QUERY, {
        index: ENTITY_INDEX,
        query,
        limit: NEIGHBOURHOOD_LIMIT,
      });
      for (const row of rows) {
        const parsed = outputRow.safeParse(row);
        if (!parsed.success || seen.has(parsed.data.output)) continue;
        seen.add(parsed.data.output);
        lines.push(parsed.data.output);
      }
    }
    return lines;
  }

  async coverage(): Promise<Coverage> {
    const [entityRows, periodRows] = await Promise.all([
      this.cypher.read(COVERAGE_QUERY, { limit: COVERAGE_LIMIT }),
      this.cypher.read(PERIOD_QUERY, { pattern: PERIOD_PATTERN, limit: COVERAGE_LIMIT }),
    ]);
    const ids = (rows: typeof entityRows) =>
      rows.flatMap((r) => {
        const parsed = idRow.safeParse(r);
        return parsed.success ? [parsed.data.id] : [];
      });
    const periods = ids(periodRows)
      .filter(isPeriodLabel)
      .map(normalizePeriod)
      .sort();
    return {
      entities: ids(entityRows).filter((id) => !isPeriodLabel(id)),
      periods: [...new Set(periods)],
    };
  }
}
