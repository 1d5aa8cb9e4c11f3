import { z } from "zod";
import { parseModelJson } from "./json";
import type { LanguageModel } from "./llm";
import { generateBounded } from "./llm";
import { findPeriods } from "./periods";

/** Picks the names in a question worth looking up in the graph. */
export interface EntityExtractor {
  extract(question: string): Promise<string[]>;
}

const STOPWORDS = new Set([
  "a", "an", "and", "are", "by", "can", "chart", "compare", "create", "did", "do", "does", "for", "from",
  "give", "graph", "how", "i", "in", "is", "me", "of", "on", "or", "over", "plot", "please", "show",
  "tell", "the", "to", "was", "what", "when", "which", "who", "why", "with",
]);

// Finance terms that open questions in title case but name no entity.
const GENERIC_TERMS = new Set([
  "capex", "capital", "cash", "earnings", "expenditure", "growth", "income", "margin", "profit", "revenue",
  "revenues", "sales", "trend", "trends",
]);

/**
 * Capitalised runs ("Greater China", "Apple Inc"), all-caps tickers and periods,
 * in order of appearance.
 */
export function keywordEntities(question: string): string[] {
  const out = new Set<string>();
  const cleaned = question.replace(/['’]s\b/g, "");
  for (const m of cleaned.matchAll(/\b[A-Z][A-Za-z0-9&.\-]*(?:\s+[A-Z][A-Za-z0-9&.\-]*)*/g)) {
    const words = m[0].split(/\s+/).filter((w) => {
      const lw = w.toLowerCase().replace(/\.$/, "");
      return !STOPWORDS.has(lw) && !GENERIC_TERMS.has(lw);
    });
    if (words.length > 0) out.add(words.join(" ").replace(/\.$/, ""));
  }
  for (const p of findPeriods(question)) out.add(p);
  return [...out];
}

/** Keyword entities; a question with none falls back to its content words. */
export class KeywordEntityExtractor implements EntityExtractor {
  async extract(question: string): Promise<string[]> {
    const names = keywordEntities(question);
    if (names.length > 0) return names;
    const words = question.toLowerCase().match(/[a-z][a-z0-9\-]{2,}/g) ?? [];
    return [...new Set(words.filter((w) => !STOPWORDS.has(w)))];
  }
}

const entityReplySchema = z.object({ names: z.array(z.string()) });

export class LlmEntityExtractor implements EntityExtractor {
  constructor(private readonly llm: LanguageModel, private readonly timeoutMs: number) {}

  async extract(question: string): Promise<string[]> {
    const prompt = `Extract the organization, person, product, region and period names that appear in the text.
Return ONLY a JSON object: {"names": string[]}.

Text: ${question}`;
    const raw = await generateBounded(this.llm, prompt, this.timeoutMs, { json: true, temperature: 0 });
    const parsed = parseModelJson(raw, entityReplySchema);
    if (!parsed.success) {
      console.warn("Entity extraction reply unusable, using keywords:", parsed.issues.join("; "));
      return new KeywordEntityExtractor().extract(question);
    }
    return [...new Set(parsed.data.names.map((n) => n.trim()).filter((n) => n.length > 0))];
  }
}
