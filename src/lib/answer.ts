import { keywordEntities } from "./entities";
import { GenerationError, toErrorMessage } from "./errors";
import type { LanguageModel } from "./llm";
import { generateBounded } from "./llm";
import { hasMissingDataMarker, isDeflection } from "./missing-data";
import { findPeriods, isPeriodLabel } from "./periods";
import type { ChatTurn, Coverage, EvidenceBundle, StageResult } from "./types";
import { failed, ok } from "./types";

export function joinList(items: string[]): string {
  if (items.length <= 1) return items.join("");
  return `${items.slice(0, -1).join(", ")} and ${items[items.length - 1]}`;
}

function formatHistory(history: readonly ChatTurn[]): string {
  return history.map((t) => `User: ${t.question}\nAssistant: ${t.answer}`).join("\n");
}

function formatCoverage(coverage: Coverage): string {
  const parts: string[] = [];
  if (coverage.entities.length > 0) parts.push(`entities: ${coverage.entities.join(", ")}`);
  if (coverage.periods.length > 0) parts.push(`periods: ${coverage.periods.join(", ")}`);
  return parts.length > 0 ? parts.join("; ") : "unknown";
}

export function buildAnswerPrompt(question: string, evidence: EvidenceBundle, history: readonly ChatTurn[]): string {
  const context =
    evidence.kind === "none"
      ? `${evidence.text}. No documents or graph facts matched this question.`
      : evidence.text;
  const conversation = history.length > 0 ? `\nConversation so far:\n${formatHistory(history)}\n` : "";

  return `You are a helpful financial research assistant. Answer the user's question using ONLY the information in the context below.
Strict rules:
- Do NOT guess. Keep numbers, periods and units exactly as shown in the context.
- Never answer with a generic deflection such as "refer to the source documents".
- If the context does not contain what the question asks for, state explicitly that the information is not available, name exactly what is missing (the period, company or metric), and suggest related information that IS available.
- When reporting figures for several periods or categories, put each one on its own line, e.g. "- 2023: $383.3 billion".
- Be concise and end with citations like [S1], [S2] when documents were used.

Data held by the knowledge base: ${formatCoverage(evidence.coverage)}
${conversation}
Question: ${question}

Context:
${context}`;
}

function covered(requested: string, available: string[]): boolean {
  const r = requested.toLowerCase();
  return available.some((a) => {
    const x = a.toLowerCase();
    return x.includes(r) || r.includes(x);
  });
}

/**
 * Explanation used when the model deflects or, for the sentinel, fails to say what
 * is missing: names the periods and entities the question asks for that the store
 * lacks, and what it does hold.
 */
export function composeUnavailableAnswer(question: string, coverage: Coverage): string {
  const requestedPeriods = findPeriods(question);
  const requestedEntities = keywordEntities(question).filter((n) => !isPeriodLabel(n));
  const missingPeriods = requestedPeriods.filter((p) => !covered(p, coverage.periods));
  const missingEntities = requestedEntities.filter((e) => !covered(e, coverage.entities));

  const lines = [`The information needed to answer "${question.trim()}" is not available in the indexed documents.`];
  if (missingEntities.length > 0) {
    lines.push(
      coverage.entities.length > 0
        ? `No data about ${joinList(missingEntities)} was found; the documents cover ${joinList(coverage.entities.slice(0, 5))}.`
        : `No data about ${joinList(missingEntities)} was found.`
    );
  }
  if (missingPeriods.length > 0) {
    lines.push(
      coverage.periods.length > 0
        ? `Figures for ${joinList(missingPeriods)} are not available; the available data covers ${joinList(coverage.periods)}.`
        : `Figures for ${joinList(missingPeriods)} are not available.`
    );
  }
  if (missingEntities.length === 0 && missingPeriods.length === 0) {
    const available = [...coverage.entities.slice(0, 5), ...coverage.periods];
    if (available.length > 0) lines.push(`Available information relates to ${joinList(available)}.`);
  }
  return lines.join(" ");
}

export type AnswerGeneratorOptions = {
  llm: LanguageModel;
  timeoutMs?: number;
};

export class AnswerGenerator {
  private readonly timeoutMs: number;

  constructor(private readonly opts: AnswerGeneratorOptions) {
    this.timeoutMs = opts.timeoutMs ?? 60000;
  }

  async answer(question: string, evidence: EvidenceBundle, history: readonly ChatTurn[] = []): Promise<StageResult<string>> {
    const prompt = buildAnswerPrompt(question, evidence, history);
    let text: string;
    try {
      text = (await generateBounded(this.opts.llm, prompt, this.timeoutMs)).trim();
    } catch (e) {
      console.error("Answer generation failed:", toErrorMessage(e));
      return failed(e instanceof GenerationError ? e : new GenerationError(toErrorMessage(e), { cause: e }));
    }

    if (isDeflection(text) || (evidence.kind === "none" && !hasMissingDataMarker(text))) {
      console.warn("Answer: model reply did not explain the missing data, composing one");
      return ok(composeUnavailableAnswer(question, evidence.coverage));
    }
    return ok(text);
  }
}
