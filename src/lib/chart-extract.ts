import { ExtractionError, toErrorMessage } from "./errors";
import { parseModelJson } from "./json";
import type { LanguageModel } from "./llm";
import { generateBounded } from "./llm";
import { hasMissingDataMarker, missingDataSentence } from "./missing-data";
import { isPeriodLabel, normalizePeriod, periodRegex } from "./periods";
import type { ChartDescriptor, ChartType } from "./types";
import { chartDescriptorSchema } from "./types";

/** Turns an answer into a chart descriptor. Implementations throw ExtractionError. */
export interface ChartExtractor {
  readonly name: string;
  extract(answerText: string): Promise<ChartDescriptor>;
}

export const NO_SERIES_MESSAGE = "The answer does not contain at least two labelled numeric values to plot.";

type Pair = { label: string; value: number; unit?: string; currency?: string };
type NumberHit = { value: number; unit?: string; currency?: string; preferred: boolean };

// 1,234.56 | $12.3 billion | 45 Cr | 12.3%
const NUM_RE =
  /(?<![A-Za-z0-9.,])([$€£₹])?\s?([+-]?(?:\d{1,3}(?:,\d{3})+|\d+)(?:\.\d+)?)\s*(%|(?:percent|trillion|billion|million|thousand|crore|bn|mn|cr|tn|b|m|k)\b)?/gi;

const SCALE: Record<string, { name: string; factor: number }> = {
  trillion: { name: "trillion", factor: 1e12 },
  tn: { name: "trillion", factor: 1e12 },
  billion: { name: "billion", factor: 1e9 },
  bn: { name: "billion", factor: 1e9 },
  b: { name: "billion", factor: 1e9 },
  million: { name: "million", factor: 1e6 },
  mn: { name: "million", factor: 1e6 },
  m: { name: "million", factor: 1e6 },
  thousand: { name: "thousand", factor: 1e3 },
  k: { name: "thousand", factor: 1e3 },
  crore: { name: "crore", factor: 1e7 },
  cr: { name: "crore", factor: 1e7 },
};

const PROPORTION_RE = /\b(?:share|shares|proportion|breakdown|composition|distribution|mix|split|percent of|% of)\b/i;

const METRICS: Array<[RegExp, string]> = [
  [/\bnet sales\b/i, "Net Sales"],
  [/\brevenues?\b/i, "Revenue"],
  [/\bnet income\b/i, "Net Income"],
  [/\boperating income\b/i, "Operating Income"],
  [/\bgross margin\b/i, "Gross Margin"],
  [/\bcapital expenditures?\b|\bcapex\b/i, "Capital Expenditure"],
  [/\bearnings per share\b|\beps\b/i, "Earnings per Share"],
  [/\bfree cash flow\b/i, "Free Cash Flow"],
  [/\boperating expenses\b/i, "Operating Expenses"],
  [/\bresearch and development\b|\br&d\b/i, "R&D"],
  [/\bcash\b/i, "Cash"],
];

function unitOf(raw: string | undefined): string | undefined {
  if (!raw) return undefined;
  const u = raw.toLowerCase();
  if (u === "%" || u === "percent") return "%";
  return SCALE[u]?.name;
}

function numbersIn(text: string): NumberHit[] {
  const hits: NumberHit[] = [];
  for (const m of text.matchAll(NUM_RE)) {
    const [, currency, raw, unitRaw] = m;
    const unit = unitOf(unitRaw);
    // a bare year inside the window is a label, not a value
    if (!currency && !unit && isPeriodLabel(raw)) continue;
    const value = Number(raw.replace(/,/g, ""));
    if (!Number.isFinite(value)) continue;
    hits.push({ value, unit, currency, preferred: Boolean(currency) || (unit !== undefined && unit !== "%") });
  }
  return hits;
}

function pickNumber(text: string, which: "first" | "last"): NumberHit | undefined {
  const hits = numbersIn(text);
  const preferred = hits.filter((h) => h.preferred);
  const pool = preferred.length > 0 ? preferred : hits;
  return which === "first" ? pool[0] : pool[pool.length - 1];
}

function dedupe(pairs: Pair[]): Pair[] {
  const seen = new Set<string>();
  return pairs.filter((p) => (seen.has(p.label) ? false : (seen.add(p.label), true)));
}

/** Period label -> value pairs; the number may follow the label or precede it. */
export function periodPairs(text: string): Pair[] {
  const matches = [...text.matchAll(periodRegex())];
  if (matches.length === 0) return [];
  const gaps: string[] = [];
  let prev = 0;
  for (const m of matches) {
    const start = m.index ?? prev;
    gaps.push(text.slice(prev, start));
    prev = start + m[0].length;
  }
  gaps.push(text.slice(prev));

  const collect = (orientation: "after" | "before"): Pair[] => {
    const pairs: Pair[] = [];
    matches.forEach((m, i) => {
      const hit =
        orientation === "after"
          ? pickNumber(gaps[i + 1].split("\n")[0], "first")
          : pickNumber(gaps[i].split("\n").pop() ?? "", "last");
      if (hit) pairs.push({ label: normalizePeriod(m[0]), value: hit.value, unit: hit.unit, currency: hit.currency });
    });
    return dedupe(pairs);
  };

  const after = collect("after");
  const before = collect("before");
  return before.length > after.length ? before : after;
}

const CATEGORY_LINE_RE = /^\s*(?:[-*•]\s+|\d+[.)]\s+)?(?:\*\*)?([A-Za-z][^:*\n]{0,48}?)(?:\*\*)?\s*:\s*(.+)$/;

/** "- Americas: $167.0 billion" style lines. */
export function categoryPairs(text: string): Pair[] {
  const pairs: Pair[] = [];
  for (const line of text.split("\n")) {
    const m = CATEGORY_LINE_RE.exec(line);
    if (!m) continue;
    const label = m[1].trim();
    if (/^total\b/i.test(label)) continue;
    const hit = pickNumber(m[2], "first");
    if (hit) pairs.push({ label, value: hit.value, unit: hit.unit, currency: hit.currency });
  }
  return dedupe(pairs);
}

function dominant(values: Array<string | undefined>): string | undefined {
  const counts = new Map<string, number>();
  for (const v of values) if (v) counts.set(v, (counts.get(v) ?? 0) + 1);
  let best: string | undefined;
  let bestCount = 0;
  for (const [k, n] of counts) {
    if (n > bestCount) {
      best = k;
      bestCount = n;
    }
  }
  return best;
}

function scaleFactor(unit: string | undefined): number | undefined {
  if (!unit || unit === "%") return undefined;
  return Object.values(SCALE).find((s) => s.name === unit)?.factor;
}

export function chooseChartType(text: string, pairs: Pair[], unit: string | undefined): ChartType {
  if (pairs.every((p) => isPeriodLabel(p.label))) return "line";
  const allPercent = unit === "%" && pairs.every((p) => p.unit === "%");
  const total = pairs.reduce((a, p) => a + p.value, 0);
  const wholeInPercent = allPercent && Math.abs(total - 100) <= 1;
  const nonNegative = pairs.every((p) => p.value >= 0);
  if (nonNegative && (PROPORTION_RE.test(text) || wholeInPercent)) return "pie";
  return "bar";
}

function metricOf(text: string): string | undefined {
  let best: { at: number; name: string } | undefined;
  for (const [re, name] of METRICS) {
    const m = re.exec(text);
    if (m && (best === undefined || m.index < best.at)) best = { at: m.index, name };
  }
  return best?.name;
}

function unavailable(message: string): ChartDescriptor {
  return {
    can_generate_chart: false,
    chart_type: "bar",
    title: "",
    y_axis_label: "",
    labels: [],
    values: [],
    message,
  };
}

/**
 * Deterministic extraction over the answer text. Charts period series as lines,
 * proportion-of-whole wording (or percentages summing to 100) as pies, anything
 * else as bars.
 */
export class HeuristicChartExtractor implements ChartExtractor {
  readonly name = "heuristic";

  async extract(answerText: string): Promise<ChartDescriptor> {
    return extractHeuristically(answerText);
  }
}

export function extractHeuristically(answerText: string): ChartDescriptor {
  const text = (answerText ?? "").replace(/\r/g, "");
  let pairs = periodPairs(text);
  if (pairs.length < 2) pairs = categoryPairs(text);
  const nonZero = pairs.filter((p) => Math.abs(p.value) > 0).length;
  // A series still charts when the answer also names periods it could not find.
  if (pairs.length < 2 || nonZero < 2) return unavailable(missingDataSentence(text) ?? NO_SERIES_MESSAGE);

  const unit = dominant(pairs.map((p) => p.unit));
  const currency = dominant(pairs.map((p) => p.currency));
  const target = scaleFactor(unit);
  const values = pairs.map((p) => {
    const from = scaleFactor(p.unit);
    return target && from && from !== target ? Number(((p.value * from) / target).toFixed(4)) : p.value;
  });

  const chartType = chooseChartType(text, pairs, unit);
  const metric = metricOf(text);
  const suffix = chartType === "line" ? " Trend" : chartType === "pie" ? " Breakdown" : " by Category";
  const unitLabel = unit === "%" ? "%" : [currency, unit].filter(Boolean).join(" ");
  const axisBase = metric ?? "Value";

  return {
    can_generate_chart: true,
    chart_type: chartType,
    title: metric ? `${metric}${suffix}` : "Reported Values",
    y_axis_label: chartType === "pie" ? "" : unitLabel ? `${axisBase} (${unitLabel})` : axisBase,
    labels: pairs.map((p) => p.label),
    values,
  };
}

export function buildChartPrompt(answerText: string): string {
  return `Extract chart data from the answer below.

Rules:
- Do NOT fabricate numbers. Use only figures explicitly present in the answer.
- Do NOT use 0 to represent missing values. Omit such periods instead.
- Leave out any period or category the answer reports as not available.
- If fewer than two labelled numeric values remain, set can_generate_chart to false and put the reason in "message", saying what the answer reports as missing.
- Otherwise set can_generate_chart to true; labels in the order they appear; values aligned 1:1 with labels, plain numbers without units.
- chart_type: "line" for values over time periods, "pie" for shares of a whole, otherwise "bar".
- y_axis_label: the metric and its unit, e.g. "Revenue ($ billion)"; empty for pie.
Output ONLY a JSON object: {"can_generate_chart": boolean, "chart_type": "bar"|"line"|"pie", "title": string, "y_axis_label": string, "labels": string[], "values": number[], "message"?: string}

Answer:
${answerText}`;
}

/** Constrained extraction through a language model, validated against the descriptor schema. */
export class LlmChartExtractor implements ChartExtractor {
  readonly name: string;

  constructor(private readonly llm: LanguageModel, private readonly timeoutMs = 60000) {
    this.name = `llm:${llm.name}`;
  }

  async extract(answerText: string): Promise<ChartDescriptor> {
    // An answer that reports missing data and holds no series needs no model call.
    if (hasMissingDataMarker(answerText)) {
      const local = extractHeuristically(answerText);
      if (!local.can_generate_chart) return local;
    }

    let raw: string;
    try {
      raw = await generateBounded(this.llm, buildChartPrompt(answerText), this.timeoutMs, { json: true, temperature: 0 });
    } catch (e) {
      throw new ExtractionError(`Chart extraction call failed: ${toErrorMessage(e)}`, { cause: e });
    }
    const parsed = parseModelJson(raw, chartDescriptorSchema);
    if (!parsed.success) {
      throw new ExtractionError("Chart extraction reply is not a valid descriptor", {
        details: { reply: raw.slice(0, 500), issues: parsed.issues },
      });
    }
    const descriptor = parsed.data;
    if (!descriptor.can_generate_chart && !descriptor.message) {
      return { ...descriptor, message: NO_SERIES_MESSAGE };
    }
    return descriptor;
  }
}

/** Uses `primary`, and `fallback` when the primary throws an ExtractionError. */
export class FallbackChartExtractor implements ChartExtractor {
  readonly name: string;

  constructor(private readonly primary: ChartExtractor, private readonly fallback: ChartExtractor) {
    this.name = `${primary.name}|${fallback.name}`;
  }

  async extract(answerText: string): Promise<ChartDescriptor> {
    try {
      return await this.primary.extract(answerText);
    } catch (e) {
      if (!(e instanceof ExtractionError)) throw e;
      console.warn(`Chart extraction via ${this.primary.name} failed, using ${this.fallback.name}:`, e.message);
      return this.fallback.extract(answerText);
    }
  }
}
