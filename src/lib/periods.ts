// FY24, FY2024, Q1 FY24, Q2FY25, Q1 2024, 2023. Currency amounts and decimals are not periods.
const PERIOD_SOURCE =
  String.raw`(?<![$€£₹\d.,])\b(?:Q[1-4]\s*(?:FY\s*)?(?:19|20)?\d{2}|FY\s?(?:19|20)?\d{2}|(?:19|20)\d{2})\b(?![.,]\d)`;

export function periodRegex(): RegExp {
  return new RegExp(PERIOD_SOURCE, "gi");
}

export function normalizePeriod(raw: string): string {
  return raw.replace(/\s+/g, " ").toUpperCase().replace(/FY /g, "FY").trim();
}

export function isPeriodLabel(label: string): boolean {
  const re = new RegExp(`^(?:${PERIOD_SOURCE})$`, "i");
  return re.test(label.trim());
}

/** Distinct periods mentioned in `text`, normalized, in order of first appearance. */
export function findPeriods(text: string): string[] {
  const seen = new Set<string>();
  for (const m of text.matchAll(periodRegex())) {
    seen.add(normalizePeriod(m[0]));
  }
  return [...seen];
}
