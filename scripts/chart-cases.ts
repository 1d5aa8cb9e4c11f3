import type { AnswerResponse } from "../src/lib/types";

export type ChartCase = {
  question: string;
  expected: string;
  category: string;
  /** The question asks for data the store does not hold; an explained error is the passing outcome. */
  expectError: boolean;
};

export const CHART_CASES: ChartCase[] = [
  {
    question: "Create a chart showing revenue trends",
    expected: "Revenue values for several fiscal years",
    category: "Time Series",
    expectError: false,
  },
  {
    question: "Show me geographical revenue distribution",
    expected: "Revenue by region",
    category: "Geographic",
    expectError: false,
  },
  {
    question: "Create a chart of revenue by product category",
    expected: "Revenue by product line",
    category: "Product Segment",
    expectError: false,
  },
  {
    question: "Show me capital expenditure evolution",
    expected: "Capital expenditure over time",
    category: "Financial Metric",
    expectError: false,
  },
  {
    question: "Show me revenue for 2030",
    expected: "An explanation that 2030 figures are not available",
    category: "Error Handling (Future Data)",
    expectError: true,
  },
  {
    question: "Create a chart showing Microsoft's revenue",
    expected: "An explanation that the documents cover a different company",
    category: "Error Handling (Wrong Company)",
    expectError: true,
  },
];

export type CaseOutcome = "passed" | "error_handled" | "failed";

export function judgeCase(c: ChartCase, response: AnswerResponse): CaseOutcome {
  if (c.expectError) return response.error && !response.chart ? "error_handled" : "failed";
  return response.chart && !response.error ? "passed" : "failed";
}

export function safeFilename(question: string): string {
  return question
    .slice(0, 50)
    .replace(/[^A-Za-z0-9 _-]/g, "")
    .replace(/ /g, "_")
    .toLowerCase();
}
