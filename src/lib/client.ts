import { z } from "zod";
import type { AnswerResponse, ChatTurn } from "./types";
import { chartDescriptorSchema } from "./types";

const explanationSchema = z.enum([
  "no_relevant_evidence",
  "chart_data_insufficient",
  "unsupported_chart_type",
  "malformed_descriptor",
]);

const sourceSchema = z.object({
  id: z.string().optional(),
  source: z.string().optional(),
  title: z.string().optional(),
  company: z.string().optional(),
  doc_type: z.string().optional(),
  published_date: z.string().optional(),
  score: z.number().optional(),
});

export const answerResponseSchema = z.object({
  answer: z.string(),
  sources: z.array(sourceSchema).default([]),
  chart: z.object({ descriptor: chartDescriptorSchema, image: z.string() }).optional(),
  error: explanationSchema.optional(),
  detail: z.string().optional(),
});

const errorBodySchema = z.object({ error: z.string(), detail: z.string().optional() });

export type AskBody = {
  question: string;
  chat_history?: ChatTurn[];
  chart?: boolean;
};

export type Display =
  | { kind: "chart"; answer: string; imageDataUrl: string }
  | { kind: "message"; answer: string; notice: string }
  | { kind: "text"; answer: string };

export async function askQuestion(
  baseUrl: string,
  body: AskBody,
  fetchImpl: typeof fetch = fetch
): Promise<AnswerResponse> {
  const response = await fetchImpl(new URL("/api/ask", baseUrl), {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  });
  const data: unknown = await response.json();

  if (!response.ok) {
    const err = errorBodySchema.safeParse(data);
    const detail = err.success ? `${err.data.error}${err.data.detail ? `: ${err.data.detail}` : ""}` : `HTTP ${response.status}`;
    throw new Error(`Failed to get response (${response.status}): ${detail}`);
  }
  const parsed = answerResponseSchema.safeParse(data);
  if (!parsed.success) throw new Error("Unexpected response shape from /api/ask");
  return parsed.data;
}

/** Chooses what to show: the chart, the answer with the reason no chart was drawn, or the answer alone. */
export function toDisplay(response: AnswerResponse): Display {
  if (response.error) {
    return { kind: "message", answer: response.answer, notice: response.detail || response.error };
  }
  if (response.chart) {
    return { kind: "chart", answer: response.answer, imageDataUrl: `data:image/png;base64,${response.chart.image}` };
  }
  return { kind: "text", answer: response.answer };
}
