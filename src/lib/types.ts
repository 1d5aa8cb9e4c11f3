import { z } from "zod";
import type { PipelineError } from "./errors";

export const SUPPORTED_CHART_TYPES = ["bar", "line", "pie"] as const;
export type ChartType = (typeof SUPPORTED_CHART_TYPES)[number];

export function isSupportedChartType(t: string): t is ChartType {
  return (SUPPORTED_CHART_TYPES as readonly string[]).includes(t);
}

// chart_type stays an open string here: the renderer, not the schema, decides what it can draw.
export const chartDescriptorSchema = z.object({
  can_generate_chart: z.boolean(),
  chart_type: z.string().default("bar"),
  title: z.string().default(""),
  y_axis_label: z.string().default(""),
  labels: z.array(z.coerce.string()).default([]),
  values: z.array(z.number().finite()).default([]),
  message: z.string().optional(),
});

export type ChartDescriptor = Readonly<z.infer<typeof chartDescriptorSchema>>;

export type Source = {
  id?: string;
  source?: string;
  title?: string;
  company?: string;
  doc_type?: string;
  published_date?: string;
  score?: number;
};

export type Chunk = Source & { text: string; score: number };

export type Coverage = {
  entities: string[];
  periods: string[];
};

export const NO_RELEVANT_INFORMATION = "No relevant information found for this query";

export type EvidenceBundle =
  | {
      kind: "evidence";
      structured: string[];
      unstructured: Chunk[];
      coverage: Coverage;
      text: string;
    }
  | {
      kind: "none";
      coverage: Coverage;
      text: typeof NO_RELEVANT_INFORMATION;
    };

export type ChatTurn = {
  question: string;
  answer: string;
};

export type ExplanationReason =
  | "no_relevant_evidence"
  | "chart_data_insufficient"
  | "unsupported_chart_type"
  | "malformed_descriptor";

export type StageResult<T> =
  | { status: "ok"; value: T }
  | { status: "explained"; reason: ExplanationReason; message: string }
  | { status: "failed"; error: PipelineError };

export function ok<T>(value: T): StageResult<T> {
  return { status: "ok", value };
}

export function explained<T = never>(reason: ExplanationReason, message: string): StageResult<T> {
  return { status: "explained", reason, message };
}

export function failed<T = never>(error: PipelineError): StageResult<T> {
  return { status: "failed", error };
}

export type ChartResult = {
  descriptor: ChartDescriptor;
  image: Buffer;
};

export type AnswerResponse = {
  answer: string;
  sources: Source[];
  chart?: { descriptor: ChartDescriptor; image: string };
  error?: ExplanationReason;
  detail?: string;
};
