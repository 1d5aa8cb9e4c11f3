import type { AnswerGenerator } from "./answer";
import type { ChartExtractor } from "./chart-extract";
import { renderChart } from "./chart-render";
import { ChartUnavailableError, ExtractionError, toErrorMessage } from "./errors";
import type { HybridRetriever } from "./retriever";
import type { AnswerResponse, ChartDescriptor, ChartResult, ChatTurn, Chunk, Source, StageResult } from "./types";
import { explained, failed, ok } from "./types";

const CHART_KEYWORDS = [
  "chart",
  "graph",
  "plot",
  "visualize",
  "visualise",
  "visualization",
  "visualisation",
  "line chart",
  "bar chart",
  "pie",
  "donut",
  "composition",
  "breakdown",
  "distribution",
  "proportion",
  "trend",
  "trends",
  "over time",
  "timeline",
];

const CHART_INTENT_RE = new RegExp(`\\b(?:${CHART_KEYWORDS.map((k) => k.replace(/ /g, "\\s+")).join("|")})\\b`, "i");

export function isChartIntent(question: string): boolean {
  return CHART_INTENT_RE.test(question);
}

export type RenderFn = (descriptor: ChartDescriptor) => StageResult<Buffer>;

export type RagPipelineDeps = {
  retriever: Pick<HybridRetriever, "retrieve">;
  answerer: Pick<AnswerGenerator, "answer">;
  extractor: ChartExtractor;
  render?: RenderFn;
};

export type AskOptions = {
  question: string;
  history?: readonly ChatTurn[];
  /** Force (true) or suppress (false) the chart stages; by default they follow the question's wording. */
  chart?: boolean;
};

type PipelineOutcome = {
  answer: string;
  sources: Source[];
  chart?: StageResult<ChartResult>;
};

function toSource(c: Chunk): Source {
  return {
    id: c.id,
    source: c.source,
    title: c.title,
    company: c.company,
    doc_type: c.doc_type,
    published_date: c.published_date,
    score: c.score,
  };
}

/**
 * question → retrieve → answer → extract → render. Hard failures short-circuit as
 * `failed`; a chart that cannot be drawn still yields the answer, with the reason
 * kept apart in `error`/`detail`.
 */
export class RagPipeline {
  private readonly render: RenderFn;

  constructor(private readonly deps: RagPipelineDeps) {
    this.render = deps.render ?? ((d) => renderChart(d));
  }

  private async chartFor(answer: string): Promise<StageResult<ChartResult>> {
    let descriptor: ChartDescriptor;
    try {
      descriptor = await this.deps.extractor.extract(answer);
    } catch (e) {
      if (e instanceof ExtractionError) {
        console.warn("Chart extraction failed:", e.message);
        return explained("chart_data_insufficient", "Chart data could not be extracted from the answer.");
      }
      return failed(new ExtractionError(`Chart extractor crashed: ${toErrorMessage(e)}`, { cause: e }));
    }

    const image = this.render(descriptor);
    if (image.status !== "ok") {
      if (image.status === "explained") console.info(`Chart not rendered (${image.reason}): ${image.message}`);
      return image.status === "explained" ? explained(image.reason, image.message) : failed(image.error);
    }
    return ok({ descriptor, image: image.value });
  }

  private async run(opts: AskOptions): Promise<StageResult<PipelineOutcome>> {
    const question = opts.question.trim();
    const history = opts.history ?? [];

    const evidence = await this.deps.retriever.retrieve(question);
    if (evidence.status === "failed") return failed(evidence.error);
    if (evidence.status === "explained") return explained(evidence.reason, evidence.message);

    const bundle = evidence.value;
    const sources = bundle.kind === "evidence" ? bundle.unstructured.map(toSource) : [];
    console.info(
      `RAG: ${bundle.kind === "evidence" ? `${bundle.structured.length} graph facts, ${sources.length} chunks` : "no relevant evidence"}`
    );

    const answer = await this.deps.answerer.answer(question, bundle, history);
    if (answer.status === "failed") return failed(answer.error);
    if (answer.status === "explained") return explained(answer.reason, answer.message);

    const wantsChart = opts.chart ?? isChartIntent(question);
    if (!wantsChart) return ok({ answer: answer.value, sources });
    return ok({ answer: answer.value, sources, chart: await this.chartFor(answer.value) });
  }

  async ask(opts: AskOptions): Promise<StageResult<AnswerResponse>> {
    const res = await this.run(opts);
    if (res.status !== "ok") return res;

    const { answer, sources, chart } = res.value;
    const base: AnswerResponse = { answer, sources };
    if (!chart) return ok(base);
    switch (chart.status) {
      case "ok":
        return ok({
          ...base,
          chart: { descriptor: chart.value.descriptor, image: chart.value.image.toString("base64") },
        });
      case "explained":
        return ok({ ...base, error: chart.reason, detail: chart.message });
      case "failed":
        return failed(chart.error);
    }
  }

  /** PNG bytes for a chart question; throws ChartUnavailableError when no chart can be drawn. */
  async chartImage(question: string, history: readonly ChatTurn[] = []): Promise<Buffer> {
    const res = await this.run({ question, history, chart: true });
    if (res.status === "failed") throw res.error;
    if (res.status === "explained") throw new ChartUnavailableError(res.reason, res.message);
    const chart = res.value.chart;
    if (!chart) throw new ChartUnavailableError("chart_data_insufficient", "No chart was produced.");
    if (chart.status === "failed") throw chart.error;
    if (chart.status === "explained") throw new ChartUnavailableError(chart.reason, chart.message);
    return chart.value.image;
  }
}
