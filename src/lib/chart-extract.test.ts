import { describe, expect, it, vi } from "vitest";
import {
  FallbackChartExtractor,
  HeuristicChartExtractor,
  LlmChartExtractor,
  NO_SERIES_MESSAGE,
  extractHeuristically,
  periodPairs,
} from "./chart-extract";
import type { ChartExtractor } from "./chart-extract";
import { ExtractionError } from "./errors";
import type { LanguageModel } from "./llm";

const TREND_ANSWER = [
  "Apple's revenue trend over the last three fiscal years:",
  "- 2022: $394.3 billion",
  "- 2023: $383.3 billion",
  "- 2024: $391.0 billion",
].join("\n");

const REGION_ANSWER = [
  "Apple's net sales by region in fiscal 2024:",
  "- Americas: $167.0 billion",
  "- Europe: $101.3 billion",
  "- Greater China: $66.9 billion",
  "- Japan: $25.1 billion",
  "- Rest of Asia Pacific: $30.7 billion",
].join("\n");

const MIX_ANSWER = [
  "Revenue breakdown by segment:",
  "- iPhone: 52%",
  "- Services: 24%",
  "- Mac: 8%",
  "- iPad: 7%",
  "- Wearables: 9%",
].join("\n");

function fakeModel(reply: string) {
  const generate = vi.fn(async () => reply);
  const model: LanguageModel = { name: "fake", generate };
  return { model, generate };
}

describe("extractHeuristically", () => {
  it("charts a period series as a line", () => {
    expect(extractHeuristically(TREND_ANSWER)).toEqual({
      can_generate_chart: true,
      chart_type: "line",
      title: "Revenue Trend",
      y_axis_label: "Revenue ($ billion)",
      labels: ["2022", "2023", "2024"],
      values: [394.3, 383.3, 391],
    });
  });

  it("reads numbers that precede their period", () => {
    const text = "Revenue was $394.3 billion in 2022, $383.3 billion in 2023, and $391.0 billion in 2024.";
    expect(periodPairs(text).map((p) => [p.label, p.value])).toEqual([
      ["2022", 394.3],
      ["2023", 383.3],
      ["2024", 391],
    ]);
  });

  it("charts categories as bars", () => {
    const d = extractHeuristically(REGION_ANSWER);
    expect(d.chart_type).toBe("bar");
    expect(d.title).toBe("Net Sales by Category");
    expect(d.y_axis_label).toBe("Net Sales ($ billion)");
    expect(d.labels).toEqual(["Americas", "Europe", "Greater China", "Japan", "Rest of Asia Pacific"]);
    expect(d.values).toEqual([167, 101.3, 66.9, 25.1, 30.7]);
  });

  it("charts a breakdown in percent as a pie without an axis label", () => {
    const d = extractHeuristically(MIX_ANSWER);
    expect(d.chart_type).toBe("pie");
    expect(d.title).toBe("Revenue Breakdown");
    expect(d.y_axis_label).toBe("");
    expect(d.values).toEqual([52, 24, 8, 7, 9]);
  });

  it("converts mixed scales to the dominant one", () => {
    const d = extractHeuristically("- 2023: $950 million\n- 2024: $1.2 billion");
    expect(d.values).toEqual([950, 1200]);
    expect(d.title).toBe("Reported Values");
    expect(d.y_axis_label).toBe("Value ($ million)");
  });

  it("reports the missing-data sentence instead of charting", () => {
    const text =
      'The information needed to answer "Show me revenue for 2030" is not available in the indexed documents. Figures for 2030 are not available; the available data covers 2022, 2023 and 2024.';
    const d = extractHeuristically(text);
    expect(d.can_generate_chart).toBe(false);
    expect(d.message).toBe(
      'The information needed to answer "Show me revenue for 2030" is not available in the indexed documents.'
    );
    expect(d.labels).toEqual([]);
  });

  it("charts the series when the answer also reports a missing period", () => {
    const text = [
      "Apple's total net sales were:",
      "- 2022: $394.3 billion",
      "- 2023: $383.3 billion",
      "- 2024: $391.0 billion",
      "Figures for 2025 are not available in the filing.",
    ].join("\n");
    expect(extractHeuristically(text)).toEqual({
      can_generate_chart: true,
      chart_type: "line",
      title: "Net Sales Trend",
      y_axis_label: "Net Sales ($ billion)",
      labels: ["2022", "2023", "2024"],
      values: [394.3, 383.3, 391],
    });
  });

  it("refuses text without a series", () => {
    const d = extractHeuristically("Apple's revenue grew strongly last year.");
    expect(d.can_generate_chart).toBe(false);
    expect(d.message).toBe(NO_SERIES_MESSAGE);
  });

  it("refuses a series with a single non-zero value", () => {
    expect(extractHeuristically("- 2023: $0\n- 2024: $5 billion").can_generate_chart).toBe(false);
  });

  it("is shape-stable across calls", () => {
    for (const text of [TREND_ANSWER, REGION_ANSWER, MIX_ANSWER, "nothing to plot"]) {
      const a = extractHeuristically(text);
      const b = extractHeuristically(text);
      expect(b.can_generate_chart).toBe(a.can_generate_chart);
      expect(b.labels.length).toBe(a.labels.length);
      expect(b.values.length).toBe(a.values.length);
    }
  });
});

describe("LlmChartExtractor", () => {
  it("skips the model for an answer that reports missing data", async () => {
    const { model, generate } = fakeModel("{}");
    const d = await new LlmChartExtractor(model, 1000).extract("Revenue for 2030 is not available.");
    expect(generate).not.toHaveBeenCalled();
    expect(d.can_generate_chart).toBe(false);
    expect(d.message).toBe("Revenue for 2030 is not available.");
  });

  it("asks the model when a partial answer still holds a series", async () => {
    const { model, generate } = fakeModel(
      '{"can_generate_chart": true, "chart_type": "line", "title": "Revenue", "labels": ["2023", "2024"], "values": [383.3, 391]}'
    );
    const d = await new LlmChartExtractor(model, 1000).extract(
      `${TREND_ANSWER}\nFigures for 2025 are not available.`
    );
    expect(generate).toHaveBeenCalledTimes(1);
    expect(d.can_generate_chart).toBe(true);
    expect(d.labels).toEqual(["2023", "2024"]);
  });

  it("validates and coerces the model's descriptor", async () => {
    const { model } = fakeModel(
      '```json\n{"can_generate_chart": true, "chart_type": "bar", "title": "T", "labels": [2022, 2023], "values": [1, 2]}\n```'
    );
    const d = await new LlmChartExtractor(model, 1000).extract(TREND_ANSWER);
    expect(d).toEqual({
      can_generate_chart: true,
      chart_type: "bar",
      title: "T",
      y_axis_label: "",
      labels: ["2022", "2023"],
      values: [1, 2],
    });
  });

  it("fills in a message when the model declines without one", async () => {
    const { model } = fakeModel('{"can_generate_chart": false}');
    const d = await new LlmChartExtractor(model, 1000).extract(TREND_ANSWER);
    expect(d.message).toBe(NO_SERIES_MESSAGE);
  });

  it("throws ExtractionError on an invalid reply", async () => {
    const { model } = fakeModel('{"chart_type": "bar"}');
    await expect(new LlmChartExtractor(model, 1000).extract(TREND_ANSWER)).rejects.toBeInstanceOf(ExtractionError);
  });

  it("throws ExtractionError when the model call fails", async () => {
    const model: LanguageModel = {
      name: "broken",
      generate: vi.fn(async () => {
        throw new Error("quota exceeded");
      }),
    };
    await expect(new LlmChartExtractor(model, 1000).extract(TREND_ANSWER)).rejects.toThrow(
      "Chart extraction call failed: Language model call failed: quota exceeded"
    );
  });
});

describe("FallbackChartExtractor", () => {
  it("uses the fallback after an ExtractionError", async () => {
    const { model } = fakeModel("not json");
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const extractor = new FallbackChartExtractor(new LlmChartExtractor(model, 1000), new HeuristicChartExtractor());
    const d = await extractor.extract(TREND_ANSWER);
    expect(d.chart_type).toBe("line");
    expect(d.labels).toEqual(["2022", "2023", "2024"]);
    expect(warn).toHaveBeenCalledTimes(1);
    warn.mockRestore();
  });

  it("lets other errors through", async () => {
    const primary: ChartExtractor = {
      name: "crashy",
      extract: vi.fn(async () => {
        throw new TypeError("bug");
      }),
    };
    const extractor = new FallbackChartExtractor(primary, new HeuristicChartExtractor());
    await expect(extractor.extract(TREND_ANSWER)).rejects.toBeInstanceOf(TypeError);
  });
});
