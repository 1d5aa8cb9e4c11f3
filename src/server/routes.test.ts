import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { EvidenceUnavailableError, GenerationError } from "@/lib/errors";
import type { AskOptions } from "@/lib/rag";
import type { AnswerResponse, StageResult } from "@/lib/types";
import { explained, failed, ok } from "@/lib/types";
import { handleAsk } from "./routes";
import { validateAskRequest } from "./validation";

function fakePipeline(result: StageResult<AnswerResponse> | Error) {
  const ask = vi.fn(async (_opts: AskOptions): Promise<StageResult<AnswerResponse>> => {
    if (result instanceof Error) throw result;
    return result;
  });
  return { ask };
}

beforeEach(() => {
  vi.spyOn(console, "error").mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("validateAskRequest", () => {
  it("requires a non-blank question", () => {
    expect(validateAskRequest({ question: "   " })).toEqual({ valid: false, error: "question: question is required" });
    expect(validateAskRequest({})).toEqual({ valid: false, error: "question: Required" });
  });

  it("accepts both history shapes", () => {
    const res = validateAskRequest({
      question: " What about 2023? ",
      chat_history: [["What was revenue in 2024?", "$391.0 billion"], { question: "And services?", answer: "$96.2 billion" }],
    });
    expect(res).toEqual({
      valid: true,
      data: {
        question: "What about 2023?",
        chat_history: [
          { question: "What was revenue in 2024?", answer: "$391.0 billion" },
          { question: "And services?", answer: "$96.2 billion" },
        ],
      },
    });
  });
});

describe("handleAsk", () => {
  it("rejects an invalid body without calling the pipeline", async () => {
    const pipeline = fakePipeline(ok({ answer: "unused", sources: [] }));
    await expect(handleAsk(pipeline, { question: 42 })).resolves.toEqual({
      status: 400,
      body: { error: "invalid_request", detail: "question: Expected string, received number" },
    });
    expect(pipeline.ask).not.toHaveBeenCalled();
  });

  it("returns the answer", async () => {
    const pipeline = fakePipeline(ok({ answer: "Net sales were $391.0 billion.", sources: [{ source: "10-K.pdf" }] }));
    const res = await handleAsk(pipeline, { question: "What were net sales in 2024?", chat_history: [["Q1", "A1"]] });
    expect(res).toEqual({ status: 200, body: { answer: "Net sales were $391.0 billion.", sources: [{ source: "10-K.pdf" }] } });
    expect(pipeline.ask).toHaveBeenCalledWith({
      question: "What were net sales in 2024?",
      history: [{ question: "Q1", answer: "A1" }],
      chart: undefined,
    });
  });

  it("forces the chart stages on the chart route", async () => {
    const pipeline = fakePipeline(ok({ answer: "ok", sources: [] }));
    await handleAsk(pipeline, { question: "Revenue by year", chart: false }, { forceChart: true });
    expect(pipeline.ask).toHaveBeenCalledWith({ question: "Revenue by year", history: [], chart: true });
  });

  it("answers an explanation with a 200", async () => {
    const pipeline = fakePipeline(explained("no_relevant_evidence", "No documents mention 2030."));
    await expect(handleAsk(pipeline, { question: "Revenue in 2030?" })).resolves.toEqual({
      status: 200,
      body: { answer: "No documents mention 2030.", sources: [], error: "no_relevant_evidence", detail: "No documents mention 2030." },
    });
  });

  it("maps stage failures to status codes", async () => {
    const unavailable = await handleAsk(
      fakePipeline(failed(new EvidenceUnavailableError("Could not query the graph store: connection refused"))),
      { question: "Revenue?" }
    );
    expect(unavailable).toEqual({
      status: 503,
      body: { error: "evidence_unavailable", detail: "Could not query the graph store: connection refused" },
    });

    const generation = await handleAsk(fakePipeline(failed(new GenerationError("Language model call failed: boom"))), {
      question: "Revenue?",
    });
    expect(generation.status).toBe(502);
    expect(generation.body).toEqual({ error: "generation_failed", detail: "Language model call failed: boom" });
  });

  it("turns an unexpected exception into a 500", async () => {
    const res = await handleAsk(fakePipeline(new Error("boom")), { question: "Revenue?" });
    expect(res).toEqual({ status: 500, body: { error: "internal_error", detail: "boom" } });
  });
});
