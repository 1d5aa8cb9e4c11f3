import type { Request, Response, Router } from "express";
import { Router as createRouter } from "express";
import type { PipelineErrorKind } from "@/lib/errors";
import { toErrorMessage } from "@/lib/errors";
import type { RagPipeline } from "@/lib/rag";
import type { HealthReport } from "@/lib/services";
import type { AnswerResponse } from "@/lib/types";
import { validateAskRequest } from "./validation";

export type ErrorResponse = {
  error: "invalid_request" | "internal_error" | PipelineErrorKind;
  detail: string;
};

export type HandlerResult = { status: number; body: AnswerResponse | ErrorResponse };

export type RouteDeps = {
  pipeline: Pick<RagPipeline, "ask">;
  health(): Promise<HealthReport>;
};

const STATUS_FOR: Record<PipelineErrorKind, number> = {
  evidence_unavailable: 503,
  generation_failed: 502,
  extraction_failed: 502,
  chart_unavailable: 500,
};

/**
 * Runs one question through the pipeline. Hard failures map to 5xx with a
 * machine-readable `error`; a chart that could not be drawn is still a 200.
 */
export async function handleAsk(
  pipeline: Pick<RagPipeline, "ask">,
  body: unknown,
  opts: { forceChart?: boolean } = {}
): Promise<HandlerResult> {
  const validation = validateAskRequest(body);
  if (!validation.valid) {
    return { status: 400, body: { error: "invalid_request", detail: validation.error } };
  }
  const { question, chat_history, chart } = validation.data;

  try {
    const res = await pipeline.ask({ question, history: chat_history, chart: opts.forceChart ? true : chart });
    switch (res.status) {
      case "ok":
        return { status: 200, body: res.value };
      case "explained":
        return { status: 200, body: { answer: res.message, sources: [], error: res.reason, detail: res.message } };
      case "failed":
        console.error(`/api/ask ${res.error.kind}:`, res.error.message);
        return { status: STATUS_FOR[res.error.kind], body: { error: res.error.kind, detail: res.error.message } };
    }
  } catch (e) {
    console.error("/api/ask error", e);
    return { status: 500, body: { error: "internal_error", detail: toErrorMessage(e) } };
  }
}

const send = (res: Response, result: HandlerResult): void => {
  res.status(result.status).json(result.body);
};

export const createRoutes = (deps: RouteDeps): Router => {
  const router = createRouter();

  router.post("/ask", (req: Request, res: Response) => {
    handleAsk(deps.pipeline, req.body).then(
      (result) => send(res, result),
      (error: unknown) => send(res, { status: 500, body: { error: "internal_error", detail: toErrorMessage(error) } })
    );
  });

  router.post("/chart", (req: Request, res: Response) => {
    handleAsk(deps.pipeline, req.body, { forceChart: true }).then(
      (result) => send(res, result),
      (error: unknown) => send(res, { status: 500, body: { error: "internal_error", detail: toErrorMessage(error) } })
    );
  });

  router.get("/health", (_req: Request, res: Response) => {
    deps.health().then(
      (report) => res.status(report.status === "ok" ? 200 : 503).json(report),
      (error: unknown) => res.status(503).json({ status: "degraded", detail: toErrorMessage(error) })
    );
  });

  return router;
};
