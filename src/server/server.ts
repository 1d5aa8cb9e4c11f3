import type { Server } from "node:http";
import { promisify } from "node:util";
import express, { type Express, type NextFunction, type Request, type Response } from "express";
import type { AppConfig } from "@/lib/config";
import { toErrorMessage } from "@/lib/errors";
import type { Services } from "@/lib/services";
import { createServices } from "@/lib/services";
import type { ErrorResponse, RouteDeps } from "./routes";
import { createRoutes } from "./routes";

type ServerCloseCallback = (err?: Error) => void;

export interface ServerInstance {
  app: Express;
  port: number;
  close: () => Promise<void>;
}

const BODY_ERRORS = new Set(["entity.parse.failed", "entity.too.large", "encoding.unsupported", "charset.unsupported"]);

// body-parser tags its errors with a `type`
const errorType = (err: unknown): string | undefined =>
  typeof err === "object" && err !== null && "type" in err && typeof err.type === "string" ? err.type : undefined;

/** Last middleware: every error leaves as a JSON body, never Express's HTML stack page. */
export const handleAppError = (err: unknown, _req: Request, res: Response, next: NextFunction): void => {
  if (res.headersSent) {
    next(err);
    return;
  }
  const type = errorType(err);
  if (type !== undefined && BODY_ERRORS.has(type)) {
    const body: ErrorResponse = { error: "invalid_request", detail: `Malformed request body: ${toErrorMessage(err)}` };
    res.status(400).json(body);
    return;
  }
  console.error("Unhandled request error", err);
  const body: ErrorResponse = { error: "internal_error", detail: toErrorMessage(err) };
  res.status(500).json(body);
};

export const createApp = (deps: RouteDeps): Express => {
  const app = express();
  app.use(express.json({ limit: "1mb" }));
  app.use("/api", createRoutes(deps));
  app.use(handleAppError);
  return app;
};

export const createServer = async (cfg: AppConfig): Promise<ServerInstance> => {
  const services = createServices(cfg);
  const app = createApp(services);

  const server = await new Promise<Server>((resolve, reject) => {
    const s = app.listen(cfg.port, () => resolve(s));
    s.once("error", reject);
  });
  console.info(`Server running on http://localhost:${cfg.port}`);
  console.info(`Ask endpoint: POST http://localhost:${cfg.port}/api/ask`);

  const close = createCloseHandler({ server, services });
  return { app, port: cfg.port, close };
};

export const createCloseHandler = (params: { server: Server; services: Pick<Services, "close"> }): (() => Promise<void>) => {
  const { server, services } = params;

  return async (): Promise<void> => {
    const closeAsync = promisify((callback: ServerCloseCallback) => {
      server.close(callback);
    });
    await closeAsync();
    console.info("Server closed");
    await services.close();
    console.info("Neo4j driver closed");
  };
};
