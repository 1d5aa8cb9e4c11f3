import dotenv from "dotenv";
dotenv.config({ path: ".env.local" });
dotenv.config();
import { loadConfig } from "@/lib/config";
import { createServer } from "./server";

const runServer = async (): Promise<void> => {
  const server = await createServer(loadConfig());

  const shutdown = async (): Promise<void> => {
    console.info("Shutting down...");
    await server.close();
    process.exit(0);
  };

  process.on("SIGINT", () => {
    shutdown().catch((error: unknown) => {
      console.error("Shutdown error", error);
      process.exit(1);
    });
  });
  process.on("SIGTERM", () => {
    shutdown().catch((error: unknown) => {
      console.error("Shutdown error", error);
      process.exit(1);
    });
  });
};

runServer().catch((error: unknown) => {
  console.error("Failed to start server", error);
  process.exit(1);
});
