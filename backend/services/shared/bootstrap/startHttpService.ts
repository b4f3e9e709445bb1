// backend/services/shared/bootstrap/startHttpService.ts
import type { Express } from "express";
import type { Server } from "http";
import type { Logger } from "pino";

export interface StartHttpServiceOptions {
  app: Express;
  port: number; // 0 = ephemeral
  serviceName: string;
  logger: Logger;
  /** Runs after the server has closed on SIGINT/SIGTERM (e.g. db disconnect). */
  onShutdown?: () => Promise<void>;
}

export interface StartedService {
  server: Server;
  stop: () => Promise<void>;
}

export function startHttpService(
  opts: StartHttpServiceOptions
): StartedService {
  const { app, port, serviceName, logger, onShutdown } = opts;

  const server = app.listen(port, () => {
    const addr = server.address();
    const boundPort = addr && typeof addr === "object" ? addr.port : port;
    logger.info({ service: serviceName, port: boundPort }, "service listening");
  });

  server.on("error", (err) => {
    logger.error({ err, service: serviceName }, "http server error");
    process.exit(1);
  });

  const stop = () =>
    new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });

  const shutdown = (signal: string) => {
    logger.info({ signal, service: serviceName }, "shutting down service");
    stop()
      .then(() => onShutdown?.())
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error({ err, service: serviceName }, "shutdown failed");
        process.exit(1);
      });
  };

  process.once("SIGTERM", () => shutdown("SIGTERM"));
  process.once("SIGINT", () => shutdown("SIGINT"));

  return { server, stop };
}
