import Fastify, { type FastifyInstance, type FastifyServerOptions } from "fastify";

import { fastifyLoggerConfig, serverLogger } from "../logger.js";
import { errorHandler } from "./plugins/error-handler.js";
import { registerStatusRoutes, type StatusSource } from "./routes/index.js";

/**
 * Build the status server without listening
 */
export async function buildStatusServer(
  source: StatusSource,
  options: { logger?: FastifyServerOptions["logger"] } = {}
): Promise<FastifyInstance> {
  const app = Fastify({
    logger: options.logger ?? fastifyLoggerConfig,
  });

  await app.register(errorHandler);
  registerStatusRoutes(app, source);

  return app;
}

/**
 * Start serving /health and /status
 */
export async function startStatusServer(
  source: StatusSource,
  address: { port: number; host: string }
): Promise<FastifyInstance> {
  const app = await buildStatusServer(source);

  try {
    await app.listen(address);
    serverLogger.info(address, "Status server started");
  } catch (error) {
    serverLogger.error({ error }, "Failed to start status server");
    await app.close();
    throw error;
  }

  return app;
}
