import Fastify from "fastify";
import routes from "./routes.js";

export interface ServerOptions {
  port?: number;
  host?: string;
  logLevel?: string;
}

export function buildApp(logLevel = "info") {
  const app = Fastify({
    logger: {
      level: logLevel,
    },
  });

  app.register(routes);

  return app;
}

export async function startServer({
  port = 3000,
  host = "0.0.0.0",
  logLevel,
}: ServerOptions = {}) {
  const app = buildApp(logLevel);

  try {
    await app.listen({ port, host });
    app.log.info(`Transit scheduler listening on http://${host}:${port}`);
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }

  return app;
}
