import { startServer } from "./api/server.js";

await startServer({
  port: Number(process.env.PORT) || 3000,
  host: process.env.HOST || "0.0.0.0",
  logLevel: process.env.LOG_LEVEL || "info",
});
