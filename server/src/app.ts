import { Hono } from "hono";
import { bodyLimit } from "hono/body-limit";
import { cors } from "hono/cors";
import { ConfigError, EncodingError, ShapingFailure } from "../../scripts/lib/errors.js";
import { fail } from "../../scripts/lib/log.js";
import type { ServerConfig } from "./config.js";
import { convertRoutes } from "./routes/convert.js";

export function createApp(config: ServerConfig) {
  const app = new Hono();

  app.use("*", cors());

  // Health check
  app.get("/health", (c) => c.json({ status: "ok", timestamp: new Date().toISOString() }));

  app.use(
    "/api/*",
    bodyLimit({
      maxSize: config.maxBodyBytes,
      onError: (c) => c.json({ error: `Request body exceeds ${config.maxBodyBytes} bytes`, type: "PayloadTooLarge" }, 413),
    })
  );
  app.route("/api/convert", convertRoutes(config));

  app.onError((err, c) => {
    if (err instanceof ConfigError) {
      return c.json({ error: err.message, type: err.name, issues: err.issues }, 400);
    }
    if (err instanceof EncodingError || err instanceof ShapingFailure) {
      return c.json({ error: err.message, type: err.name }, 422);
    }
    fail("server", err.stack ?? err.message);
    return c.json({ error: "Internal server error", type: "InternalError" }, 500);
  });

  return app;
}
