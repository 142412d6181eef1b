import { serve } from "@hono/node-server";
import { fail, info } from "../../scripts/lib/log.js";
import { createApp } from "./app.js";
import { loadServerConfig, type ServerConfig } from "./config.js";

let config: ServerConfig;
try {
  config = loadServerConfig(process.argv[2]);
} catch (err) {
  fail("server", err instanceof Error ? err.message : String(err));
  process.exit(1);
}

const app = createApp(config);

serve({ fetch: app.fetch, port: config.port }, (address) => {
  info("server", `text-pages server listening on port ${address.port}`);
  info("server", `  Convert: POST http://localhost:${address.port}/api/convert`);
});
