import "dotenv/config";
import { serve } from "@hono/node-server";
import { createApp } from "./app";
import { loadConfig } from "./config";
import { createGateway } from "./persistence";
import { LedgerSession } from "./session/ledger-session";

const config = loadConfig();
const session = new LedgerSession({
  gateway: createGateway(config),
  mode: config.enforcementMode,
});
const app = createApp({ session, authSecret: config.authSecret });

serve({
  fetch: app.fetch,
  port: config.port,
});

console.log(
  `🚀 Server listening on http://localhost:${config.port} (${config.storage} storage, ${config.enforcementMode} mode)`,
);
