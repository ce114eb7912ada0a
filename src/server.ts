// (SERVER) src/server.ts
import "dotenv/config";

import { ActionStore } from "./actions/actions.store.js";
import { createApp, listen } from "./app.js";
import { loadConfig } from "./config.js";

async function main() {
  const config = loadConfig();

  const store = new ActionStore({ filePath: config.actionsDataPath });
  await store.open();

  const app = createApp(store);
  const server = await listen(app, config.port, config.host);
  console.log(`✅ actions server listening on http://${config.host}:${config.port}`);
  console.log(`   data file: ${store.filePath}`);

  server.on("error", (err) => {
    console.error("http server error:", err);
  });

  let stopping = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (stopping) return;
    stopping = true;
    console.log(`${signal} received, shutting down`);

    server.close((closeErr) => {
      if (closeErr) console.error("http close error:", closeErr);
      store
        .close()
        .then(() => process.exit(closeErr ? 1 : 0))
        .catch((err: unknown) => {
          console.error("store close error:", err);
          process.exit(1);
        });
    });
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((err: unknown) => {
  console.error("startup error:", err);
  process.exit(1);
});
