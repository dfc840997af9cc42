/**
 * Volume Content Demo
 *
 * Serves a text file on a persistent volume over HTTP. Lines written through
 * POST /write survive container restarts when DATA_DIR is a mounted volume.
 */

import { createApp } from "./app.js";
import { loadConfig } from "./config.js";
import { ContentStore } from "./contentStore.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const store = new ContentStore(config.contentFile);

  // Ensure the data directory exists
  await store.init();
  console.log(`Content file: ${store.contentFile}`);

  const app = createApp(store);
  const server = app.listen(config.port, config.host, () => {
    console.log(`Server running on http://${config.host}:${config.port}`);
  });

  const shutdown = (signal: NodeJS.Signals): void => {
    console.log(`Received ${signal}, shutting down...`);
    server.close((err) => {
      if (err) {
        console.error(err);
        process.exit(1);
      }
      process.exit(0);
    });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
