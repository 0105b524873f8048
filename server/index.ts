import { createApp } from "./app";
import { loadConfig } from "./config";
import { log } from "./log";

async function main(): Promise<void> {
  const config = loadConfig();
  const server = await createApp(config);

  server.listen(config.port, () => {
    log(`serving on port ${config.port} (${config.nodeEnv})`);
  });
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
