import { loadDotenv } from "./infra/dotenv.js";
import { formatError } from "./infra/errors.js";
import { createLogger } from "./logging.js";
import { loadConfig } from "./config/config.js";
import { createApp, type App } from "./app.js";

const log = createLogger("main");

let app: App | null = null;

async function main(): Promise<void> {
  loadDotenv();
  log.info("Starting triagedesk...");
  const config = loadConfig();

  const started = await createApp(config);
  app = started;
  started.start();

  let shuttingDown = false;
  const shutdown = async (): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info("Shutting down...");
    await started.stop();
    process.exit(0);
  };
  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());

  log.info(`triagedesk running in ${started.mode} mode`);
}

process.on("unhandledRejection", (err) => {
  log.error(`Unhandled rejection: ${formatError(err)}`);
});

process.on("uncaughtException", (err) => {
  log.error(`Uncaught exception: ${formatError(err)}`);
  process.exit(1);
});

main().catch(async (err) => {
  log.error(`Fatal error: ${formatError(err)}`);
  await app?.stop();
  process.exit(1);
});
