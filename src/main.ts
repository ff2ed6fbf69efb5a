import { startServer } from "./server.js";
import { logger } from "./logger.js";

startServer().catch((error: unknown) => {
  logger.error({ error }, "server.start.failed");
  process.exit(1);
});
