import { logger } from "./observability/logger.ts";
import { startElectorServer } from "./server/server.ts";

startElectorServer().catch((error: unknown) => {
  logger.error({ error }, "Failed to start elector server");
  process.exit(1);
});
