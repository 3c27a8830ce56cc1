/**
 * SnapLink Redirect Service
 *
 * Entry point: starts the HTTP server.
 */

import { logger } from "@snaplink/logger";
import { main } from "./server.js";

main().catch((err: unknown) => {
  logger.fatal({ err }, "Redirect service failed to start");
  process.exit(1);
});
