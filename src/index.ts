#!/usr/bin/env node
import { logger } from "./logger";
import { startApp } from "./app";

startApp().catch((err: unknown) => {
  logger.error("Erreur fatale:", err);
  process.exit(1);
});
