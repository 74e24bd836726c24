#!/usr/bin/env node
/**
 * postgis-lab - CLI Entry Point
 */

import { createProgram } from "./cli/program.js";
import { logger } from "./utils/logger.js";

createProgram()
  .parseAsync()
  .catch((error: unknown) => {
    logger
      .forModule("CLI")
      .error(error instanceof Error ? error.message : String(error));
    process.exit(1);
  });
