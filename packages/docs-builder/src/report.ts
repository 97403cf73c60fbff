import picocolors from "picocolors";
import { DocsError } from "./errors.js";
import * as logger from "./logger.js";

/** Prints the error that ended a command */
export function reportError(error: unknown): void {
  logger.log();
  if (error instanceof DocsError) {
    logger.error(picocolors.red(error.message));
  } else {
    logger.error(
      picocolors.red("Unexpected error. Please report it as a bug:")
    );
    logger.log(error);
  }
  logger.log();
}
