import { ValidationError, errorMessage } from "@mailsift/utils";
import type pino from "pino";
import { type Config, getConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { processFile } from "./run.js";

export const VERSION = "1.0.0";
export const USAGE = "Usage: mailsift <path/to/file>";

export interface CliDeps {
  loadConfig?: () => Config;
  destination?: pino.DestinationStream;
  cwd?: string;
}

export async function main(args: string[], deps: CliDeps = {}): Promise<number> {
  const [first] = args;

  if (first === "--help" || first === "-h") {
    console.log(USAGE);
    return 0;
  }
  if (first === "--version" || first === "-v") {
    console.log(`mailsift v${VERSION}`);
    return 0;
  }

  // No logger exists until the level is known.
  let config: Config;
  try {
    config = (deps.loadConfig ?? getConfig)();
  } catch (err) {
    console.error(`Configuration error: ${errorMessage(err)}.`);
    if (err instanceof ValidationError && err.details) console.error(err.details);
    return 1;
  }

  const logger = createLogger(config.logLevel, deps.destination);
  if (args.length !== 1) {
    logger.error(`Path is missing. ${USAGE}`);
    return 1;
  }

  try {
    await processFile(first, { config, logger, cwd: deps.cwd });
    return 0;
  } catch (err) {
    logger.error({ err }, `Application error: ${errorMessage(err)}.`);
    return 1;
  }
}
