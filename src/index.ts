import { runCli } from "./cli/main";
import { logger } from "./shared/logger/logger";

type ErrorDetails = {
  name?: string;
  message: string;
  stack?: string;
  cause?: ErrorDetails;
};

const toErrorDetails = (error: unknown): ErrorDetails => {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
      cause:
        error.cause === undefined ? undefined : toErrorDetails(error.cause),
    };
  }

  return { message: String(error) };
};

runCli(process.argv).catch((error: unknown) => {
  logger.error(
    { command: process.argv.slice(2).join(" "), error: toErrorDetails(error) },
    "filing-extractor failed",
  );
  process.exit(1);
});
