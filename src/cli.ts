import { runCli } from "./cli/program";
import { createLogger } from "./shared/utils/logger";

const logger = createLogger("cli");

runCli(process.argv)
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    logger.error("Unexpected failure", { error: error instanceof Error ? error.stack : String(error) });
    process.exitCode = 1;
  });
