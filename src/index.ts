import { runCli } from "./cli/main";
import { logger, toErrorDetails } from "./shared/logger/logger";

runCli(process.argv).catch((error: unknown) => {
  logger.error({ error: toErrorDetails(error) }, "CLI failed");
  process.exit(1);
});
