import { runCli } from "./cli/main";
import { logger } from "./shared/logger/logger";

const toErrorDetails = (error: unknown) =>
  error instanceof Error
    ? { name: error.name, message: error.message, stack: error.stack }
    : { message: String(error) };

try {
  await runCli(process.argv);
} catch (error) {
  logger.error({ error: toErrorDetails(error) }, "portfolio-insights command failed");
  process.exitCode = 1;
}
