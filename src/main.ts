import { createLogger } from "./core/logging/logger";
import { EXIT_FAILURE, runCLI } from "./io/cli";

const logger = createLogger("main");

async function main() {
  process.exitCode = await runCLI(process.argv.slice(2), {
    stdin: process.stdin,
    stdout: process.stdout,
    stderr: process.stderr,
  });
}

main().catch((error: unknown) => {
  logger.fatal({ event: "fatal", error });
  process.exitCode = EXIT_FAILURE;
});
