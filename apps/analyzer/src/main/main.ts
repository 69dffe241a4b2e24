import dotenv from "dotenv";
import dotenvExpand from "dotenv-expand";
import { flushSentry, initSentry, registerProcessHandlers } from "../engine/sentry";
import { reloadMonitoringConfig } from "../shared/config/monitoring";
import { describeError, getLogger } from "../shared/logger";
import { EXIT_CODES, runCli } from "./cli";

dotenvExpand.expand(dotenv.config());
reloadMonitoringConfig();

const logger = getLogger("main", "cli");

const main = async (): Promise<number> => {
  registerProcessHandlers("cli");
  await initSentry("cli");

  const controller = new AbortController();
  const onInterrupt = () => {
    logger.info("Interrupt received, cancelling analysis");
    controller.abort();
  };
  process.once("SIGINT", onInterrupt);

  try {
    return await runCli(
      process.argv.slice(2),
      {
        stdout: (text) => process.stdout.write(`${text}\n`),
        stderr: (text) => process.stderr.write(`${text}\n`),
      },
      { signal: controller.signal },
    );
  } finally {
    process.off("SIGINT", onInterrupt);
    await Promise.all([flushSentry(), logger.flush()]);
  }
};

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    logger.fatal("stancecheck crashed", describeError(error));
    process.exitCode = EXIT_CODES.failure;
  },
);
