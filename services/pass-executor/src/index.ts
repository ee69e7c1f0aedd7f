import { config } from "dotenv";
import { resolve } from "path";
config({ path: resolve(__dirname, "../../../.env") });

import { JobValidationError, serializeStatusEvent } from "@groundtrack/shared";
import { loadConfig } from "./config";
import { StatusEventBus } from "./events";
import { createLoggingHardware } from "./hardware";
import { loadJobsFile, submitJob } from "./intake";
import { createLogger } from "./logger";
import { runPassCycle } from "./pass-cycle";
import { Clock, JobRegistry } from "./registry";

const settings = loadConfig();
const logger = createLogger(settings.logLevel);
const clock: Clock = () => new Date();

const bus = new StatusEventBus();
const registry = new JobRegistry(bus);
const hardware = createLoggingHardware(logger);

bus.subscribe((event) => {
  logger.info(serializeStatusEvent(event), "Job status changed");
});

async function pollCycle() {
  try {
    await runPassCycle({ registry, hardware, logger }, clock);
  } catch (err) {
    logger.error({ err }, "Pass cycle error");
  }
}

async function main() {
  logger.info({ stationId: settings.stationId }, "Pass executor starting...");

  if (settings.jobsFile) {
    const payloads = await loadJobsFile(settings.jobsFile);
    for (const payload of payloads) {
      try {
        submitJob(payload, { registry, logger, verifyChecksums: settings.verifyChecksums }, clock());
      } catch (err) {
        // Rejections are logged by submitJob; one bad entry does not stop the rest
        if (!(err instanceof JobValidationError)) throw err;
      }
    }
    logger.info({ file: settings.jobsFile, accepted: registry.size, total: payloads.length }, "Jobs file loaded");
  }

  const timer = setInterval(() => {
    void pollCycle();
  }, settings.cycleIntervalMs);

  await pollCycle();

  logger.info({ cycleInterval: settings.cycleIntervalMs }, "Pass executor running");

  const shutdown = () => {
    logger.info("Shutting down...");
    clearInterval(timer);
    process.exit(0);
  };
  process.on("SIGTERM", shutdown);
  process.on("SIGINT", shutdown);
}

main().catch((err) => {
  logger.fatal({ err }, "Pass executor failed to start");
  process.exit(1);
});
