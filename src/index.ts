#!/usr/bin/env node
import dotenv from "dotenv";
import { hideBin } from "yargs/helpers";
import { main } from "./cli";
import { UploadService } from "./services/upload.service";
import logger from "./utils/logger";

// Load environment variables
dotenv.config();

const service = new UploadService();

async function shutdown(signal: NodeJS.Signals, exitCode: number): Promise<void> {
  logger.info(`${signal} received, closing broker connection...`);
  try {
    await service.abort();
  } finally {
    process.exit(exitCode);
  }
}

process.on("SIGTERM", () => {
  shutdown("SIGTERM", 143).catch((error: unknown) =>
    logger.error({ err: error }, "Error during shutdown"),
  );
});

process.on("SIGINT", () => {
  shutdown("SIGINT", 130).catch((error: unknown) =>
    logger.error({ err: error }, "Error during shutdown"),
  );
});

main(hideBin(process.argv), { ...process.env }, service)
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    logger.error({ err: error }, "Unexpected error");
    process.exitCode = 1;
  });
