#!/usr/bin/env node
import path from "node:path";
import { EventEmitter } from "node:events";
import { promises as fs } from "node:fs";
import { mountApp } from "../renderer/main.js";
import { APP_NAME } from "../shared/constants.js";
import { AppController } from "./services/app-controller.js";
import { resolveConfigDir } from "./services/app-paths.js";
import { closeLogFile, configureLogFile, logger } from "./services/logger.js";
import { APP_EVENT_CHANNEL, createBridge } from "./bridge.js";

const LOG_FILE = `${APP_NAME}.log`;

async function main(): Promise<void> {
  const configDir = resolveConfigDir();
  await fs.mkdir(configDir, { recursive: true });
  configureLogFile(path.join(configDir, LOG_FILE));
  logger.info(`Starting with config directory ${configDir}`);

  const events = new EventEmitter();
  const controller = new AppController(
    {
      emit: (event) => {
        events.emit(APP_EVENT_CHANNEL, event);
      }
    },
    {
      configDir,
      initialRows: process.stdout.rows
    }
  );

  const instance = mountApp(createBridge(controller, events));
  try {
    await instance.waitUntilExit();
  } finally {
    await controller.shutdown();
    logger.info("Exited");
    await closeLogFile();
  }
}

main().then(() => {
  process.exit(0);
}, async (error: unknown) => {
  logger.error("Fatal error", error);
  await closeLogFile();
  process.stderr.write(`${APP_NAME}: ${error instanceof Error ? error.message : String(error)}\n`);
  process.exit(1);
});
