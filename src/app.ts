#!/usr/bin/env node
import { anonymizeConfig, getConfig } from "./config.js";
import type { Config } from "./config.js";
import { consoleLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import { DiskBridge } from "./bridge.js";
import { loadSensorTemplates } from "./disks/templates.js";
import { Publisher } from "./publish.js";
import { createSnapshotSource } from "./sources/factory.js";

async function run(config: Config, logger: Logger): Promise<void> {
  logger.log(JSON.stringify(anonymizeConfig(config)));

  const templates = loadSensorTemplates(config.sensorsPath);
  logger.debug(`Loaded ${templates.length} sensor templates`);

  const publisher = new Publisher({
    host: config.mqttHost,
    port: config.mqttPort,
    useTls: config.mqttUseTls,
    clientId: config.mqttClientId,
    username: config.mqttUsername,
    password: config.mqttPassword,
    chunkSize: config.publishChunkSize,
    logger,
  });

  const bridge = new DiskBridge({
    source: createSnapshotSource(config, logger),
    transport: publisher,
    templates,
    pollInterval: config.pollInterval,
    baseTopic: config.mqttTopic,
    discoveryPrefix: config.discoveryPrefix,
    logger,
  });

  const controller = new AbortController();
  const stop = (signal: NodeJS.Signals) => {
    logger.log(`Received ${signal}, exiting main loop...`);
    controller.abort();
  };
  process.once("SIGINT", stop);
  process.once("SIGTERM", stop);

  try {
    await bridge.run(controller.signal);
  } finally {
    await publisher.end();
  }
}

let logger: Logger = consoleLogger(false);

Promise.resolve()
  .then(() => {
    const config = getConfig();
    logger = consoleLogger(config.debug);
    return run(config, logger);
  })
  .then(() => {
    logger.log("Done");
    process.exit(0);
  })
  .catch((err) => {
    logger.error(err);
    process.exit(1);
  });
