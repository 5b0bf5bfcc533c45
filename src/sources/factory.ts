import type { Config } from "../config.js";
import type { Logger } from "../logger.js";
import type { CommandRunner, SnapshotSource } from "./base.js";
import { DeviceScanSource } from "./device-scan.js";
import { XmlReportSource } from "./xml-report.js";

export function createSnapshotSource(
  config: Pick<Config, "source" | "binaryPath" | "reportPath" | "xmlPath">,
  logger: Logger,
  run?: CommandRunner,
): SnapshotSource {
  switch (config.source) {
    case "device":
      return new DeviceScanSource({ binaryPath: config.binaryPath, logger, run });
    case "xml":
      return new XmlReportSource({
        binaryPath: config.binaryPath,
        reportPath: config.reportPath,
        xmlPath: config.xmlPath,
        logger,
        run,
      });
  }
}
