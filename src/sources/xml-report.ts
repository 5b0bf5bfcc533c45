import { readFile } from "node:fs/promises";
import { XMLParser, XMLValidator } from "fast-xml-parser";
import { SnapshotError, errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import { SERIAL_NUMBER_ATTRIBUTE } from "../models.js";
import type { DiskAttributes, DiskSnapshot } from "../models.js";
import { execCommand } from "./base.js";
import type { CommandRunner, SnapshotSource } from "./base.js";

const SUMMARY_TAG = "Hard_Disk_Summary";

export interface XmlReportSourceOptions {
  binaryPath: string;
  /**
   * Where the utility is told to write its report.
   */
  reportPath: string;
  /**
   * Read this report as is instead of running the utility.
   */
  xmlPath?: string;
  logger: Logger;
  run?: CommandRunner;
}

const parser = new XMLParser({
  ignoreAttributes: true,
  ignoreDeclaration: true,
  parseTagValue: false,
  trimValues: true,
  isArray: (tagName) => tagName === SUMMARY_TAG,
});

function collectSummaries(node: unknown, found: unknown[]): void {
  if (Array.isArray(node)) {
    node.forEach((item) => collectSummaries(item, found));
    return;
  }
  if (node === null || typeof node !== "object") {
    return;
  }
  for (const [key, value] of Object.entries(node)) {
    if (key === SUMMARY_TAG && Array.isArray(value)) {
      found.push(...value);
    } else {
      collectSummaries(value, found);
    }
  }
}

function toAttributes(summary: unknown): DiskAttributes {
  const attributes: DiskAttributes = {};
  if (summary === null || typeof summary !== "object") {
    return attributes;
  }
  for (const [key, value] of Object.entries(summary)) {
    if (typeof value === "string") {
      attributes[key] = value.replace(/\r?\n/g, "");
    }
  }
  return attributes;
}

/**
 * Extract every disk summary from a Hard Disk Sentinel XML report, wherever it
 * is nested. Summaries without a serial number are skipped.
 */
export function parseXmlReport(xml: string, logger: Logger): DiskSnapshot {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    throw new SnapshotError(
      `Malformed XML report at line ${validation.err.line}: ${validation.err.msg}`,
    );
  }

  const summaries: unknown[] = [];
  collectSummaries(parser.parse(xml), summaries);

  const disks: DiskSnapshot = new Map();
  for (const summary of summaries) {
    const attributes = toAttributes(summary);
    const serialNumber = attributes[SERIAL_NUMBER_ATTRIBUTE]?.trim();
    if (!serialNumber) {
      logger.warn("Found disk without serial number, skipping");
      continue;
    }
    disks.set(serialNumber, attributes);
  }
  return disks;
}

/**
 * Bulk snapshot source: one utility run writes an XML report covering every
 * disk.
 */
export class XmlReportSource implements SnapshotSource {
  private readonly run: CommandRunner;

  constructor(private readonly options: XmlReportSourceOptions) {
    this.run = options.run ?? execCommand;
  }

  async snapshot(): Promise<DiskSnapshot> {
    const { binaryPath, reportPath, xmlPath, logger } = this.options;
    const path = xmlPath ?? reportPath;

    if (xmlPath == null) {
      logger.log("Generating XML report with hdsentinel...");
      try {
        await this.run(binaryPath, ["-solid", "-xml", "-r", reportPath]);
      } catch (e) {
        throw new SnapshotError(`Failed to run ${binaryPath}: ${errorMessage(e)}`, { cause: e });
      }
    } else {
      logger.debug(`Reading XML report from ${xmlPath}`);
    }

    let xml: string;
    try {
      xml = await readFile(path, "utf-8");
    } catch (e) {
      throw new SnapshotError(`Cannot read XML report ${path}: ${errorMessage(e)}`, { cause: e });
    }
    const disks = parseXmlReport(xml, logger);
    logger.debug(`Parsed ${disks.size} disks from ${path}`);
    return disks;
  }
}
