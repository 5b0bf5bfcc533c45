import { SnapshotError, errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import { DEVICE_ATTRIBUTE, SERIAL_NUMBER_ATTRIBUTE } from "../models.js";
import type { DiskAttributes, DiskSnapshot } from "../models.js";
import { execCommand } from "./base.js";
import type { CommandRunner, SnapshotSource } from "./base.js";

/**
 * Labels of the utility's plain-text device report, mapped to the attribute
 * names the XML report uses, so both sources feed the same sensor templates.
 */
const REPORT_LABELS: Readonly<Record<string, string>> = {
  "HDD Model ID": "Hard_Disk_Model_ID",
  "HDD Serial No": "Hard_Disk_Serial_Number",
  "HDD Revision": "Firmware_Revision",
  "HDD Size": "Total_Size",
  Interface: "Interface",
  Temperature: "Current_Temperature",
  "Highest Temp.": "Maximum_temperature_during_entire_lifespan",
  Health: "Health",
  Performance: "Performance",
  "Power on time": "Power_on_time",
  "Est. lifetime": "Estimated_remaining_lifetime",
  "Total written": "Lifetime_writes",
};

const LABEL_LINE = /^(\S[^:\n]*?)[ \t]*:[ \t]*(.*?)[ \t\r]*$/gm;
const DESCRIPTION_LINE = /^ {2}(The .*?)[ \t\r]*$/m;
const TIP_LINE = /^ {4}(\S.*?)\.[ \t\r]*$/m;

/**
 * Scrape the plain-text report of `hdsentinel -dev <device>`.
 */
export function parseDeviceReport(stdout: string): DiskAttributes {
  const attributes: DiskAttributes = {};
  for (const [, label, value] of stdout.matchAll(LABEL_LINE)) {
    const attribute = REPORT_LABELS[label];
    if (attribute !== undefined && attributes[attribute] === undefined) {
      attributes[attribute] = value;
    }
  }
  const description = DESCRIPTION_LINE.exec(stdout);
  if (description) {
    attributes.Description = description[1];
  }
  const tip = TIP_LINE.exec(stdout);
  if (tip) {
    attributes.Tip = tip[1];
  }
  return attributes;
}

/**
 * Names of the whole-disk block devices in `lsblk -dn -o NAME,TYPE` output.
 */
export function parseBlockDevices(stdout: string): string[] {
  return stdout
    .split("\n")
    .map((line) => line.trim().split(/\s+/))
    .filter(([name, type]) => Boolean(name) && type === "disk")
    .map(([name]) => name);
}

export interface DeviceScanSourceOptions {
  binaryPath: string;
  logger: Logger;
  run?: CommandRunner;
}

/**
 * Per-disk snapshot source: lists block devices and runs the utility once per
 * disk, all disks at the same time.
 */
export class DeviceScanSource implements SnapshotSource {
  private readonly run: CommandRunner;

  constructor(private readonly options: DeviceScanSourceOptions) {
    this.run = options.run ?? execCommand;
  }

  private async scanDevice(name: string): Promise<DiskAttributes | undefined> {
    const { binaryPath, logger } = this.options;
    const device = `/dev/${name}`;
    try {
      const stdout = await this.run(binaryPath, ["-dev", device]);
      const attributes = parseDeviceReport(stdout);
      if (!attributes[SERIAL_NUMBER_ATTRIBUTE]) {
        logger.warn(`No serial number reported for ${device}, skipping`);
        return undefined;
      }
      return { [DEVICE_ATTRIBUTE]: device, ...attributes };
    } catch (e) {
      logger.error(`Failed to read ${device}: ${errorMessage(e)}`);
      return undefined;
    }
  }

  async snapshot(): Promise<DiskSnapshot> {
    let devices: string[];
    try {
      devices = parseBlockDevices(await this.run("lsblk", ["-dn", "-o", "NAME,TYPE"]));
    } catch (e) {
      throw new SnapshotError(`Failed to list block devices: ${errorMessage(e)}`, { cause: e });
    }
    this.options.logger.debug(`Scanning ${devices.length} block devices: ${devices.join(", ")}`);

    const results = await Promise.all(devices.map((name) => this.scanDevice(name)));

    const disks: DiskSnapshot = new Map();
    for (const attributes of results) {
      if (attributes !== undefined) {
        disks.set(attributes[SERIAL_NUMBER_ATTRIBUTE], attributes);
      }
    }
    return disks;
  }
}
