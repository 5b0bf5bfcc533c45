import { readFileSync } from "node:fs";
import { describe, expect, it, vi } from "vitest";
import type { Logger } from "../../logger.js";
import type { CommandRunner } from "../base.js";
import { DeviceScanSource, parseBlockDevices, parseDeviceReport } from "../device-scan.js";

const sdaReport = readFileSync(new URL("./fixtures/device-sda.txt", import.meta.url), "utf-8");

const sdbReport = sdaReport
  .replace("S13PJ90S113060", "S13PJ90S113054")
  .replace("/dev/sda", "/dev/sdb")
  .replace("Health       : 100 %", "Health       : 87 %");

function testLogger(): Logger {
  return { debug: vi.fn(), log: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe("parseDeviceReport", () => {
  it("should map report labels to summary attribute names", () => {
    expect(parseDeviceReport(sdaReport)).toEqual({
      Hard_Disk_Model_ID: "SAMSUNG HD103UJ",
      Hard_Disk_Serial_Number: "S13PJ90S113060",
      Firmware_Revision: "1AA01113",
      Total_Size: "953869 MB",
      Interface: "S-ATA Gen2, 3 Gbps",
      Current_Temperature: "38 °C",
      Maximum_temperature_during_entire_lifespan: "51 °C",
      Health: "100 %",
      Performance: "100 %",
      Power_on_time: "1834 days, 7 hours",
      Estimated_remaining_lifetime: "more than 1000 days",
      Lifetime_writes: "12.50 TB",
      Description: "The status of the hard disk is PERFECT. Problematic or weak sectors were not found.",
      Tip: "No actions needed",
    });
  });

  it("should handle windows line endings", () => {
    const attributes = parseDeviceReport(sdaReport.replace(/\n/g, "\r\n"));

    expect(attributes.Hard_Disk_Serial_Number).toBe("S13PJ90S113060");
    expect(attributes.Tip).toBe("No actions needed");
  });

  it("should return nothing for unrelated output", () => {
    expect(parseDeviceReport("No hard disk found.\n")).toEqual({});
  });
});

describe("parseBlockDevices", () => {
  it("should keep whole disks only", () => {
    expect(parseBlockDevices("sda   disk\nsr0   rom\nloop0 loop\nnvme0n1 disk\n\n")).toEqual([
      "sda",
      "nvme0n1",
    ]);
  });
});

describe("DeviceScanSource", () => {
  function runner(reports: Record<string, string>, devices = "sda disk\nsdb disk\nsr0 rom\n") {
    return vi.fn<CommandRunner>(async (file, args) => {
      if (file === "lsblk") {
        return devices;
      }
      const report = reports[args[1]];
      if (report === undefined) {
        throw new Error(`cannot open ${args[1]}`);
      }
      return report;
    });
  }

  it("should scan every disk and key results by serial number", async () => {
    const run = runner({ "/dev/sda": sdaReport, "/dev/sdb": sdbReport });
    const source = new DeviceScanSource({ binaryPath: "/usr/sbin/hdsentinel", logger: testLogger(), run });

    const disks = await source.snapshot();

    expect(run).toHaveBeenCalledWith("lsblk", ["-dn", "-o", "NAME,TYPE"]);
    expect(run).toHaveBeenCalledWith("/usr/sbin/hdsentinel", ["-dev", "/dev/sda"]);
    expect(run).toHaveBeenCalledWith("/usr/sbin/hdsentinel", ["-dev", "/dev/sdb"]);
    expect([...disks.keys()]).toEqual(["S13PJ90S113060", "S13PJ90S113054"]);
    expect(disks.get("S13PJ90S113054")?.Health).toBe("87 %");
    expect(disks.get("S13PJ90S113054")?.Hard_Disk_Device).toBe("/dev/sdb");
  });

  it("should leave out a disk that fails", async () => {
    const logger = testLogger();
    const run = runner({ "/dev/sda": sdaReport });
    const source = new DeviceScanSource({ binaryPath: "/usr/sbin/hdsentinel", logger, run });

    const disks = await source.snapshot();

    expect([...disks.keys()]).toEqual(["S13PJ90S113060"]);
    expect(logger.error).toHaveBeenCalledWith("Failed to read /dev/sdb: cannot open /dev/sdb");
  });

  it("should leave out a disk without serial number", async () => {
    const logger = testLogger();
    const run = runner({ "/dev/sda": sdaReport, "/dev/sdb": "HDD Model ID : Card Reader\n" });
    const source = new DeviceScanSource({ binaryPath: "/usr/sbin/hdsentinel", logger, run });

    const disks = await source.snapshot();

    expect(disks.size).toBe(1);
    expect(logger.warn).toHaveBeenCalledWith("No serial number reported for /dev/sdb, skipping");
  });

  it("should fail when block devices cannot be listed", async () => {
    const run = vi.fn<CommandRunner>().mockRejectedValue(new Error("lsblk: not found"));
    const source = new DeviceScanSource({ binaryPath: "/usr/sbin/hdsentinel", logger: testLogger(), run });

    await expect(source.snapshot()).rejects.toThrow("Failed to list block devices: lsblk: not found");
  });
});
