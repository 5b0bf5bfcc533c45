import { fileURLToPath } from "node:url";
import { describe, expect, it, vi } from "vitest";
import { SnapshotError } from "../../errors.js";
import type { Logger } from "../../logger.js";
import { XmlReportSource, parseXmlReport } from "../xml-report.js";

const fixturePath = fileURLToPath(new URL("./fixtures/report.xml", import.meta.url));

function testLogger(): Logger {
  return { debug: vi.fn(), log: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe("parseXmlReport", () => {
  it("should key flat summaries by serial number", () => {
    const disks = parseXmlReport(
      `<Hard_Disk_Sentinel>
        <Hard_Disk_Summary>
          <Hard_Disk_Model_ID>WDC WD10EZEX-00WN4A0</Hard_Disk_Model_ID>
          <Hard_Disk_Serial_Number>WD-WCC6Y5ABCDEF</Hard_Disk_Serial_Number>
          <Health>95 %</Health>
          <Tip></Tip>
        </Hard_Disk_Summary>
      </Hard_Disk_Sentinel>`,
      testLogger(),
    );

    expect([...disks.keys()]).toEqual(["WD-WCC6Y5ABCDEF"]);
    expect(disks.get("WD-WCC6Y5ABCDEF")).toEqual({
      Hard_Disk_Model_ID: "WDC WD10EZEX-00WN4A0",
      Hard_Disk_Serial_Number: "WD-WCC6Y5ABCDEF",
      Health: "95 %",
      Tip: "",
    });
  });

  it("should keep numeric-looking values as strings", () => {
    const disks = parseXmlReport(
      "<Hard_Disk_Summary><Hard_Disk_Number>1</Hard_Disk_Number><Hard_Disk_Serial_Number>0042</Hard_Disk_Serial_Number></Hard_Disk_Summary>",
      testLogger(),
    );

    expect(disks.get("0042")).toEqual({ Hard_Disk_Number: "1", Hard_Disk_Serial_Number: "0042" });
  });

  it("should skip summaries without a serial number", () => {
    const logger = testLogger();
    const disks = parseXmlReport(
      "<Root><Hard_Disk_Summary><Hard_Disk_Model_ID>Reader</Hard_Disk_Model_ID></Hard_Disk_Summary></Root>",
      logger,
    );

    expect(disks.size).toBe(0);
    expect(logger.warn).toHaveBeenCalledWith("Found disk without serial number, skipping");
  });

  it("should reject malformed XML", () => {
    expect(() => parseXmlReport("<Hard_Disk_Summary><Health>", testLogger())).toThrow(SnapshotError);
  });
});

describe("XmlReportSource", () => {
  it("should read an existing report without running the utility", async () => {
    const run = vi.fn();
    const source = new XmlReportSource({
      binaryPath: "/usr/sbin/hdsentinel",
      reportPath: "/tmp/unused.xml",
      xmlPath: fixturePath,
      logger: testLogger(),
      run,
    });

    const disks = await source.snapshot();

    expect(run).not.toHaveBeenCalled();
    expect([...disks.keys()]).toEqual(["S13PJ90S113060", "S13PJ90S113054"]);
    expect(disks.get("S13PJ90S113060")?.Description).toBe(
      "The status of the hard disk is PERFECT.Problematic or weak sectors were not found.",
    );
    expect(disks.get("S13PJ90S113054")?.Health).toBe("87 %");
  });

  it("should run the utility before reading its report", async () => {
    const run = vi.fn().mockResolvedValue("");
    const source = new XmlReportSource({
      binaryPath: "/usr/sbin/hdsentinel",
      reportPath: fixturePath,
      logger: testLogger(),
      run,
    });

    const disks = await source.snapshot();

    expect(run).toHaveBeenCalledWith("/usr/sbin/hdsentinel", ["-solid", "-xml", "-r", fixturePath]);
    expect(disks.size).toBe(2);
  });

  it("should fail when the utility cannot be run", async () => {
    const source = new XmlReportSource({
      binaryPath: "/usr/sbin/hdsentinel",
      reportPath: fixturePath,
      logger: testLogger(),
      run: vi.fn().mockRejectedValue(new Error("spawn /usr/sbin/hdsentinel ENOENT")),
    });

    await expect(source.snapshot()).rejects.toThrow(
      "Failed to run /usr/sbin/hdsentinel: spawn /usr/sbin/hdsentinel ENOENT",
    );
  });

  it("should fail when the report is missing", async () => {
    const source = new XmlReportSource({
      binaryPath: "/usr/sbin/hdsentinel",
      reportPath: "/tmp/unused.xml",
      xmlPath: "/nonexistent/report.xml",
      logger: testLogger(),
    });

    await expect(source.snapshot()).rejects.toBeInstanceOf(SnapshotError);
  });
});
