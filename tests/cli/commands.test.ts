import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, test, vi } from "vitest";
import { usageText } from "../../src/cli/help";
import { main } from "../../src/cli/main";
import { color } from "../../src/cli/ui";
import { SAMPLE_CONFIG } from "../../src/config/defaults";
import { FakeZfs } from "../helpers/fake-zfs";

const consoleLog = () => vi.mocked(console.log);
const consoleError = () => vi.mocked(console.error);

const loggedText = () => consoleLog().mock.calls.map((call) => String(call[0]));
const errorText = () => consoleError().mock.calls.map((call) => String(call[0]));

describe("main", () => {
  let tempDir: string;
  let counter = 0;
  let configFile: string;
  let logfile: string;
  let lockfile: string;

  beforeAll(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "backupz-cli-test-"));
  });

  afterAll(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});

    counter++;
    configFile = path.join(tempDir, `backupz-${counter}.json`);
    logfile = path.join(tempDir, `backupz-${counter}.log`);
    lockfile = path.join(tempDir, `backupz-${counter}.lock`);
    writeConfig({});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function writeConfig(overrides: Record<string, unknown>): void {
    const config = {
      dataset: "tank/backup",
      logfile,
      lockfile,
      syncers: {
        rsync: {
          binary: "/usr/bin/rsync",
          command: ["$binary", "@options", "$source", "$destination"],
          options: ["-a"],
        },
      },
      sources: {
        web: { type: "rsync", source: "root@web:/srv/www", destination: "web" },
        db: { type: "rsync", source: "root@db:/var/lib/db", destination: "db" },
      },
      retentions: {
        daily: { keep: 2 },
        weekly: { keep: 4, strategy: "timestamp" },
      },
      ...overrides,
    };
    fs.writeFileSync(configFile, JSON.stringify(config));
  }

  const readLog = () => fs.readFileSync(logfile, "utf8");

  describe("verbs without configuration", () => {
    test("treats a missing verb as a usage error", async () => {
      expect(await main([])).toBe(1);
      expect(loggedText()).toEqual([]);
      expect(errorText()).toEqual([`${color.red("Error:")} No verb given\n`, usageText()]);
    });

    test("prints usage for help", async () => {
      expect(await main(["help"])).toBe(0);
      expect(await main(["--help"])).toBe(0);
      expect(loggedText()).toEqual([usageText(), usageText()]);
    });

    test("prints the version", async () => {
      expect(await main(["version"])).toBe(0);
      expect(loggedText()).toEqual([`${color.cyan("backupz")} ${color.dim("v1.0.0")}`]);
    });

    test("prints the sample configuration as JSON", async () => {
      expect(await main(["sample_conf"])).toBe(0);
      expect(JSON.parse(loggedText()[0] ?? "")).toEqual(SAMPLE_CONFIG);
    });

    test("rejects unknown verbs with usage", async () => {
      expect(await main(["backup"])).toBe(1);
      expect(errorText()).toEqual([`${color.red("Error:")} Unknown verb: backup\n`, usageText()]);
    });
  });

  describe("sync", () => {
    test("syncs every source under the lock", async () => {
      const zfs = new FakeZfs("tank/backup");

      expect(await main(["sync", "-c", configFile], zfs)).toBe(0);

      expect(zfs.calls).toEqual([
        ["zfs", "get", "-H", "-o", "value", "mountpoint", "tank/backup"],
        ["/usr/bin/rsync", "-a", "root@web:/srv/www", "/tank/backup/web"],
        ["/usr/bin/rsync", "-a", "root@db:/var/lib/db", "/tank/backup/db"],
      ]);
      expect(fs.existsSync(lockfile)).toBe(false);
      expect(readLog()).toContain(" INFO  Syncing root@web:/srv/www to web\n");
      expect(readLog()).toContain(" INFO  Synced 2 source(s)\n");
    });

    test("syncs named sources only", async () => {
      const zfs = new FakeZfs("tank/backup");

      expect(await main(["sync", "-c", configFile, "db"], zfs)).toBe(0);

      expect(zfs.calls.slice(1)).toEqual([["/usr/bin/rsync", "-a", "root@db:/var/lib/db", "/tank/backup/db"]]);
    });

    test("logs a failing source, syncs the rest and exits 0", async () => {
      const zfs = new FakeZfs("tank/backup").failOn(["/usr/bin/rsync"], { stderr: "connection refused", exitCode: 12 });

      expect(await main(["sync", "-c", configFile], zfs)).toBe(0);

      expect(zfs.calls).toHaveLength(3);
      expect(readLog()).toContain(" ERROR Error syncing root@web:/srv/www to web\n");
      expect(readLog()).toContain(" ERROR   Exit code: 12\n");
      expect(readLog()).toContain(" WARN  1 of 2 source(s) failed: web\n");
      expect(readLog()).not.toContain("Synced 2 source(s)");
      expect(fs.existsSync(lockfile)).toBe(false);
    });

    test("runs nothing for an unknown source", async () => {
      const zfs = new FakeZfs("tank/backup");

      expect(await main(["sync", "-c", configFile, "web", "mail"], zfs)).toBe(1);

      expect(zfs.calls).toEqual([]);
      expect(errorText()).toEqual([`${color.red("Error:")} Unknown source: mail\n`, usageText()]);
    });

    test("requires a configuration file", async () => {
      expect(await main(["sync"], new FakeZfs("tank/backup"))).toBe(1);
      expect(errorText()[0]).toBe(`${color.red("Error:")} No configuration file specified, use -c <file>\n`);
    });

    test("rejects unknown options with usage", async () => {
      expect(await main(["sync", "--bogus"], new FakeZfs("tank/backup"))).toBe(1);
      expect(errorText()[0]).toContain("Unknown option '--bogus'");
      expect(errorText()[1]).toBe(usageText());
    });

    test("refuses to run while another process holds the lock", async () => {
      const zfs = new FakeZfs("tank/backup");
      fs.writeFileSync(lockfile, `${process.ppid}\n`);

      expect(await main(["sync", "-c", configFile], zfs)).toBe(1);

      expect(zfs.calls).toEqual([]);
      expect(errorText()).toEqual([
        `${color.red("Error:")} Another backupz process (pid ${process.ppid}) holds ${lockfile}`,
      ]);
      expect(fs.readFileSync(lockfile, "utf8")).toBe(`${process.ppid}\n`);
    });

    test("reports a log file that cannot be opened", async () => {
      const badLog = path.join(tempDir, "missing-dir", "backupz.log");
      writeConfig({ logfile: badLog });

      expect(await main(["sync", "-c", configFile], new FakeZfs("tank/backup"))).toBe(1);
      expect(errorText()[0]).toContain(`Can't open log file: ${badLog}`);
    });
  });

  describe("snapshot", () => {
    test("rotates the named retention level", async () => {
      const zfs = new FakeZfs("tank/backup").addSnapshot("daily.0").addSnapshot("daily.1");

      expect(await main(["snapshot", "-c", configFile, "daily"], zfs)).toBe(0);

      expect(zfs.mutations()).toEqual([
        ["zfs", "destroy", "tank/backup@daily.1"],
        ["zfs", "rename", "tank/backup@daily.0", "tank/backup@daily.1"],
        ["zfs", "snapshot", "tank/backup@daily.0"],
      ]);
      expect(readLog()).toContain(" INFO  Snapshot daily.0 created (generation)\n");
      expect(fs.existsSync(lockfile)).toBe(false);
    });

    test("changes nothing on a dry run", async () => {
      const zfs = new FakeZfs("tank/backup").addSnapshot("daily.0").addSnapshot("daily.1");

      expect(await main(["snapshot", "-c", configFile, "--dry-run", "daily"], zfs)).toBe(0);

      expect(zfs.mutations()).toEqual([]);
      expect(readLog()).toContain(" INFO  [DRY RUN] Would destroy snapshot daily.1\n");
    });

    test("requires a retention name", async () => {
      expect(await main(["snapshot", "-c", configFile], new FakeZfs("tank/backup"))).toBe(1);
      expect(errorText()).toEqual([`${color.red("Error:")} Snapshot name not specified\n`, usageText()]);
    });

    test("rejects unknown retention levels without usage", async () => {
      const zfs = new FakeZfs("tank/backup");

      expect(await main(["snapshot", "-c", configFile, "hourly"], zfs)).toBe(1);

      expect(zfs.calls).toEqual([]);
      expect(errorText()).toEqual([`${color.red("Error:")} Unknown retention level: hourly`]);
      expect(fs.existsSync(lockfile)).toBe(false);
    });

    test("exits 1 when a zfs command fails", async () => {
      const zfs = new FakeZfs("tank/backup")
        .addSnapshot("daily.0")
        .addSnapshot("daily.1")
        .failOn(["zfs", "destroy"]);

      expect(await main(["snapshot", "-c", configFile, "daily"], zfs)).toBe(1);

      expect(zfs.shortNames()).toEqual(["daily.0", "daily.1"]);
      expect(errorText().at(-1)).toBe(`${color.red("Error:")} Error destroying snapshot: daily.1`);
      expect(readLog()).toContain(" ERROR   Command: zfs destroy tank/backup@daily.1\n");
    });
  });

  describe("list", () => {
    test("lists source names", async () => {
      expect(await main(["list", "-c", configFile, "sources"])).toBe(0);
      expect(loggedText()).toEqual(["web", "db"]);
    });

    test("lists retentions as JSON", async () => {
      expect(await main(["list", "-c", configFile, "--format", "json", "retentions"])).toBe(0);
      expect(JSON.parse(loggedText()[0] ?? "")).toEqual({
        daily: { keep: 2 },
        weekly: { keep: 4, strategy: "timestamp" },
      });
    });

    test("reports snapshots as JSON", async () => {
      const zfs = new FakeZfs("tank/backup").addSnapshot("daily.0").addSnapshot("manual");

      expect(await main(["list", "-c", configFile, "--format", "json"], zfs)).toBe(0);

      const report: unknown = JSON.parse(loggedText()[0] ?? "");
      expect(report).toMatchObject({
        pool: { name: "tank/backup" },
        managed: [{ shortName: "daily.0", retention: "daily" }],
        unmanaged: [{ shortName: "manual", retention: "manual" }],
      });
      expect(fs.existsSync(lockfile)).toBe(false);
    });

    test("rejects unknown list types", async () => {
      expect(await main(["list", "-c", configFile, "pools"])).toBe(1);
      expect(errorText()[0]).toBe(`${color.red("Error:")} Unknown list type: pools\n`);
    });
  });
});
