import { describe, expect, test } from "vitest";
import { buildSyncCommands, runSync, selectSources } from "../../src/core/sync/dispatcher";
import { ConfigError, UsageError } from "../../src/utils/errors";
import { makeConfig, makeContext } from "../helpers/context";
import { FakeZfs } from "../helpers/fake-zfs";

const WEB_COMMAND = ["/usr/bin/rsync", "-a", "--delete", "root@web:/srv/www", "/tank/backup/web"];
const DB_COMMAND = [
  "/usr/bin/rsync",
  "-a",
  "--delete",
  "--exclude=tmp",
  "root@db:/var/lib/db",
  "/tank/backup/db",
];

describe("selectSources", () => {
  const configured = ["web", "db", "mail"];

  test("selects everything for an empty request", () => {
    expect(selectSources(configured, [])).toEqual(["web", "db", "mail"]);
  });

  test("keeps configuration order and drops duplicates", () => {
    expect(selectSources(configured, ["mail", "web", "mail"])).toEqual(["web", "mail"]);
  });

  test("rejects unknown names", () => {
    expect(() => selectSources(configured, ["web", "nope"])).toThrow(UsageError);
    expect(() => selectSources(configured, ["web", "nope"])).toThrow("Unknown source: nope");
  });
});

describe("buildSyncCommands", () => {
  test("puts syncer options before the source's extra options", () => {
    const ctx = makeContext(new FakeZfs("tank/backup"));
    const commands = buildSyncCommands(ctx, ["db"], "/tank/backup");

    expect(commands).toEqual([
      { name: "db", source: "root@db:/var/lib/db", destination: "db", argv: DB_COMMAND },
    ]);
  });

  test("fails on a source whose syncer type is missing", () => {
    const config = makeConfig();
    config.sources.ftp = { type: "lftp", source: "ftp://host/", destination: "ftp" };
    const ctx = makeContext(new FakeZfs("tank/backup"), { config });

    expect(() => buildSyncCommands(ctx, ["ftp"], "/tank/backup")).toThrow(ConfigError);
    expect(() => buildSyncCommands(ctx, ["ftp"], "/tank/backup")).toThrow("Unknown syncer type: ftp: lftp");
  });

  test("does not take inherited object keys for a syncer type", async () => {
    const zfs = new FakeZfs("tank/backup");
    const config = makeConfig();
    config.sources.web = { type: "constructor", source: "root@web:/srv/www", destination: "web" };
    const ctx = makeContext(zfs, { config });

    expect(() => buildSyncCommands(ctx, ["web"], "/tank/backup")).toThrow(ConfigError);
    await expect(runSync(ctx, [], { mountpoint: "/tank/backup" })).rejects.toThrow(
      "Unknown syncer type: web: constructor",
    );
    expect(zfs.calls).toEqual([]);
  });
});

describe("runSync", () => {
  test("runs every source in configuration order under the dataset mountpoint", async () => {
    const zfs = new FakeZfs("tank/backup");
    const ctx = makeContext(zfs);

    const results = await runSync(ctx, []);

    expect(zfs.calls).toEqual([
      ["zfs", "get", "-H", "-o", "value", "mountpoint", "tank/backup"],
      WEB_COMMAND,
      DB_COMMAND,
    ]);
    expect(results.map((r) => [r.name, r.success, r.exitCode])).toEqual([
      ["web", true, 0],
      ["db", true, 0],
    ]);
  });

  test("runs only the selected sources", async () => {
    const zfs = new FakeZfs("tank/backup");
    const results = await runSync(makeContext(zfs), ["db", "db"], { mountpoint: "/tank/backup" });

    expect(zfs.calls).toEqual([DB_COMMAND]);
    expect(results.map((r) => r.name)).toEqual(["db"]);
  });

  test("runs nothing when a requested source is unknown", async () => {
    const zfs = new FakeZfs("tank/backup");

    await expect(runSync(makeContext(zfs), ["web", "missing"])).rejects.toThrow("Unknown source: missing");
    expect(zfs.calls).toEqual([]);
  });

  test("runs nothing when any selected source has a bad syncer", async () => {
    const zfs = new FakeZfs("tank/backup");
    const config = makeConfig();
    config.sources.zz = { type: "nope", source: "x", destination: "zz" };

    await expect(
      runSync(makeContext(zfs, { config }), [], { mountpoint: "/tank/backup" }),
    ).rejects.toThrow("Unknown syncer type: zz: nope");
    expect(zfs.calls).toEqual([]);
  });

  test("keeps going after a failing source and logs the failure", async () => {
    const zfs = new FakeZfs("tank/backup").failOn(["/usr/bin/rsync"], {
      stdout: "sending incremental file list",
      stderr: "rsync: connection unexpectedly closed",
      exitCode: 255,
    });
    const ctx = makeContext(zfs);

    const results = await runSync(ctx, [], { mountpoint: "/tank/backup" });

    expect(zfs.calls).toEqual([WEB_COMMAND, DB_COMMAND]);
    expect(results.map((r) => [r.name, r.success, r.exitCode])).toEqual([
      ["web", false, 255],
      ["db", true, 0],
    ]);
    expect(ctx.logger.records.filter((r) => r.level === "error")).toEqual([
      {
        level: "error",
        lines: [
          "Error syncing root@web:/srv/www to web",
          "  Command: /usr/bin/rsync -a --delete root@web:/srv/www /tank/backup/web",
          "  Exit code: 255",
          "  STDOUT:",
          "    sending incremental file list",
          "  STDERR:",
          "    rsync: connection unexpectedly closed",
        ],
      },
    ]);
  });

  test("passes the configured timeout to the executor", async () => {
    const zfs = new FakeZfs("tank/backup");
    const ctx = makeContext(zfs, { config: makeConfig({ commandTimeout: 90 }) });

    await runSync(ctx, ["web"], { mountpoint: "/tank/backup" });

    expect(zfs.options).toEqual([{ timeout: 90_000 }]);
  });

  test("logs commands without running them on a dry run", async () => {
    const zfs = new FakeZfs("tank/backup");
    const ctx = makeContext(zfs, { dryRun: true });

    const results = await runSync(ctx, ["web"], { mountpoint: "/tank/backup" });

    expect(zfs.calls).toEqual([]);
    expect(results).toEqual([{ name: "web", command: WEB_COMMAND, success: true, exitCode: 0, durationMs: 0 }]);
    expect(ctx.logger.messages("info")).toEqual([
      "[DRY RUN] Would sync root@web:/srv/www to web: /usr/bin/rsync -a --delete root@web:/srv/www /tank/backup/web",
    ]);
  });

  test("does nothing without sources", async () => {
    const zfs = new FakeZfs("tank/backup");
    const results = await runSync(makeContext(zfs, { config: makeConfig({ sources: {} }) }), []);

    expect(results).toEqual([]);
    expect(zfs.calls).toEqual([]);
  });
});
