import { mkdirSync, mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { beforeEach, describe, expect, it } from "vitest";
import { USAGE, runCli, type CliIo } from "./command.js";
import { silentLogger } from "./logger.js";

const burst = [
  "2024-01-01T10:00:00 ip=10.0.0.9 action=connect port=22",
  "2024-01-01T10:00:10 ip=10.0.0.9 action=connect port=22",
  "2024-01-01T10:00:20 ip=10.0.0.9 action=connect port=22",
  "2024-01-01T10:00:30 ip=10.0.0.9 action=connect port=22",
  "2024-01-01T10:00:40 ip=10.0.0.9 action=connect port=22",
].join("\n");

const burstAlert = "- [HIGH] repeated-ip (10.0.0.9): 5 connection attempts from 10.0.0.9 within 60s (limit 3)";

describe("runCli", () => {
  let cwd: string;
  let stdout: string[];
  let stderr: string[];
  let io: CliIo;

  beforeEach(() => {
    cwd = mkdtempSync(join(tmpdir(), "vlog-cli-test-"));
    mkdirSync(join(cwd, "logs"));
    stdout = [];
    stderr = [];
    io = {
      stdout: (text) => stdout.push(text),
      stderr: (text) => stderr.push(text),
      env: {},
      cwd,
      logger: silentLogger,
    };
  });

  it("requires exactly one folder", async () => {
    expect(await runCli([], io)).toBe(2);
    expect(stderr.join("")).toBe(`❌ Expected exactly one log folder\n\n${USAGE}`);
  });

  it("rejects unknown options", async () => {
    expect(await runCli(["logs", "--bogus"], io)).toBe(2);
    expect(stderr.join("").startsWith("❌ ")).toBe(true);
    expect(stdout).toEqual([]);
  });

  it("prints help", async () => {
    expect(await runCli(["--help"], io)).toBe(0);
    expect(stdout).toEqual([USAGE]);
  });

  it("exits with 1 when the folder does not exist", async () => {
    expect(await runCli(["missing"], io)).toBe(1);
    expect(stderr).toEqual([`❌ Log folder does not exist: ${join(cwd, "missing")}\n`]);
  });

  it("prints the summary when no section is chosen", async () => {
    writeFileSync(join(cwd, "logs", "a.vlog"), "2024-01-01T10:00:00 user=alice action=login ip=10.0.0.5\n");

    expect(await runCli(["logs"], io)).toBe(0);
    expect(stdout.join("").startsWith("## Summary\n- Files: 1\n- Total log entries: 1\n")).toBe(true);
  });

  it("joins the chosen sections", async () => {
    writeFileSync(join(cwd, "logs", "a.vlog"), "user=alice action=login\n");

    expect(await runCli(["logs", "--alerts", "--timeline"], io)).toBe(0);
    expect(stdout.join("")).toBe(
      "## Timeline\n(no timestamp)  UserActivity  alice  login  [a.vlog:1]\n\n## Alerts\nNo anomalies detected.\n"
    );
  });

  it("applies a config file", async () => {
    writeFileSync(join(cwd, "logs", "net.vlog"), burst);
    writeFileSync(join(cwd, "rules.json"), JSON.stringify({ rules: { repeatedIp: { maxAttempts: 3 } } }));

    expect(await runCli(["logs", "--alerts", "--config", "rules.json"], io)).toBe(0);
    expect(stdout.join("").split("\n")).toContain(burstAlert);
  });

  it("finds the config file through .env", async () => {
    writeFileSync(join(cwd, "logs", "net.vlog"), burst);
    writeFileSync(join(cwd, "rules.json"), JSON.stringify({ rules: { repeatedIp: { maxAttempts: 3 } } }));
    writeFileSync(join(cwd, ".env"), "VLOG_CONFIG=rules.json\n");

    expect(await runCli(["logs", "--alerts"], io)).toBe(0);
    expect(io.env.VLOG_CONFIG).toBe("rules.json");
    expect(stdout.join("").split("\n")).toContain(burstAlert);
  });

  it("exits with 1 when .env cannot be read", async () => {
    mkdirSync(join(cwd, ".env"));

    expect(await runCli(["logs"], io)).toBe(1);
    expect(stdout).toEqual([]);
    expect(stderr).toHaveLength(1);
    expect(stderr[0].startsWith(`❌ Cannot read env file ${join(cwd, ".env")}: `)).toBe(true);
  });

  it("exits with 1 on an invalid config", async () => {
    writeFileSync(join(cwd, "rules.json"), JSON.stringify({ rules: { repeatedIp: { maxAttempts: -1 } } }));

    expect(await runCli(["logs", "--config", "rules.json"], io)).toBe(1);
    expect(stderr.join("").startsWith(`❌ Invalid ${join(cwd, "rules.json")}: rules.repeatedIp.maxAttempts`)).toBe(true);
  });

  it("prints the result bundle as JSON", async () => {
    writeFileSync(join(cwd, "logs", "a.vlog"), "2024-01-01T10:00:00 user=alice action=login ip=10.0.0.5\n");

    expect(await runCli(["logs", "--json"], io)).toBe(0);
    const bundle = JSON.parse(stdout.join(""));
    expect(bundle.files).toEqual(["a.vlog"]);
    expect(bundle.timeline[0]).toMatchObject({
      id: "a.vlog:1",
      timestamp: "2024-01-01T10:00:00.000Z",
      category: "UserActivity",
      subject: "alice",
      action: "login",
    });
    expect(bundle.anomalies).toEqual([]);
  });
});
