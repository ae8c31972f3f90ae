import { execFileSync, spawnSync } from "node:child_process";
import { mkdir, mkdtemp, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const repoRoot = path.resolve(__dirname, "../../..");
const tsxBin = path.resolve(repoRoot, "node_modules/.bin/tsx");
const cliMain = path.resolve(repoRoot, "apps/cli/src/main.ts");

const T0 = Date.UTC(2026, 1, 11, 10, 0, 0);

function buildEventLog(): string {
  const stageInfo = { "Stage ID": 0, "Stage Attempt ID": 0, "Stage Name": "count at Report.scala:12", "Number of Tasks": 2 };
  const taskInfo = (taskId: number, launch: number, finish: number) => ({
    "Task ID": taskId,
    Index: taskId,
    Attempt: 0,
    "Launch Time": launch,
    "Finish Time": finish,
    "Executor ID": "1",
    Host: "worker-1",
  });
  const rows: Array<Record<string, unknown>> = [
    { Event: "SparkListenerApplicationStart", "App Name": "cli-app", "App ID": "app-0100", Timestamp: T0, User: "analyst" },
    { Event: "SparkListenerExecutorAdded", Timestamp: T0, "Executor ID": "1", "Executor Info": { Host: "worker-1", "Total Cores": 2 } },
    { Event: "SparkListenerJobStart", "Job ID": 0, "Submission Time": T0 + 500, "Stage Infos": [stageInfo], "Stage IDs": [0] },
    { Event: "SparkListenerStageSubmitted", "Stage Info": { ...stageInfo, "Submission Time": T0 + 600 } },
    {
      Event: "SparkListenerTaskEnd",
      "Stage ID": 0,
      "Stage Attempt ID": 0,
      "Task End Reason": { Reason: "Success" },
      "Task Info": taskInfo(0, T0 + 1_000, T0 + 2_000),
      "Task Metrics": { "Executor Run Time": 900, "JVM GC Time": 10 },
    },
    {
      Event: "SparkListenerTaskEnd",
      "Stage ID": 0,
      "Stage Attempt ID": 0,
      "Task End Reason": { Reason: "ExceptionFailure", "Class Name": "java.lang.IllegalStateException", Description: "boom" },
      "Task Info": taskInfo(1, T0 + 1_001, T0 + 1_501),
    },
    {
      Event: "SparkListenerStageCompleted",
      "Stage Info": {
        ...stageInfo,
        "Submission Time": T0 + 600,
        "Completion Time": T0 + 3_000,
        "Failure Reason": "Job aborted due to stage failure",
      },
    },
    {
      Event: "SparkListenerJobEnd",
      "Job ID": 0,
      "Completion Time": T0 + 3_100,
      "Job Result": { Result: "JobFailed", Exception: { Message: "Job aborted due to stage failure" } },
    },
    { Event: "SparkListenerApplicationEnd", Timestamp: T0 + 4_000 },
  ];
  return [...rows.map((row) => JSON.stringify(row)), "{broken"].join("\n");
}

async function buildFixture(): Promise<{ configPath: string; logDir: string; logPath: string }> {
  const root = await mkdtemp(path.join(os.tmpdir(), "eventscope-cli-"));
  const logDir = path.join(root, "spark-events");
  await mkdir(logDir);
  const logPath = path.join(logDir, "app-0100");
  await writeFile(logPath, buildEventLog(), "utf8");
  return { configPath: path.join(root, "config", "config.toml"), logDir, logPath };
}

function runCli(args: string[]): string {
  return execFileSync(tsxBin, [cliMain, ...args], {
    cwd: repoRoot,
    encoding: "utf8",
    env: { ...process.env },
  }).trim();
}

function runCliFailure(args: string[]): { status: number | null; stderrLines: string[] } {
  const result = spawnSync(tsxBin, [cliMain, ...args], { cwd: repoRoot, encoding: "utf8", env: { ...process.env } });
  return {
    status: result.status,
    stderrLines: result.stderr
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter(Boolean),
  };
}

function tableCells(line: string): string[] {
  return line.trimEnd().split(/ {3,}/);
}

describe("cli", () => {
  it("prints application, job and stage views", async () => {
    const fixture = await buildFixture();
    const base = ["--config", fixture.configPath];

    const summary = JSON.parse(runCli([...base, "summary", fixture.logPath, "--json"])) as {
      application: { appId: string; status: string; duration: string; totals: { taskCounts: Record<string, number> } };
      diagnostics: { linesRead: number; decodeFailureCount: number };
      load: { status: string };
    };
    expect(summary.application.appId).toBe("app-0100");
    expect(summary.application.status).toBe("FINISHED");
    expect(summary.application.duration).toBe("4.0 s");
    expect(summary.application.totals.taskCounts).toEqual({ RUNNING: 0, SUCCESS: 1, FAILED: 1, KILLED: 0 });
    expect(summary.diagnostics.linesRead).toBe(10);
    expect(summary.diagnostics.decodeFailureCount).toBe(1);
    expect(summary.load.status).toBe("complete");

    const jobsOutput = runCli([...base, "jobs", fixture.logPath, "--llm"]).split("\n");
    expect(jobsOutput[0]).toBe("## jobs");
    expect(tableCells(jobsOutput[3] ?? "")).toEqual([
      "0",
      "Failed",
      "2026-02-11T10:00:00.500Z",
      "2.6 s",
      "1/2 (1 failed)",
      "0/1",
      "count at Report.scala:12",
    ]);

    const stage = JSON.parse(runCli([...base, "stage", fixture.logPath, "0", "--json"])) as {
      stage: { status: string; progressPct: number | null; failureReason: string };
      tasks: Array<{ taskId: number; failureKind: string | null }>;
      aggregate: { duration: { min: number; median: number; max: number } };
    };
    expect(stage.stage.status).toBe("FAILED");
    expect(stage.stage.progressPct).toBeNull();
    expect(stage.stage.failureReason).toBe("Job aborted due to stage failure");
    expect(stage.tasks.map((task) => [task.taskId, task.failureKind])).toEqual([
      [0, null],
      [1, "exception"],
    ]);
    expect(stage.aggregate.duration).toEqual({ min: 500, median: 750, max: 1_000 });
  });

  it("filters and limits tasks, honoring config set", async () => {
    const fixture = await buildFixture();
    const base = ["--config", fixture.configPath];

    const limited = JSON.parse(runCli([...base, "tasks", fixture.logPath, "--stage", "0", "--limit", "1", "--json"])) as {
      total: number;
      tasks: Array<{ taskId: number }>;
    };
    expect(limited.total).toBe(2);
    expect(limited.tasks.map((task) => task.taskId)).toEqual([0]);

    expect(runCli([...base, "config", "set", "display.taskListLimit", "1"])).toBe("updated display.taskListLimit");
    const config = JSON.parse(runCli([...base, "config", "get", "--json"])) as { display: { taskListLimit: number } };
    expect(config.display.taskListLimit).toBe(1);

    const defaulted = JSON.parse(runCli([...base, "tasks", fixture.logPath, "--json"])) as { total: number; tasks: unknown[] };
    expect(defaulted.total).toBe(2);
    expect(defaulted.tasks).toHaveLength(1);
  });

  it("lists event logs in a directory", async () => {
    const fixture = await buildFixture();
    const logs = JSON.parse(runCli(["--config", fixture.configPath, "list", fixture.logDir, "--json"])) as Array<{
      id: string;
      kind: string;
      inProgress: boolean;
    }>;
    expect(logs.map((log) => [log.id, log.kind, log.inProgress])).toEqual([["app-0100", "file", false]]);
  });

  it("exits 1 with a message for unknown stages, bad config keys and unreadable logs", async () => {
    const fixture = await buildFixture();
    const base = ["--config", fixture.configPath];

    const unknownStage = runCliFailure([...base, "stage", fixture.logPath, "9"]);
    expect(unknownStage.status).toBe(1);
    expect(unknownStage.stderrLines).toContain("unknown stage: 9");

    const unknownAttempt = runCliFailure([...base, "stage", fixture.logPath, "0", "4"]);
    expect(unknownAttempt.stderrLines).toContain("unknown stage attempt: 0.4");

    const badKey = runCliFailure([...base, "config", "set", "display.colour", "red"]);
    expect(badKey.status).toBe(1);
    expect(badKey.stderrLines).toContain("unknown config key: display.colour");

    const missing = path.join(fixture.logDir, "missing");
    const missingLog = runCliFailure([...base, "summary", missing]);
    expect(missingLog.status).toBe(1);
    expect(missingLog.stderrLines.some((line) => line.startsWith(`${missing}: cannot open event log:`))).toBe(true);
  });

  it("shows usage for --help and no-args", () => {
    const helpOutput = runCli(["--help"]);
    expect(helpOutput).toContain("Usage: eventscope");
    expect(helpOutput).toContain("summary [options] <log>");

    const noArgsOutput = runCli([]);
    expect(noArgsOutput).toContain("Usage: eventscope");
  });
});
