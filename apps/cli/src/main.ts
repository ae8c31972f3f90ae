#!/usr/bin/env node
import { Command } from "commander";
import type { ApplicationSnapshot, DurationStats, ProgressEvent, StageDetail, TaskView } from "@eventscope/contracts";
import {
  DEFAULT_CONFIG_PATH,
  EventLogSession,
  discoverEventLogs,
  formatBytes,
  formatDuration,
  formatPct,
  formatTimestamp,
  loadConfig,
  saveConfig,
  setConfigValue,
} from "@eventscope/core";
import { runServer } from "@eventscope/server";

interface OutputOptions {
  json?: boolean;
  llm?: boolean;
}

function printTable(rows: string[][]): void {
  if (rows.length === 0) return;
  const header = rows[0];
  if (!header) return;
  const widths = header.map((_, col) => Math.max(...rows.map((row) => (row[col] ?? "").length)));
  for (const [idx, row] of rows.entries()) {
    const line = row
      .map((cell, col) => (cell ?? "").padEnd(widths[col] ?? 0))
      .join(idx === 0 ? " | " : "   ");
    console.log(line);
    if (idx === 0) {
      console.log(widths.map((width) => "-".repeat(width)).join("-+-"));
    }
  }
}

function printNamedTable(section: string, rows: string[][], opts: { llm?: boolean } = {}): void {
  if (rows.length === 0) return;
  if (opts.llm) {
    console.log(`\n## ${section}`);
  } else {
    console.log(`\n${section}:`);
  }
  printTable(rows);
}

function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

function orDash(value: number | string | null): string {
  return value === null ? "-" : String(value);
}

function parseIndex(value: string, name: string): number {
  if (!/^\d+$/.test(value)) {
    throw new Error(`invalid ${name}: ${value}`);
  }
  return Number(value);
}

function configPathOf(): string {
  return program.opts<{ config: string }>().config;
}

async function loadSession(logPath: string): Promise<EventLogSession> {
  const session = await EventLogSession.fromConfigPath(configPathOf());
  if (program.opts<{ progress?: boolean }>().progress) {
    session.on("progress", (event: ProgressEvent) => {
      console.error(`read ${event.linesRead} lines (${event.eventsApplied} applied, ${event.linesSkipped} skipped)`);
    });
  }
  await session.load(logPath);
  return session;
}

async function loadSnapshot(logPath: string): Promise<ApplicationSnapshot> {
  return (await loadSession(logPath)).snapshot();
}

function durationRow(label: string, stats: DurationStats): string[] {
  return [label, formatDuration(stats.min), formatDuration(stats.median), formatDuration(stats.max)];
}

function taskRows(tasks: readonly TaskView[]): string[][] {
  return [
    ["task", "index", "attempt", "stage", "executor", "host", "status", "duration", "gc", "spill", "failure"],
    ...tasks.map((task) => [
      String(task.taskId),
      orDash(task.index),
      orDash(task.attempt),
      `${task.stageId}.${task.stageAttemptId}`,
      task.executorId,
      task.host,
      task.statusLabel,
      task.duration,
      task.gcTime,
      task.spillBytes,
      task.failureKind ?? "-",
    ]),
  ];
}

function renderStageDetail(detail: StageDetail, llm: boolean): void {
  const { stage, aggregate } = detail;
  printNamedTable(
    "stage",
    [
      ["field", "value"],
      ["stage", `${stage.stageId}.${stage.attemptId}`],
      ["name", stage.name],
      ["status", stage.statusLabel],
      ["submitted", formatTimestamp(stage.submissionTime)],
      ["duration", stage.duration],
      ["tasks", stage.tasksLabel],
      ["progress", formatPct(stage.progressPct)],
      ["jobs", stage.jobIds.length > 0 ? stage.jobIds.join(",") : "-"],
      ["input", stage.inputBytes],
      ["output", stage.outputBytes],
      ["shuffle_read", stage.shuffleReadBytes],
      ["shuffle_write", stage.shuffleWriteBytes],
      ["spill", stage.spillBytes],
      ["gc", stage.gcTime],
      ["failure", stage.failureReason ?? "-"],
    ],
    { llm },
  );
  printNamedTable("task_duration", [["metric", "min", "median", "max"], durationRow("duration", aggregate.duration)], {
    llm,
  });
  if (detail.rdds.length > 0) {
    printNamedTable(
      "rdds",
      [
        ["rdd", "name", "partitions", "cached", "storage", "memory", "disk"],
        ...detail.rdds.map((rdd) => [
          String(rdd.rddId),
          rdd.name,
          String(rdd.numPartitions),
          String(rdd.numCachedPartitions),
          rdd.storageLevel,
          formatBytes(rdd.memorySize),
          formatBytes(rdd.diskSize),
        ]),
      ],
      { llm },
    );
  }
  printNamedTable("tasks", taskRows(detail.tasks), { llm });
}

const program = new Command();
program.name("eventscope").description("Inspect Spark application event logs");
program.option("--config <path>", "Config path", process.env.EVENTSCOPE_CONFIG ?? DEFAULT_CONFIG_PATH);
program.option("--progress", "Report load progress on stderr");
program.addHelpText(
  "after",
  `
Examples:
  $ eventscope summary ./app-20260211100000-0001
  $ eventscope jobs ./app-20260211100000-0001 --llm
  $ eventscope stage ./eventlog_v2_app-0001 3
  $ eventscope tasks ./app-0001 --stage 3 --limit 20 --json
  $ eventscope list /var/log/spark-events
  $ eventscope serve ./app-0001 --port 8788
`,
);

program
  .command("summary <log>")
  .description("Application overview and totals")
  .option("--json", "JSON output")
  .option("--llm", "Deterministic table output for LLM agents")
  .action(async (logPath: string, opts: OutputOptions) => {
    const snapshot = await loadSnapshot(logPath);
    const { application, diagnostics } = snapshot;
    if (opts.json) {
      printJson({ application, diagnostics, load: snapshot.load });
      return;
    }

    const llm = opts.llm === true;
    const { totals } = application;
    printNamedTable(
      "application",
      [
        ["app_id", "name", "user", "spark", "status", "started", "duration"],
        [
          application.appId,
          application.name,
          application.user,
          application.sparkVersion,
          application.status,
          formatTimestamp(application.startTime),
          application.duration,
        ],
      ],
      { llm },
    );
    printNamedTable(
      "totals",
      [
        ["entity", "total", "breakdown"],
        [
          "jobs",
          String(snapshot.jobs.length),
          `succeeded=${totals.jobCounts.SUCCEEDED} failed=${totals.jobCounts.FAILED} running=${totals.jobCounts.RUNNING}`,
        ],
        [
          "stages",
          String(snapshot.stages.length),
          `complete=${totals.stageCounts.COMPLETE} failed=${totals.stageCounts.FAILED} skipped=${totals.stageCounts.SKIPPED} active=${totals.stageCounts.ACTIVE} pending=${totals.stageCounts.PENDING}`,
        ],
        [
          "tasks",
          String(snapshot.tasks.length),
          `success=${totals.taskCounts.SUCCESS} failed=${totals.taskCounts.FAILED} killed=${totals.taskCounts.KILLED} running=${totals.taskCounts.RUNNING}`,
        ],
        [
          "executors",
          String(snapshot.executors.length),
          `active=${totals.executorCounts.ACTIVE} removed=${totals.executorCounts.REMOVED}`,
        ],
      ],
      { llm },
    );
    printNamedTable(
      "load",
      [
        ["lines_read", "events_applied", "lines_skipped", "warnings"],
        [
          String(diagnostics.linesRead),
          String(diagnostics.eventsApplied),
          String(diagnostics.linesSkipped),
          String(diagnostics.warningCount),
        ],
      ],
      { llm },
    );
  });

program
  .command("jobs <log>")
  .description("List jobs")
  .option("--json", "JSON output")
  .option("--llm", "Deterministic table output for LLM agents")
  .action(async (logPath: string, opts: OutputOptions) => {
    const { jobs } = await loadSnapshot(logPath);
    if (opts.json) {
      printJson(jobs);
      return;
    }
    printNamedTable(
      "jobs",
      [
        ["job", "status", "submitted", "duration", "tasks", "stages", "description"],
        ...jobs.map((job) => [
          String(job.jobId),
          job.statusLabel,
          formatTimestamp(job.submissionTime),
          job.duration,
          job.tasksLabel,
          `${job.stageCounts.COMPLETE}/${job.stageIds.length}`,
          job.description,
        ]),
      ],
      { llm: opts.llm === true },
    );
  });

program
  .command("stages <log>")
  .description("List stage attempts")
  .option("--json", "JSON output")
  .option("--llm", "Deterministic table output for LLM agents")
  .action(async (logPath: string, opts: OutputOptions) => {
    const { stages } = await loadSnapshot(logPath);
    if (opts.json) {
      printJson(stages);
      return;
    }
    printNamedTable(
      "stages",
      [
        ["stage", "status", "duration", "tasks", "progress", "rdds", "input", "shuffle_read", "shuffle_write", "spill", "name"],
        ...stages.map((stage) => [
          `${stage.stageId}.${stage.attemptId}`,
          stage.statusLabel,
          stage.duration,
          stage.tasksLabel,
          formatPct(stage.progressPct),
          String(stage.rddCount),
          stage.inputBytes,
          stage.shuffleReadBytes,
          stage.shuffleWriteBytes,
          stage.spillBytes,
          stage.name,
        ]),
      ],
      { llm: opts.llm === true },
    );
  });

program
  .command("stage <log> <stageId> [attemptId]")
  .description("Show one stage attempt with its tasks (latest attempt by default)")
  .option("--json", "JSON output")
  .option("--llm", "Deterministic table output for LLM agents")
  .action(async (logPath: string, stageArg: string, attemptArg: string | undefined, opts: OutputOptions) => {
    const stageId = parseIndex(stageArg, "stage id");
    const session = await loadSession(logPath);
    const attemptId =
      attemptArg === undefined ? session.getStore().latestAttemptOf(stageId)?.attemptId : parseIndex(attemptArg, "attempt id");
    const detail = attemptId === undefined ? undefined : session.stageDetail(stageId, attemptId);
    if (!detail) {
      throw new Error(attemptArg === undefined ? `unknown stage: ${stageArg}` : `unknown stage attempt: ${stageArg}.${attemptArg}`);
    }
    if (opts.json) {
      printJson(detail);
      return;
    }
    renderStageDetail(detail, opts.llm === true);
  });

program
  .command("tasks <log>")
  .description("List tasks ordered by launch time")
  .option("--stage <id>", "Only tasks of this stage")
  .option("--attempt <id>", "Only tasks of this stage attempt")
  .option("--limit <n>", "Rows to show (default: display.taskListLimit)")
  .option("--json", "JSON output")
  .option("--llm", "Deterministic table output for LLM agents")
  .action(async (logPath: string, opts: OutputOptions & { stage?: string; attempt?: string; limit?: string }) => {
    const stageId = opts.stage === undefined ? null : parseIndex(opts.stage, "stage id");
    const attemptId = opts.attempt === undefined ? null : parseIndex(opts.attempt, "attempt id");
    const session = await loadSession(logPath);
    const limit = opts.limit === undefined ? session.getConfig().display.taskListLimit : Math.max(1, parseIndex(opts.limit, "limit"));
    const matching = session
      .snapshot()
      .tasks.filter(
        (task) => (stageId === null || task.stageId === stageId) && (attemptId === null || task.stageAttemptId === attemptId),
      );
    const tasks = matching.slice(0, limit);
    if (opts.json) {
      printJson({ total: matching.length, tasks });
      return;
    }
    printNamedTable("tasks", taskRows(tasks), { llm: opts.llm === true });
    if (matching.length > tasks.length) {
      console.log(`\nshowing ${tasks.length} of ${matching.length} tasks`);
    }
  });

program
  .command("executors <log>")
  .description("List executors with task totals")
  .option("--json", "JSON output")
  .option("--llm", "Deterministic table output for LLM agents")
  .action(async (logPath: string, opts: OutputOptions) => {
    const { executors } = await loadSnapshot(logPath);
    if (opts.json) {
      printJson(executors);
      return;
    }
    printNamedTable(
      "executors",
      [
        ["executor", "host", "status", "cores", "memory", "active", "tasks", "task_time", "gc", "input", "shuffle_read", "shuffle_write"],
        ...executors.map((executor) => [
          executor.executorId,
          executor.host,
          executor.statusLabel,
          orDash(executor.totalCores),
          executor.maxMemory,
          String(executor.activeTasks),
          executor.tasksLabel,
          executor.taskTime,
          executor.gcTime,
          executor.inputBytes,
          executor.shuffleReadBytes,
          executor.shuffleWriteBytes,
        ]),
      ],
      { llm: opts.llm === true },
    );
  });

program
  .command("environment <log>")
  .description("Show environment properties (secrets redacted)")
  .option("--category <name>", "Only this category, e.g. 'Spark Properties'")
  .option("--json", "JSON output")
  .option("--llm", "Deterministic table output for LLM agents")
  .action(async (logPath: string, opts: OutputOptions & { category?: string }) => {
    const { environment } = await loadSnapshot(logPath);
    const sections = opts.category ? environment.filter((section) => section.category === opts.category) : environment;
    if (opts.json) {
      printJson(sections);
      return;
    }
    for (const section of sections) {
      printNamedTable(section.category, [["key", "value"], ...section.entries.map(([key, value]) => [key, value])], {
        llm: opts.llm === true,
      });
    }
  });

program
  .command("sql <log>")
  .description("List SQL executions")
  .option("--json", "JSON output")
  .option("--llm", "Deterministic table output for LLM agents")
  .action(async (logPath: string, opts: OutputOptions) => {
    const { sql } = await loadSnapshot(logPath);
    if (opts.json) {
      printJson(sql);
      return;
    }
    printNamedTable(
      "sql",
      [
        ["execution", "status", "started", "duration", "jobs", "description"],
        ...sql.map((execution) => [
          String(execution.executionId),
          execution.statusLabel,
          formatTimestamp(execution.startTime),
          execution.duration,
          execution.jobIds.join(",") || "-",
          execution.description,
        ]),
      ],
      { llm: opts.llm === true },
    );
  });

program
  .command("diagnostics <log>")
  .description("Decode failures, unrecognized events and warnings of a load")
  .option("--json", "JSON output")
  .option("--llm", "Deterministic table output for LLM agents")
  .action(async (logPath: string, opts: OutputOptions) => {
    const { diagnostics, load } = await loadSnapshot(logPath);
    if (opts.json) {
      printJson({ diagnostics, load });
      return;
    }
    const llm = opts.llm === true;
    printNamedTable(
      "load",
      [
        ["status", "lines_read", "events_applied", "lines_skipped", "decode_failures", "unrecognized", "warnings"],
        [
          load.status,
          String(diagnostics.linesRead),
          String(diagnostics.eventsApplied),
          String(diagnostics.linesSkipped),
          String(diagnostics.decodeFailureCount),
          String(diagnostics.unrecognizedCount),
          String(diagnostics.warningCount),
        ],
      ],
      { llm },
    );
    if (diagnostics.decodeFailures.length > 0) {
      printNamedTable(
        "decode_failures",
        [["line", "message"], ...diagnostics.decodeFailures.map((record) => [String(record.lineNumber), record.message])],
        { llm },
      );
    }
    if (diagnostics.unrecognized.length > 0) {
      printNamedTable(
        "unrecognized",
        [["event", "count"], ...diagnostics.unrecognized.map((row) => [row.name, String(row.count)])],
        { llm },
      );
    }
    if (diagnostics.warnings.length > 0) {
      printNamedTable(
        "warnings",
        [["line", "message"], ...diagnostics.warnings.map((record) => [String(record.lineNumber), record.message])],
        { llm },
      );
    }
  });

program
  .command("list <dir>")
  .description("List event logs found directly under a directory, newest first")
  .option("--json", "JSON output")
  .option("--llm", "Deterministic table output for LLM agents")
  .action(async (dir: string, opts: OutputOptions) => {
    const logs = await discoverEventLogs(dir);
    if (opts.json) {
      printJson(logs);
      return;
    }
    printNamedTable(
      "event_logs",
      [
        ["id", "kind", "parts", "in_progress", "size", "modified", "path"],
        ...logs.map((log) => [
          log.id,
          log.kind,
          String(log.parts.length),
          log.inProgress ? "yes" : "no",
          formatBytes(log.sizeBytes),
          formatTimestamp(Math.round(log.mtimeMs)),
          log.path,
        ]),
      ],
      { llm: opts.llm === true },
    );
  });

program
  .command("serve <log>")
  .description("Load an event log and serve its views over HTTP")
  .option("--host <host>", "Server host", process.env.EVENTSCOPE_HOST ?? "127.0.0.1")
  .option("--port <port>", "Server port", process.env.EVENTSCOPE_PORT ?? "8788")
  .action(async (logPath: string, opts: { host: string; port: string }) => {
    await runServer({
      logPath,
      host: opts.host,
      port: parseIndex(opts.port, "port"),
      configPath: configPathOf(),
    });
  });

const configCmd = program.command("config").description("Configuration");

configCmd.command("get").option("--json", "JSON output").action(async (opts: { json?: boolean }) => {
  const config = await loadConfig(configPathOf());
  if (opts.json) {
    printJson(config);
    return;
  }
  for (const [section, values] of Object.entries(config)) {
    printNamedTable(section, [
      ["key", "value"],
      ...Object.entries(values).map(([key, value]) => [key, typeof value === "string" ? value : JSON.stringify(value)]),
    ]);
  }
});

configCmd.command("set <key> <value>").action(async (key: string, value: string) => {
  const configPath = configPathOf();
  const config = await loadConfig(configPath);
  await saveConfig(setConfigValue(config, key, value), configPath);
  console.log(`updated ${key}`);
});

program.action(() => {
  program.outputHelp();
});

void program.parseAsync(process.argv).catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(message);
  process.exitCode = 1;
});
