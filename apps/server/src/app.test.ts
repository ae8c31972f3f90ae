import { mkdtemp } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { EventLogSession, EventLogSourceError, mergeConfig } from "@eventscope/core";
import { createServer, runServer } from "./app.js";

const T0 = Date.UTC(2026, 1, 11, 10, 0, 0);

function taskInfo(taskId: number, finishTime: number): Record<string, unknown> {
  return {
    "Task ID": taskId,
    Index: taskId,
    Attempt: 0,
    "Launch Time": T0 + 1_000 + taskId,
    "Executor ID": "1",
    Host: "worker-1",
    "Finish Time": finishTime,
  };
}

function buildEventLog(): string[] {
  const stageInfo = { "Stage ID": 0, "Stage Attempt ID": 0, "Stage Name": "collect at Report.scala:40", "Number of Tasks": 3 };
  const rows: Array<Record<string, unknown>> = [
    { Event: "SparkListenerApplicationStart", "App Name": "reports", "App ID": "app-0042", Timestamp: T0, User: "analyst" },
    { Event: "SparkListenerExecutorAdded", Timestamp: T0, "Executor ID": "1", "Executor Info": { Host: "worker-1", "Total Cores": 2 } },
    { Event: "SparkListenerJobStart", "Job ID": 0, "Submission Time": T0 + 500, "Stage Infos": [stageInfo], "Stage IDs": [0] },
    { Event: "SparkListenerStageSubmitted", "Stage Info": { ...stageInfo, "Submission Time": T0 + 600 } },
  ];
  for (const taskId of [0, 1, 2]) {
    rows.push({ Event: "SparkListenerTaskStart", "Stage ID": 0, "Stage Attempt ID": 0, "Task Info": taskInfo(taskId, 0) });
  }
  rows.push({
    Event: "SparkListenerTaskEnd",
    "Stage ID": 0,
    "Stage Attempt ID": 0,
    "Task End Reason": { Reason: "Success" },
    "Task Info": taskInfo(0, T0 + 2_000),
    "Task Metrics": { "Executor Run Time": 900, "JVM GC Time": 20 },
  });
  rows.push({
    Event: "SparkListenerEnvironmentUpdate",
    "Spark Properties": { "spark.master": "local[2]", "spark.ssl.keyStorePassword": "test-secret" },
  });
  return rows.map((row) => JSON.stringify(row));
}

function buildSession(): EventLogSession {
  const session = new EventLogSession(mergeConfig({ display: { taskListLimit: 2 } }));
  session.ingestLines(buildEventLog());
  session.ingestLine("{not json");
  return session;
}

describe("server api", () => {
  it("serves health, application and job views", async () => {
    const server = await createServer({ session: buildSession() });

    const health = await server.inject({ method: "GET", url: "/api/healthz" });
    expect(health.statusCode).toBe(200);
    expect(health.json()).toEqual({ ok: true });

    const application = await server.inject({ method: "GET", url: "/api/application" });
    expect(application.json().application).toMatchObject({ appId: "app-0042", name: "reports", status: "RUNNING" });

    const jobs = await server.inject({ method: "GET", url: "/api/jobs" });
    expect(jobs.json().jobs).toHaveLength(1);
    expect(jobs.json().jobs[0]).toMatchObject({ jobId: 0, tasksLabel: "1/3", description: "collect at Report.scala:40" });

    const job = await server.inject({ method: "GET", url: "/api/jobs/0" });
    expect(job.json().job.status).toBe("RUNNING");

    const unknownJob = await server.inject({ method: "GET", url: "/api/jobs/7" });
    expect(unknownJob.statusCode).toBe(404);
    expect(unknownJob.json()).toEqual({ error: "unknown job: 7" });

    await server.close();
  });

  it("serves stage detail and rejects unknown attempts", async () => {
    const server = await createServer({ session: buildSession() });

    const detail = await server.inject({ method: "GET", url: "/api/stages/0/0" });
    expect(detail.statusCode).toBe(200);
    const body = detail.json();
    expect(body.stage).toMatchObject({ stageId: 0, attemptId: 0, status: "ACTIVE", progressPct: 33.3 });
    expect(body.tasks.map((task: { taskId: number }) => task.taskId)).toEqual([0, 1, 2]);
    expect(body.tasks[0].duration).toBe("1.0 s");

    const missingAttempt = await server.inject({ method: "GET", url: "/api/stages/0/9" });
    expect(missingAttempt.statusCode).toBe(404);
    expect(missingAttempt.json()).toEqual({ error: "unknown stage attempt: 0.9" });

    const badId = await server.inject({ method: "GET", url: "/api/stages/x/0" });
    expect(badId.statusCode).toBe(404);
    expect(badId.json()).toEqual({ error: "unknown stage attempt: x.0" });

    await server.close();
  });

  it("limits task lists with the configured default", async () => {
    const server = await createServer({ session: buildSession() });

    const defaultRes = await server.inject({ method: "GET", url: "/api/tasks" });
    expect(defaultRes.json().total).toBe(3);
    expect(defaultRes.json().tasks).toHaveLength(2);

    const explicitRes = await server.inject({ method: "GET", url: "/api/tasks?limit=5" });
    expect(explicitRes.json().tasks).toHaveLength(3);

    const invalidRes = await server.inject({ method: "GET", url: "/api/tasks?limit=0" });
    expect(invalidRes.json().tasks).toHaveLength(2);

    const otherStage = await server.inject({ method: "GET", url: "/api/tasks?stage=1" });
    expect(otherStage.json()).toEqual({ total: 0, tasks: [] });

    await server.close();
  });

  it("redacts environment values and reports diagnostics", async () => {
    const server = await createServer({ session: buildSession() });

    const environment = await server.inject({ method: "GET", url: "/api/environment" });
    expect(environment.json().environment).toEqual([
      {
        category: "Spark Properties",
        entries: [
          ["spark.master", "local[2]"],
          ["spark.ssl.keyStorePassword", "*********(redacted)"],
        ],
      },
    ]);

    const diagnostics = await server.inject({ method: "GET", url: "/api/diagnostics" });
    expect(diagnostics.json().diagnostics).toMatchObject({
      linesRead: 10,
      eventsApplied: 9,
      decodeFailureCount: 1,
    });
    expect(diagnostics.json().diagnostics.decodeFailures[0].lineNumber).toBe(10);
    expect(diagnostics.json().load.status).toBe("idle");

    const executors = await server.inject({ method: "GET", url: "/api/executors" });
    expect(executors.json().executors[0]).toMatchObject({ executorId: "1", activeTasks: 2, tasksLabel: "1/3" });

    await server.close();
  });

  it("refuses to start when the event log cannot be opened", async () => {
    const root = await mkdtemp(path.join(os.tmpdir(), "eventscope-server-"));
    const startup = runServer({
      logPath: path.join(root, "missing-log"),
      port: 0,
      configPath: path.join(root, "config.toml"),
    });
    await expect(startup).rejects.toBeInstanceOf(EventLogSourceError);
  });
});
