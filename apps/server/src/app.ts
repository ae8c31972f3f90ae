import Fastify, { type FastifyInstance } from "fastify";
import type { ApplicationSnapshot } from "@eventscope/contracts";
import { DEFAULT_CONFIG_PATH, EventLogSession } from "@eventscope/core";

export interface CreateServerOptions {
  session: EventLogSession;
}

interface StageParams {
  stageId: string;
  attemptId: string;
}

interface TaskQuery {
  stage?: string;
  attempt?: string;
  limit?: string;
}

function parseId(value: string | undefined): number | null {
  if (value === undefined || !/^\d+$/.test(value)) return null;
  return Number(value);
}

function parseLimit(value: string | undefined, fallback: number): number {
  const numeric = parseId(value);
  if (numeric === null || numeric <= 0) return fallback;
  return numeric;
}

function selectTasks(snapshot: ApplicationSnapshot, query: TaskQuery, fallbackLimit: number) {
  const stageId = parseId(query.stage);
  const attemptId = parseId(query.attempt);
  const tasks = snapshot.tasks.filter(
    (task) =>
      (stageId === null || task.stageId === stageId) && (attemptId === null || task.stageAttemptId === attemptId),
  );
  return { total: tasks.length, tasks: tasks.slice(0, parseLimit(query.limit, fallbackLimit)) };
}

export async function createServer(options: CreateServerOptions): Promise<FastifyInstance> {
  const server = Fastify({ logger: false });
  const { session } = options;
  const taskListLimit = session.getConfig().display.taskListLimit;

  server.get("/api/healthz", async () => ({ ok: true }));

  server.get("/api/snapshot", async () => ({ snapshot: session.snapshot() }));

  server.get("/api/application", async () => ({ application: session.snapshot().application }));

  server.get("/api/jobs", async () => ({ jobs: session.snapshot().jobs }));

  server.get<{ Params: { jobId: string } }>("/api/jobs/:jobId", async (request, reply) => {
    const jobId = parseId(request.params.jobId);
    const job = session.snapshot().jobs.find((candidate) => candidate.jobId === jobId);
    if (!job) {
      reply.code(404);
      return { error: `unknown job: ${request.params.jobId}` };
    }
    return { job };
  });

  server.get("/api/stages", async () => ({ stages: session.snapshot().stages }));

  server.get<{ Params: StageParams }>("/api/stages/:stageId/:attemptId", async (request, reply) => {
    const stageId = parseId(request.params.stageId);
    const attemptId = parseId(request.params.attemptId);
    const detail = stageId === null || attemptId === null ? undefined : session.stageDetail(stageId, attemptId);
    if (!detail) {
      reply.code(404);
      return { error: `unknown stage attempt: ${request.params.stageId}.${request.params.attemptId}` };
    }
    return detail;
  });

  server.get<{ Querystring: TaskQuery }>("/api/tasks", async (request) =>
    selectTasks(session.snapshot(), request.query, taskListLimit),
  );

  server.get("/api/executors", async () => ({ executors: session.snapshot().executors }));

  server.get("/api/environment", async () => ({ environment: session.snapshot().environment }));

  server.get("/api/sql", async () => ({ sql: session.snapshot().sql }));

  server.get("/api/diagnostics", async () => {
    const snapshot = session.snapshot();
    return { diagnostics: snapshot.diagnostics, load: snapshot.load };
  });

  server.get("/api/config", async () => ({ config: session.getConfig() }));

  return server;
}

export interface RunServerOptions {
  logPath: string;
  host?: string;
  port?: number;
  configPath?: string;
}

/** Loads the event log fully, then serves it. A source error stops startup. */
export async function runServer(options: RunServerOptions): Promise<FastifyInstance> {
  const host = options.host ?? process.env.EVENTSCOPE_HOST ?? "127.0.0.1";
  const port = options.port ?? Number(process.env.EVENTSCOPE_PORT ?? "8788");
  const configPath = options.configPath ?? process.env.EVENTSCOPE_CONFIG ?? DEFAULT_CONFIG_PATH;

  const session = await EventLogSession.fromConfigPath(configPath);
  await session.load(options.logPath);

  const server = await createServer({ session });
  await server.listen({ host, port });

  process.on("SIGINT", () => {
    void server.close().then(() => process.exit(0));
  });

  // eslint-disable-next-line no-console
  console.log(`eventscope server: http://${host}:${port}`);
  return server;
}
