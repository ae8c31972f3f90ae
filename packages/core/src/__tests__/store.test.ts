import { describe, expect, it } from "vitest";
import { placeholderJob, placeholderStage, placeholderTask } from "../correlator.js";
import { EntityStore } from "../store.js";

function addTask(store: EntityStore, taskId: number, stageId: number, executorId: string, launchTime: number | null) {
  store.upsertTask(taskId, () => placeholderTask(taskId, { stageId, attemptId: 0 }, executorId), (task) => {
    task.launchTime = launchTime;
  });
}

describe("EntityStore", () => {
  it("keeps stage attempts ordered by stage then attempt regardless of insertion order", () => {
    const store = new EntityStore();
    for (const key of [
      { stageId: 2, attemptId: 1 },
      { stageId: 0, attemptId: 0 },
      { stageId: 2, attemptId: 0 },
    ]) {
      store.upsertStage(key, () => placeholderStage(key), () => undefined);
    }
    expect(store.stagesInOrder().map((stage) => `${stage.stageId}.${stage.attemptId}`)).toEqual(["0.0", "2.0", "2.1"]);
    expect(store.latestAttemptOf(2)?.attemptId).toBe(1);
    expect(store.latestAttemptOf(9)).toBeUndefined();
  });

  it("never creates entities on lookup", () => {
    const store = new EntityStore();
    expect(store.getJob(1)).toBeUndefined();
    expect(store.getStage(1, 0)).toBeUndefined();
    expect(store.tasksOfStage(1, 0)).toEqual([]);
    expect(store.counts()).toEqual({ jobs: 0, stages: 0, tasks: 0, executors: 0, sqlExecutions: 0 });
  });

  it("orders tasks by launch time with unknown launch times last", () => {
    const store = new EntityStore();
    addTask(store, 3, 0, "1", null);
    addTask(store, 2, 0, "1", 200);
    addTask(store, 1, 0, "1", 200);
    addTask(store, 4, 0, "1", 100);
    expect(store.tasksInOrder().map((task) => task.taskId)).toEqual([4, 1, 2, 3]);

    store.upsertTask(3, () => placeholderTask(3, { stageId: 0, attemptId: 0 }, "1"), (task) => {
      task.launchTime = 50;
    });
    expect(store.tasksInOrder().map((task) => task.taskId)).toEqual([3, 4, 1, 2]);
  });

  it("attaches a task to its stage once both exist", () => {
    const store = new EntityStore();
    addTask(store, 7, 5, "1", 10);
    expect(store.tasksOfStage(5, 0)).toEqual([]);

    const key = { stageId: 5, attemptId: 0 };
    store.upsertStage(key, () => placeholderStage(key), () => undefined);
    addTask(store, 7, 5, "1", 10);
    expect(store.tasksOfStage(5, 0).map((task) => task.taskId)).toEqual([7]);
  });

  it("moves a task between executor indexes when its executor changes", () => {
    const store = new EntityStore();
    addTask(store, 1, 0, "unknown", 10);
    store.upsertTask(1, () => placeholderTask(1, { stageId: 0, attemptId: 0 }, "unknown"), (task) => {
      task.executorId = "3";
    });
    expect(store.tasksOfExecutor("unknown")).toEqual([]);
    expect(store.tasksOfExecutor("3").map((task) => task.taskId)).toEqual([1]);
  });

  it("indexes owning jobs by stage id without duplicates", () => {
    const store = new EntityStore();
    store.upsertJob(4, () => placeholderJob(4), (job) => {
      job.stageIds.push(1, 2);
    });
    store.upsertJob(4, () => placeholderJob(4), (job) => {
      job.stageIds.push(3);
    });
    store.upsertJob(5, () => placeholderJob(5), (job) => {
      job.stageIds.push(2);
    });
    expect(store.jobIdsOwningStage(2)).toEqual([4, 5]);
    expect(store.jobIdsOwningStage(3)).toEqual([4]);
    expect(store.jobIdsOwningStage(9)).toEqual([]);
  });

  it("orders jobs by submission time with unknown times last, then by job id", () => {
    const store = new EntityStore();
    const submissions: Array<[number, number | null]> = [
      [3, null],
      [1, 200],
      [0, 100],
      [2, 200],
      [4, null],
    ];
    for (const [jobId, submissionTime] of submissions) {
      store.upsertJob(jobId, () => placeholderJob(jobId), (job) => {
        job.submissionTime = submissionTime;
      });
    }
    expect(store.jobsInOrder().map((job) => job.jobId)).toEqual([0, 1, 2, 3, 4]);
  });

  it("replaces an environment category wholesale", () => {
    const store = new EntityStore();
    store.replaceEnvironmentCategory("Spark Properties", [["a", "1"], ["b", "2"]]);
    store.replaceEnvironmentCategory("Spark Properties", [["c", "3"]]);
    expect(store.getEnvironmentCategory("Spark Properties")).toEqual([["c", "3"]]);
    expect(store.getEnvironmentCategory("Classpath Entries")).toBeUndefined();
  });
});
