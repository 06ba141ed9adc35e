import { describe, it, expect, beforeEach } from "vitest";
import InMemoryTaskRepository from "../../../src/infrastructure/repositories/inMemoryTaskRepository";
import makeCreateTask from "../../../src/core/use-cases/createTask";
import makeListTasks from "../../../src/core/use-cases/listTasks";
import makeGetTask from "../../../src/core/use-cases/getTask";
import makeUpdateTask from "../../../src/core/use-cases/updateTask";
import makeDeleteTask from "../../../src/core/use-cases/deleteTask";
import makeCompleteTask from "../../../src/core/use-cases/completeTask";
import { NotFoundError, ValidationError } from "../../../src/core/errors";

let repo: InMemoryTaskRepository;
let createTask: ReturnType<typeof makeCreateTask>;
let listTasks: ReturnType<typeof makeListTasks>;
let getTask: ReturnType<typeof makeGetTask>;
let updateTask: ReturnType<typeof makeUpdateTask>;
let deleteTask: ReturnType<typeof makeDeleteTask>;
let completeTask: ReturnType<typeof makeCompleteTask>;

beforeEach(() => {
  repo = new InMemoryTaskRepository();
  createTask = makeCreateTask(repo);
  listTasks = makeListTasks(repo);
  getTask = makeGetTask(repo);
  updateTask = makeUpdateTask(repo);
  deleteTask = makeDeleteTask(repo);
  completeTask = makeCompleteTask(repo);
});

describe("createTask", () => {
  it("stores the trimmed description as an open task", async () => {
    const task = await createTask({ description: "  Buy milk  " });
    expect(task).toMatchObject({ id: 1, description: "Buy milk", completed: false });
    expect(await listTasks()).toEqual([task]);
  });

  it("rejects blank descriptions without writing", async () => {
    await expect(createTask({ description: "   " })).rejects.toBeInstanceOf(ValidationError);
    expect(await listTasks()).toHaveLength(0);
  });

  it("puts the newest task first", async () => {
    await createTask({ description: "first" });
    await createTask({ description: "second" });
    const tasks = await listTasks();
    expect(tasks.map((t) => t.description)).toEqual(["second", "first"]);
  });
});

describe("getTask", () => {
  it("returns the stored task", async () => {
    const created = await createTask({ description: "Read" });
    expect(await getTask(created.id)).toEqual(created);
  });

  it("throws NotFoundError for unknown ids", async () => {
    await expect(getTask(99)).rejects.toMatchObject({ code: "NOT_FOUND", taskId: 99 });
  });
});

describe("updateTask", () => {
  it("replaces the description and keeps id and timestamp", async () => {
    const created = await createTask({ description: "Buy milk" });
    const updated = await updateTask(created.id, { description: "Buy milk and eggs" });
    expect(updated).toEqual({ ...created, description: "Buy milk and eggs" });
  });

  it("accepts resubmitting the current description", async () => {
    const created = await createTask({ description: "Same" });
    expect(await updateTask(created.id, { description: "Same" })).toEqual(created);
  });

  it("validates before looking the task up", async () => {
    await expect(updateTask(99, { description: "" })).rejects.toBeInstanceOf(ValidationError);
  });

  it("throws NotFoundError for unknown ids", async () => {
    await expect(updateTask(99, { description: "x" })).rejects.toBeInstanceOf(NotFoundError);
  });
});

describe("completeTask", () => {
  it("is idempotent", async () => {
    const created = await createTask({ description: "Walk" });
    await completeTask(created.id);
    const again = await completeTask(created.id);
    expect(again.completed).toBe(true);
  });

  it("throws NotFoundError for unknown ids", async () => {
    await expect(completeTask(7)).rejects.toBeInstanceOf(NotFoundError);
  });
});

describe("deleteTask", () => {
  it("removes only the given task", async () => {
    const a = await createTask({ description: "a" });
    const b = await createTask({ description: "b" });
    await deleteTask(a.id);
    expect(await listTasks()).toEqual([b]);
  });

  it("throws NotFoundError and leaves the list unchanged", async () => {
    await createTask({ description: "a" });
    await expect(deleteTask(42)).rejects.toBeInstanceOf(NotFoundError);
    expect(await listTasks()).toHaveLength(1);
  });
});
