import type { Task } from "../../core/entities/task";
import { StorageError } from "../../core/errors";
import type { TaskRepository } from "../../core/ports/TaskRepository";
import { type Connection, type DatabaseOptions, getTaskColumns, withConnection } from "../db/database";
import type { Logger } from "../logging/logger";

interface TaskRow {
  id: number;
  description: string;
  created_at?: string | null;
  is_completed?: number | null;
}

function toTask(row: TaskRow): Task {
  return {
    id: row.id,
    description: row.description,
    completed: Boolean(row.is_completed),
    createdAt: row.created_at ?? null,
  };
}

/**
 * One connection per call, released before the call returns.
 * Statements run in autocommit mode, so every write is committed on its own.
 */
export default class SqliteTaskRepository implements TaskRepository {
  private readonly log: Logger;

  constructor(private readonly options: DatabaseOptions, logger: Logger) {
    this.log = logger.child({ component: "task-repository" });
  }

  private run<T>(operation: string, fn: (db: Connection) => T): T {
    try {
      return withConnection(this.options, fn);
    } catch (err) {
      this.log.error({ err, operation }, "storage operation failed");
      throw new StorageError(`storage operation "${operation}" failed`, { cause: err });
    }
  }

  private findById(db: Connection, id: number): Task | null {
    const row = db.prepare<[number], TaskRow>("SELECT * FROM tasks WHERE id = ?").get(id);
    return row ? toTask(row) : null;
  }

  async create({ description }: { description: string }): Promise<Task> {
    const task = this.run("create", (db) => {
      const info = db.prepare<[string]>("INSERT INTO tasks (description) VALUES (?)").run(description);
      const created = this.findById(db, Number(info.lastInsertRowid));
      if (!created) throw new Error(`inserted row ${info.lastInsertRowid} could not be read back`);
      return created;
    });
    this.log.info({ id: task.id, description }, "task added");
    return task;
  }

  async list(): Promise<Task[]> {
    const tasks = this.run("list", (db) => {
      const columns = getTaskColumns(db);
      if (!columns.has("created_at")) {
        this.log.warn("tasks table has no created_at column, listing unordered");
        const completed = columns.has("is_completed") ? "is_completed" : "0 AS is_completed";
        return db
          .prepare<[], TaskRow>(`SELECT id, description, ${completed} FROM tasks`)
          .all()
          .map(toTask);
      }
      return db
        .prepare<[], TaskRow>("SELECT * FROM tasks ORDER BY created_at DESC, id DESC")
        .all()
        .map(toTask);
    });
    this.log.debug({ count: tasks.length }, "tasks listed");
    return tasks;
  }

  async getById(id: number): Promise<Task | null> {
    const task = this.run("read", (db) => this.findById(db, id));
    this.log.debug({ id, found: task !== null }, "task read");
    return task;
  }

  async update(
    id: number,
    data: Partial<Pick<Task, "description" | "completed">>
  ): Promise<Task | null> {
    const assignments: string[] = [];
    const params: Array<string | number> = [];
    if (data.description !== undefined) {
      assignments.push("description = ?");
      params.push(data.description);
    }
    if (data.completed !== undefined) {
      assignments.push("is_completed = ?");
      params.push(data.completed ? 1 : 0);
    }

    const task = this.run("update", (db) => {
      if (assignments.length === 0) return this.findById(db, id);
      const info = db
        .prepare<Array<string | number>>(`UPDATE tasks SET ${assignments.join(", ")} WHERE id = ?`)
        .run(...params, id);
      return info.changes === 0 ? null : this.findById(db, id);
    });

    if (task) this.log.info({ id, changes: Object.keys(data) }, "task updated");
    else this.log.info({ id }, "task to update not found");
    return task;
  }

  async delete(id: number): Promise<boolean> {
    const removed = this.run("delete", (db) => {
      return db.prepare<[number]>("DELETE FROM tasks WHERE id = ?").run(id).changes > 0;
    });
    if (removed) this.log.info({ id }, "task deleted");
    else this.log.info({ id }, "task to delete not found");
    return removed;
  }

  async ping(): Promise<void> {
    this.run("ping", (db) => db.prepare("SELECT 1").get());
  }
}
