import type { Request, Response } from "express";
import { z } from "zod";
import type { Task } from "../../../core/entities/task";
import { NotFoundError, ValidationError } from "../../../core/errors";
import type { Logger } from "../../../infrastructure/logging/logger";

export interface TaskControllerDeps {
  createTask: (input: { description: unknown }) => Promise<Task>;
  listTasks: () => Promise<Task[]>;
  getTask: (id: number) => Promise<Task>;
  updateTask: (id: number, data: { description: unknown }) => Promise<Task>;
  deleteTask: (id: number) => Promise<void>;
  completeTask: (id: number) => Promise<Task>;
  logger: Logger;
}

export const messages = {
  empty: "Task cannot be empty!",
  notFound: "Task not found!",
  added: "Task added successfully!",
  updated: "Task updated successfully!",
  deleted: "Task deleted successfully!",
  completed: "Task marked as completed!",
  loadFailed: "Failed to load tasks. Please try again.",
  addFailed: "Failed to add task. Please try again.",
  editFailed: "Failed to edit task. Please try again.",
  deleteFailed: "Failed to delete task. Please try again.",
  completeFailed: "Failed to complete task. Please try again.",
} as const;

const taskForm = z.object({ task: z.string().trim().min(1) });
// Ids past 2^53 - 1 would round onto a neighbouring row.
const taskIdParams = z.object({ id: z.coerce.number().int().positive().max(Number.MAX_SAFE_INTEGER) });

function parseTaskId(req: Request): number | null {
  const parsed = taskIdParams.safeParse(req.params);
  return parsed.success ? parsed.data.id : null;
}

function render(req: Request, res: Response, view: string, locals: Record<string, unknown>) {
  return res.render(view, { ...locals, messages: req.flash() });
}

export default function createTaskController(deps: TaskControllerDeps) {
  const log = deps.logger.child({ component: "task-controller" });

  // Validation and not-found outcomes are reported to the user; anything else
  // is logged and replaced by a generic message.
  const fail = (req: Request, err: unknown, action: string, message: string) => {
    if (err instanceof NotFoundError) {
      req.flash("error", messages.notFound);
    } else if (err instanceof ValidationError) {
      req.flash("error", messages.empty);
    } else {
      log.error({ err, action, path: req.originalUrl }, `failed to ${action} task`);
      req.flash("error", message);
    }
  };

  return {
    list: async (req: Request, res: Response) => {
      let tasks: Task[] = [];
      try {
        tasks = await deps.listTasks();
      } catch (err) {
        log.error({ err }, "failed to load tasks");
        req.flash("error", messages.loadFailed);
      }
      return render(req, res, "index", { tasks });
    },

    add: async (req: Request, res: Response) => {
      const form = taskForm.safeParse(req.body);
      if (!form.success) {
        req.flash("error", messages.empty);
        return res.redirect("/");
      }
      try {
        await deps.createTask({ description: form.data.task });
        req.flash("success", messages.added);
      } catch (err) {
        fail(req, err, "add", messages.addFailed);
      }
      return res.redirect("/");
    },

    editForm: async (req: Request, res: Response) => {
      const id = parseTaskId(req);
      if (id === null) {
        req.flash("error", messages.notFound);
        return res.redirect("/");
      }
      try {
        const task = await deps.getTask(id);
        return render(req, res, "edit", { task });
      } catch (err) {
        fail(req, err, "edit", messages.editFailed);
        return res.redirect("/");
      }
    },

    edit: async (req: Request, res: Response) => {
      const id = parseTaskId(req);
      if (id === null) {
        req.flash("error", messages.notFound);
        return res.redirect("/");
      }
      const form = taskForm.safeParse(req.body);
      if (!form.success) {
        req.flash("error", messages.empty);
        return res.redirect(`/edit/${id}`);
      }
      try {
        await deps.updateTask(id, { description: form.data.task });
        req.flash("success", messages.updated);
      } catch (err) {
        fail(req, err, "edit", messages.editFailed);
      }
      return res.redirect("/");
    },

    remove: async (req: Request, res: Response) => {
      const id = parseTaskId(req);
      if (id === null) {
        req.flash("error", messages.notFound);
        return res.redirect("/");
      }
      try {
        await deps.deleteTask(id);
        req.flash("success", messages.deleted);
      } catch (err) {
        fail(req, err, "delete", messages.deleteFailed);
      }
      return res.redirect("/");
    },

    complete: async (req: Request, res: Response) => {
      const id = parseTaskId(req);
      if (id === null) {
        req.flash("error", messages.notFound);
        return res.redirect("/");
      }
      try {
        await deps.completeTask(id);
        req.flash("success", messages.completed);
      } catch (err) {
        fail(req, err, "complete", messages.completeFailed);
      }
      return res.redirect("/");
    },
  };
}
