import { NotFoundError } from "../errors";
import type { TaskRepository } from "../ports/TaskRepository";

export default (repo: TaskRepository) => async (id: number) => {
  const task = await repo.getById(id);
  if (!task) throw new NotFoundError(id);
  return task;
};
