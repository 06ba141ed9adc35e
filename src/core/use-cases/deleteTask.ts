import { NotFoundError } from "../errors";
import type { TaskRepository } from "../ports/TaskRepository";

export default (repo: TaskRepository) => async (id: number) => {
  const removed = await repo.delete(id);
  if (!removed) throw new NotFoundError(id);
};
