import { NotFoundError } from "../errors";
import type { TaskRepository } from "../ports/TaskRepository";

// Completing an already completed task is a no-op that still succeeds.
export default (repo: TaskRepository) => async (id: number) => {
  const updated = await repo.update(id, { completed: true });
  if (!updated) throw new NotFoundError(id);
  return updated;
};
