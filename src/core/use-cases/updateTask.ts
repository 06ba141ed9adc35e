import { normalizeDescription } from "../entities/task";
import { NotFoundError } from "../errors";
import type { TaskRepository } from "../ports/TaskRepository";

export default (repo: TaskRepository) => async (id: number, data: { description: unknown }) => {
  const description = normalizeDescription(data?.description);
  const updated = await repo.update(id, { description });
  if (!updated) throw new NotFoundError(id);
  return updated;
};
