import { normalizeDescription } from "../entities/task";
import type { TaskRepository } from "../ports/TaskRepository";

export default (repo: TaskRepository) => async (input: { description: unknown }) => {
  const description = normalizeDescription(input?.description);
  return repo.create({ description });
};
