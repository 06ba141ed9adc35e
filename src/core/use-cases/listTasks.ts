import type { TaskRepository } from "../ports/TaskRepository";

export default (repo: TaskRepository) => async () => {
  return repo.list();
};
