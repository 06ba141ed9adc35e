import type { Task } from "../entities/task";

export interface TaskRepository {
  create(input: { description: string }): Promise<Task>;
  list(): Promise<Task[]>;
  getById(id: number): Promise<Task | null>;
  update(
    id: number,
    data: Partial<Pick<Task, "description" | "completed">>
  ): Promise<Task | null>;
  delete(id: number): Promise<boolean>;
  ping(): Promise<void>;
}
