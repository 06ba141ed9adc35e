import type { Task } from "../../core/entities/task";
import type { TaskRepository } from "../../core/ports/TaskRepository";

function timestamp(date = new Date()): string {
  return date.toISOString().slice(0, 19).replace("T", " ");
}

export default class InMemoryTaskRepository implements TaskRepository {
  private items = new Map<number, Task>();
  private seq = 1;

  private nextId(): number {
    return this.seq++;
  }

  async create({ description }: { description: string }): Promise<Task> {
    const id = this.nextId();
    const task: Task = { id, description, completed: false, createdAt: timestamp() };
    this.items.set(id, task);
    return { ...task };
  }

  // Newest first; ids grow with insertion order, so they break timestamp ties.
  async list(): Promise<Task[]> {
    return Array.from(this.items.values())
      .sort((a, b) => b.id - a.id)
      .map(t => ({ ...t }));
  }

  async getById(id: number): Promise<Task | null> {
    const t = this.items.get(id);
    return t ? { ...t } : null;
  }

  async update(id: number, data: Partial<Pick<Task, "description" | "completed">>): Promise<Task | null> {
    const current = this.items.get(id);
    if (!current) return null;
    const updated: Task = {
      ...current,
      ...(data.description !== undefined ? { description: data.description } : {}),
      ...(data.completed !== undefined ? { completed: data.completed } : {}),
    };
    this.items.set(id, updated);
    return { ...updated };
  }

  async delete(id: number): Promise<boolean> {
    return this.items.delete(id);
  }

  async ping(): Promise<void> {}
}
