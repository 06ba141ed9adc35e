import { ValidationError } from "../errors";

export interface Task {
  id: number;
  description: string;
  completed: boolean;
  createdAt: string | null; // "YYYY-MM-DD HH:MM:SS" (UTC), null on tables without created_at
}

/**
 * Trims a user-supplied description and rejects it when nothing is left.
 */
export function normalizeDescription(value: unknown): string {
  if (typeof value !== "string" || !value.trim()) {
    throw new ValidationError("description is required");
  }
  return value.trim();
}
