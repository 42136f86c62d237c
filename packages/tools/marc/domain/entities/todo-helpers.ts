// Todo helper functions - pure domain logic shared by the use cases

import { MarcError } from "./errors.js";
import type { TodoRecord } from "./todo.js";

const BASE62 =
  "0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz";

/**
 * Generate a random 7-char base62 todo ID.
 */
export function generateTodoId(): string {
  let id = "";
  for (let i = 0; i < 7; i++) {
    id += BASE62.charAt(Math.floor(Math.random() * BASE62.length));
  }
  return id;
}

/**
 * Generate an ID not already used by `todos`. IDs are matched
 * case-insensitively by selectors, so uniqueness is too.
 */
export function generateUniqueId(
  todos: readonly TodoRecord[],
  generateId: () => string,
): string {
  const taken = new Set(todos.map((t) => t.id.toLowerCase()));
  for (let attempt = 0; attempt < 100; attempt++) {
    const id = generateId();
    if (!taken.has(id.toLowerCase())) return id;
  }
  throw new MarcError("invalid_store", "Could not generate a unique todo ID");
}

/**
 * Local ISO 8601 timestamp with offset, e.g. "2025-01-16T09:15:00+01:00".
 */
export function getLocalISOString(now: Date = new Date()): string {
  const tzOffset = -now.getTimezoneOffset();
  const sign = tzOffset >= 0 ? "+" : "-";
  const hours = String(Math.floor(Math.abs(tzOffset) / 60)).padStart(2, "0");
  const minutes = String(Math.abs(tzOffset) % 60).padStart(2, "0");

  const year = now.getFullYear();
  const month = String(now.getMonth() + 1).padStart(2, "0");
  const day = String(now.getDate()).padStart(2, "0");
  const hour = String(now.getHours()).padStart(2, "0");
  const minute = String(now.getMinutes()).padStart(2, "0");
  const second = String(now.getSeconds()).padStart(2, "0");

  return `${year}-${month}-${day}T${hour}:${minute}:${second}${sign}${hours}:${minutes}`;
}

/**
 * Trim a content string; throws on empty content.
 */
export function normalizeContent(content: string): string {
  const trimmed = content.trim();
  if (trimmed.length === 0) {
    throw new MarcError("invalid_args", "Todo content cannot be empty");
  }
  return trimmed;
}

/**
 * Trim a tag name; throws on empty tags. Any other character is allowed.
 */
export function normalizeTag(tag: string): string {
  const trimmed = tag.trim();
  if (trimmed.length === 0) {
    throw new MarcError("invalid_args", "Tag cannot be empty");
  }
  return trimmed;
}

/**
 * Add tags to a vocabulary, keeping it sorted and unique.
 */
export function withTags(
  vocabulary: readonly string[],
  ...tags: string[]
): string[] {
  return Array.from(new Set([...vocabulary, ...tags])).sort();
}

/**
 * Count records per tag. Untagged records are not counted.
 */
export function countTags(todos: readonly TodoRecord[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const todo of todos) {
    if (todo.tag !== undefined) {
      counts.set(todo.tag, (counts.get(todo.tag) ?? 0) + 1);
    }
  }
  return counts;
}

/**
 * Copy of a record with its tag replaced (or removed when `tag` is undefined).
 */
export function withTag(todo: TodoRecord, tag: string | undefined): TodoRecord {
  const { tag: _previous, ...rest } = todo;
  return tag === undefined ? rest : { ...rest, tag };
}

/**
 * Copy of a record with its completion flag set.
 */
export function withDone(
  todo: TodoRecord,
  done: boolean,
  timestamp: string,
): TodoRecord {
  return { ...todo, done, done_at: done ? timestamp : null };
}
