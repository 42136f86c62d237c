// Store entity - the whole persisted todo list

import type { TodoRecord } from "./todo.js";

export const STORE_VERSION = 1;

/**
 * Immutable store document.
 * `tags` is the declared vocabulary (sorted, unique); the tags in use are
 * derived from `todos`.
 */
export type TodoStore = {
  readonly version: number;
  readonly tags: readonly string[];
  readonly todos: readonly TodoRecord[];
};

export function emptyStore(): TodoStore {
  return { version: STORE_VERSION, tags: [], todos: [] };
}
