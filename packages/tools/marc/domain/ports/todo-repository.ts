// Todo repository port - persistence interface for the todo store

import type { TodoStore } from "../entities/store.js";

/**
 * Repository for persisting and retrieving the whole todo store.
 */
export interface TodoRepository {
  /** Load the store. Returns an empty store if none exists yet. */
  load(): Promise<TodoStore>;

  /** Replace the persisted store with the given one. */
  save(store: TodoStore): Promise<void>;

  /** Check if the store file exists. */
  exists(): Promise<boolean>;
}
