// Shared fixtures for use-case tests

import type { TodoStore } from "../entities/store.js";
import type { TodoRecord } from "../entities/todo.js";
import type { EditorView } from "../ports/editor-view.js";
import type { TodoRepository } from "../ports/todo-repository.js";

export const CREATED_AT = "2026-01-05T09:00:00+00:00";
export const NOW = "2026-01-06T18:30:00+00:00";

export function todo(
  id: string,
  content: string,
  extra: Partial<TodoRecord> = {},
): TodoRecord {
  return {
    id,
    content,
    done: false,
    created_at: CREATED_AT,
    done_at: null,
    ...extra,
  };
}

export function createMockTodoRepo(
  todos: TodoRecord[] = [],
  tags: string[] = [],
): TodoRepository & { store: TodoStore; saves: number } {
  const state: { store: TodoStore; saves: number } = {
    store: { version: 1, tags, todos },
    saves: 0,
  };
  return {
    get store() {
      return state.store;
    },
    get saves() {
      return state.saves;
    },
    load(): Promise<TodoStore> {
      return Promise.resolve(state.store);
    },
    save(store: TodoStore): Promise<void> {
      state.store = store;
      state.saves++;
      return Promise.resolve();
    },
    exists(): Promise<boolean> {
      return Promise.resolve(true);
    },
  };
}

/** ID generator yielding the given IDs in order. */
export function sequence(...ids: string[]): () => string {
  const queue = [...ids];
  return () => {
    const next = queue.shift();
    if (next === undefined) throw new Error("ID sequence exhausted");
    return next;
  };
}

export function createScriptedView(lines: string[]): {
  view: EditorView;
  shown: string[][];
  messages: string[];
  closed: () => boolean;
} {
  const queue = [...lines];
  const shown: string[][] = [];
  const messages: string[] = [];
  let closed = false;
  return {
    view: {
      show(todos) {
        shown.push(todos.map((t) => t.content));
      },
      message(text) {
        messages.push(text);
      },
      read() {
        return Promise.resolve(queue.shift() ?? null);
      },
      close() {
        closed = true;
      },
    },
    shown,
    messages,
    closed: () => closed,
  };
}
