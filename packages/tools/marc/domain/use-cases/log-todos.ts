// LogTodosUseCase - List records, optionally filtered by tag and completion

import type { LogItem, LogOutput } from "../entities/outputs.js";
import { normalizeTag } from "../entities/todo-helpers.js";
import type { TodoRepository } from "../ports/todo-repository.js";

export interface LogTodosInput {
  readonly tag?: string;
  /** true: only done records, false: only pending ones, undefined: all */
  readonly done?: boolean;
}

export class LogTodosUseCase {
  constructor(private readonly todoRepo: TodoRepository) {}

  async execute(input: LogTodosInput): Promise<LogOutput> {
    const tag = input.tag === undefined ? undefined : normalizeTag(input.tag);
    const store = await this.todoRepo.load();

    const items: LogItem[] = [];
    store.todos.forEach((todo, i) => {
      if (tag !== undefined && todo.tag !== tag) return;
      if (input.done !== undefined && todo.done !== input.done) return;
      items.push({ index: i + 1, todo });
    });

    return { items, allIds: store.todos.map((t) => t.id) };
  }
}
