// CompleteTodosUseCase - Mark selected records done (or pending again)

import type { CompleteOutput } from "../entities/outputs.js";
import type { TodoRecord } from "../entities/todo.js";
import { MarcError } from "../entities/errors.js";
import { resolveSelectors } from "../entities/selector.js";
import { getLocalISOString, withDone } from "../entities/todo-helpers.js";
import type { TodoRepository } from "../ports/todo-repository.js";

export interface CompleteTodosInput {
  readonly selectors: readonly string[];
  readonly undo?: boolean;
}

export interface CompleteTodosDeps {
  readonly todoRepo: TodoRepository;
  readonly getTimestamp?: () => string;
}

export class CompleteTodosUseCase {
  constructor(private readonly deps: CompleteTodosDeps) {}

  async execute(input: CompleteTodosInput): Promise<CompleteOutput> {
    if (input.selectors.length === 0) {
      throw new MarcError("invalid_args", "Missing todo selector");
    }

    const done = !input.undo;
    const getTimestamp = this.deps.getTimestamp ?? (() => getLocalISOString());

    const store = await this.deps.todoRepo.load();
    const positions = resolveSelectors(input.selectors, store.todos);

    const timestamp = getTimestamp();
    const todos = [...store.todos];
    const selected: TodoRecord[] = [];
    let mutated = false;
    for (const i of positions) {
      // Re-completing keeps the original done_at
      if (todos[i].done !== done) {
        todos[i] = withDone(todos[i], done, timestamp);
        mutated = true;
      }
      selected.push(todos[i]);
    }

    if (mutated) {
      await this.deps.todoRepo.save({ ...store, todos });
    }

    return { status: done ? "todo_done" : "todo_undone", todos: selected };
  }
}
