// RemoveTodosUseCase - Remove selected records, or every done record

import type { RemoveOutput } from "../entities/outputs.js";
import { MarcError } from "../entities/errors.js";
import { resolveSelectors } from "../entities/selector.js";
import type { TodoRepository } from "../ports/todo-repository.js";

export interface RemoveTodosInput {
  readonly selectors: readonly string[];
  readonly done?: boolean;
}

export class RemoveTodosUseCase {
  constructor(private readonly todoRepo: TodoRepository) {}

  async execute(input: RemoveTodosInput): Promise<RemoveOutput> {
    if (input.done && input.selectors.length > 0) {
      throw new MarcError(
        "invalid_args",
        "Cannot combine selectors with --done",
      );
    }
    if (!input.done && input.selectors.length === 0) {
      throw new MarcError(
        "invalid_args",
        "Missing todo selector (or use --done to remove completed todos)",
      );
    }

    const store = await this.todoRepo.load();

    const doomed = new Set(
      input.done
        ? store.todos.flatMap((t, i) => (t.done ? [i] : []))
        : resolveSelectors(input.selectors, store.todos),
    );

    if (doomed.size === 0) {
      return { status: "nothing_removed", removed: [] };
    }

    const removed = store.todos.filter((_, i) => doomed.has(i));
    const kept = store.todos.filter((_, i) => !doomed.has(i));

    await this.todoRepo.save({ ...store, todos: kept });

    return { status: "todo_removed", removed };
  }
}
