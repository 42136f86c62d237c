// AddTodosUseCase - Append one record per content string

import type { AddOutput } from "../entities/outputs.js";
import type { TodoRecord } from "../entities/todo.js";
import { MarcError } from "../entities/errors.js";
import {
  generateTodoId,
  generateUniqueId,
  getLocalISOString,
  normalizeContent,
  normalizeTag,
  withTags,
} from "../entities/todo-helpers.js";
import type { TodoRepository } from "../ports/todo-repository.js";

export interface AddTodosInput {
  readonly contents: readonly string[];
  readonly tag?: string;
  readonly metadata?: Readonly<Record<string, string>>;
}

export interface AddTodosDeps {
  readonly todoRepo: TodoRepository;
  readonly generateId?: () => string;
  readonly getTimestamp?: () => string;
}

export class AddTodosUseCase {
  constructor(private readonly deps: AddTodosDeps) {}

  async execute(input: AddTodosInput): Promise<AddOutput> {
    if (input.contents.length === 0) {
      throw new MarcError("invalid_args", "Nothing to add: give at least one todo");
    }

    const contents = input.contents.map(normalizeContent);
    const tag = input.tag === undefined ? undefined : normalizeTag(input.tag);

    const generateId = this.deps.generateId ?? generateTodoId;
    const getTimestamp = this.deps.getTimestamp ?? (() => getLocalISOString());

    const store = await this.deps.todoRepo.load();
    const timestamp = getTimestamp();
    const todos = [...store.todos];
    const added: TodoRecord[] = [];

    for (const content of contents) {
      const todo: TodoRecord = {
        id: generateUniqueId(todos, generateId),
        content,
        done: false,
        ...(tag !== undefined ? { tag } : {}),
        ...(input.metadata && Object.keys(input.metadata).length > 0
          ? { metadata: { ...input.metadata } }
          : {}),
        created_at: timestamp,
        done_at: null,
      };
      todos.push(todo);
      added.push(todo);
    }

    await this.deps.todoRepo.save({
      ...store,
      tags: tag !== undefined ? withTags(store.tags, tag) : store.tags,
      todos,
    });

    return { todos: added };
  }
}
