/**
 * Adapter: JsonTodoRepository
 *
 * Implements the TodoRepository port using a single JSON file.
 *
 *   - load: missing file -> empty store; the document is validated
 *     against StoreSchema and rejected as invalid_store otherwise
 *   - save: canonical key order, 2-space indent, trailing newline,
 *     written to "<file>.tmp" then renamed over the store
 *
 * Dependencies:
 *   - FileSystem (port) for file operations
 *   - zod/mini for document validation
 */

import { dirname } from "node:path";
import type { Logger } from "pino";
import { z } from "zod/mini";
import { MarcError } from "../../domain/entities/errors.js";
import {
  emptyStore,
  STORE_VERSION,
  type TodoStore,
} from "../../domain/entities/store.js";
import type { TodoRecord } from "../../domain/entities/todo.js";
import type { FileSystem } from "../../domain/ports/filesystem.js";
import type { TodoRepository } from "../../domain/ports/todo-repository.js";

const TodoRecordSchema = z.object({
  id: z.string().check(z.minLength(1)),
  content: z.string().check(z.minLength(1)),
  done: z.boolean(),
  tag: z.optional(z.string().check(z.minLength(1))),
  metadata: z.optional(z.record(z.string(), z.string())),
  created_at: z.string(),
  done_at: z.nullable(z.string()),
});

const StoreSchema = z.object({
  version: z.number(),
  tags: z.array(z.string()),
  todos: z.array(TodoRecordSchema),
});

export class JsonTodoRepository implements TodoRepository {
  constructor(
    private readonly fs: FileSystem,
    private readonly storePath: string,
    private readonly logger: Logger,
  ) {}

  async load(): Promise<TodoStore> {
    if (!(await this.fs.exists(this.storePath))) {
      this.logger.debug({ path: this.storePath }, "no store yet");
      return emptyStore();
    }

    const content = await this.fs.readFile(this.storePath);
    const store = this.parse(content);
    this.logger.debug(
      { path: this.storePath, todos: store.todos.length },
      "store loaded",
    );
    return store;
  }

  async save(store: TodoStore): Promise<void> {
    const tmpPath = `${this.storePath}.tmp`;
    await this.fs.ensureDir(dirname(this.storePath));
    await this.fs.writeFile(tmpPath, serializeStore(store));
    try {
      await this.fs.rename(tmpPath, this.storePath);
    } catch (e) {
      await this.fs.remove(tmpPath);
      throw e;
    }
    this.logger.debug(
      { path: this.storePath, todos: store.todos.length },
      "store saved",
    );
  }

  async exists(): Promise<boolean> {
    return await this.fs.exists(this.storePath);
  }

  private parse(content: string): TodoStore {
    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch {
      throw new MarcError(
        "invalid_store",
        `Store is not valid JSON: ${this.storePath}`,
      );
    }

    const result = StoreSchema.safeParse(raw);
    if (!result.success) {
      const issue = result.error.issues[0];
      const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      throw new MarcError(
        "invalid_store",
        `Invalid store ${this.storePath} at ${where}: ${issue.message}`,
      );
    }

    if (result.data.version > STORE_VERSION) {
      throw new MarcError(
        "invalid_store",
        `Unsupported store version ${result.data.version} in ${this.storePath}`,
      );
    }

    return result.data;
  }
}

/**
 * Serialize with a fixed key order so that saving a just-loaded store
 * reproduces the file byte for byte.
 */
export function serializeStore(store: TodoStore): string {
  const document = {
    version: store.version,
    tags: store.tags,
    todos: store.todos.map(canonicalTodo),
  };
  return JSON.stringify(document, null, 2) + "\n";
}

function canonicalTodo(todo: TodoRecord): TodoRecord {
  return {
    id: todo.id,
    content: todo.content,
    done: todo.done,
    ...(todo.tag !== undefined ? { tag: todo.tag } : {}),
    ...(todo.metadata !== undefined ? { metadata: todo.metadata } : {}),
    created_at: todo.created_at,
    done_at: todo.done_at,
  };
}
