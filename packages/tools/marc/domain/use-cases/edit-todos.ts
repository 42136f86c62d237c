// EditTodosUseCase - Interactive read/apply/redraw loop over the store

import type { EditOutput } from "../entities/outputs.js";
import type { TodoRecord } from "../entities/todo.js";
import { MarcError } from "../entities/errors.js";
import { resolveSelector } from "../entities/selector.js";
import {
  getLocalISOString,
  normalizeContent,
  normalizeTag,
  withDone,
  withTag,
  withTags,
} from "../entities/todo-helpers.js";
import type { EditorView } from "../ports/editor-view.js";
import type { TodoRepository } from "../ports/todo-repository.js";

export type EditCommand =
  | { readonly kind: "drop"; readonly selector: string }
  | { readonly kind: "toggle"; readonly selector: string }
  | {
    readonly kind: "content";
    readonly selector: string;
    readonly content: string;
  }
  | { readonly kind: "tag"; readonly selector: string; readonly tag?: string }
  | { readonly kind: "list" }
  | { readonly kind: "help" }
  | { readonly kind: "quit" }
  | { readonly kind: "abort" };

export const EDITOR_HELP = [
  "Commands:",
  "  d <sel>          drop a todo",
  "  x <sel>          toggle done",
  "  e <sel> <text>   replace the content",
  "  t <sel> [tag]    set the tag (clear it when omitted)",
  "  l                redraw the list",
  "  h                this help",
  "  q                save and quit",
  "  q!               quit without saving",
].join("\n");

const ALIASES = new Map<string, EditCommand["kind"]>([
  ["d", "drop"],
  ["drop", "drop"],
  ["x", "toggle"],
  ["done", "toggle"],
  ["e", "content"],
  ["edit", "content"],
  ["t", "tag"],
  ["tag", "tag"],
  ["l", "list"],
  ["list", "list"],
  ["h", "help"],
  ["?", "help"],
  ["help", "help"],
  ["q", "quit"],
  ["quit", "quit"],
  ["q!", "abort"],
  ["abort", "abort"],
]);

/**
 * Parse one editor line. Returns null for blank lines.
 */
export function parseEditCommand(line: string): EditCommand | null {
  const trimmed = line.trim();
  if (trimmed.length === 0) return null;

  const [word, selector] = trimmed.split(/\s+/);
  const kind = ALIASES.get(word.toLowerCase());
  if (kind === undefined) {
    throw new MarcError(
      "invalid_args",
      `Unknown command: ${word} (h for help)`,
    );
  }

  // Everything after "<command> <selector> ", inner spacing preserved
  const argument = trimmed.match(/^\S+\s+\S+\s+(.+)$/)?.[1];

  switch (kind) {
    case "list":
    case "help":
    case "quit":
    case "abort":
      return { kind };
    case "drop":
    case "toggle":
      return { kind, selector: requireSelector(kind, selector) };
    case "content":
      return {
        kind,
        selector: requireSelector(kind, selector),
        content: argument ?? "",
      };
    case "tag":
      return argument === undefined
        ? { kind, selector: requireSelector(kind, selector) }
        : { kind, selector: requireSelector(kind, selector), tag: argument };
  }
}

function requireSelector(
  kind: string,
  selector: string | undefined,
): string {
  if (selector === undefined) {
    throw new MarcError("invalid_args", `Missing selector for '${kind}'`);
  }
  return selector;
}

export interface EditTodosDeps {
  readonly todoRepo: TodoRepository;
  readonly view: EditorView;
  readonly getTimestamp?: () => string;
}

export class EditTodosUseCase {
  constructor(private readonly deps: EditTodosDeps) {}

  /**
   * Run one session. The view is closed however the session ends,
   * including when the store cannot be loaded.
   */
  async execute(): Promise<EditOutput> {
    try {
      return await this.session();
    } finally {
      this.deps.view.close();
    }
  }

  private async session(): Promise<EditOutput> {
    const { todoRepo, view } = this.deps;
    const getTimestamp = this.deps.getTimestamp ?? (() => getLocalISOString());

    const store = await todoRepo.load();
    let todos: TodoRecord[] = [...store.todos];
    let tags = [...store.tags];
    let dropped = 0;
    const updatedIds = new Set<string>();

    view.show(todos);

    while (true) {
      const line = await view.read();
      if (line === null) break;

      let command: EditCommand | null;
      try {
        command = parseEditCommand(line);
      } catch (e) {
        view.message(describe(e));
        continue;
      }
      if (command === null) continue;

      if (command.kind === "quit") break;
      if (command.kind === "abort") {
        return { status: "discarded", dropped: 0, updated: 0 };
      }
      if (command.kind === "help") {
        view.message(EDITOR_HELP);
        continue;
      }
      if (command.kind === "list") {
        view.show(todos);
        continue;
      }

      const position = locate(command.selector, todos, view);
      if (position === null) continue;
      const target = todos[position];

      try {
        switch (command.kind) {
          case "drop":
            todos = todos.filter((_, i) => i !== position);
            updatedIds.delete(target.id);
            dropped++;
            break;
          case "toggle":
            todos[position] = withDone(target, !target.done, getTimestamp());
            updatedIds.add(target.id);
            break;
          case "content":
            todos[position] = {
              ...target,
              content: normalizeContent(command.content),
            };
            updatedIds.add(target.id);
            break;
          case "tag": {
            const tag = command.tag === undefined
              ? undefined
              : normalizeTag(command.tag);
            todos[position] = withTag(target, tag);
            if (tag !== undefined) tags = withTags(tags, tag);
            updatedIds.add(target.id);
            break;
          }
        }
      } catch (e) {
        view.message(describe(e));
        continue;
      }

      view.show(todos);
    }

    if (dropped === 0 && updatedIds.size === 0) {
      return { status: "unchanged", dropped: 0, updated: 0 };
    }

    await todoRepo.save({ ...store, tags, todos });
    return { status: "saved", dropped, updated: updatedIds.size };
  }
}

function locate(
  selector: string,
  todos: readonly TodoRecord[],
  view: EditorView,
): number | null {
  try {
    return resolveSelector(selector, todos);
  } catch (e) {
    view.message(describe(e));
    return null;
  }
}

function describe(e: unknown): string {
  if (e instanceof MarcError) {
    return `error: ${e.message}`;
  }
  throw e;
}
