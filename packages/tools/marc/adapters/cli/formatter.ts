/**
 * CLI output formatters for marc commands.
 *
 * All formatX() functions transform command output objects into human-readable strings.
 * These are pure functions with no side effects; colours come from the
 * Chalk instance passed in.
 */

import type { ChalkInstance } from "chalk";
import type {
  AddOutput,
  CompleteOutput,
  EditOutput,
  LogItem,
  LogOutput,
  MarcError,
  RemoveOutput,
  TagCreateOutput,
  TagListOutput,
  TagPruneOutput,
  TagRenameOutput,
  TodoRecord,
} from "../../types.js";

// ============================================================================
// ID helpers (needed by formatters)
// ============================================================================

/**
 * Get shortest unambiguous prefix for display.
 */
export function getShortId(id: string, allIds: readonly string[]): string {
  const minLen = 5;
  let len = minLen;

  while (len < id.length) {
    const prefix = id.slice(0, len);
    const conflicts = allIds.filter((other) =>
      other !== id && other.toLowerCase().startsWith(prefix.toLowerCase())
    );

    if (conflicts.length === 0) {
      // Add 1 char margin, but don't exceed id length
      return id.slice(0, Math.min(len + 1, id.length));
    }
    len++;
  }

  return id;
}

function oneLine(text: string): string {
  return text.replace(/\s*\n\s*/g, " ");
}

// ============================================================================
// Formatters
// ============================================================================

export function formatStatus(status: string): string {
  return status.replace(/_/g, " ");
}

export function formatAdd(output: AddOutput): string {
  return output.todos.map((t) => t.id).join("\n");
}

export function formatTodoLine(
  item: LogItem,
  allIds: readonly string[],
  chalk: ChalkInstance,
  indexWidth: number,
): string {
  const { todo } = item;
  const index = String(item.index).padStart(indexWidth);
  const mark = todo.done ? chalk.green("x") : " ";
  const content = todo.done
    ? chalk.dim(oneLine(todo.content))
    : oneLine(todo.content);

  let line = `${index} ${chalk.gray(getShortId(todo.id, allIds))} [${mark}] ${content}`;

  if (todo.tag !== undefined) {
    line += `  ${chalk.cyan(`#${todo.tag}`)}`;
  }

  const metadata = Object.entries(todo.metadata ?? {})
    .map(([k, v]) => `[${k}:: ${v}]`)
    .join(" ");
  if (metadata) {
    line += `  ${chalk.dim(metadata)}`;
  }

  return line;
}

export function formatLog(output: LogOutput, chalk: ChalkInstance): string {
  if (output.items.length === 0) {
    return "No todos";
  }

  const indexWidth = String(
    Math.max(...output.items.map((item) => item.index)),
  ).length;

  return output.items
    .map((item) => formatTodoLine(item, output.allIds, chalk, indexWidth))
    .join("\n");
}

/**
 * Full list as drawn by the interactive editor.
 */
export function formatTodos(
  todos: readonly TodoRecord[],
  chalk: ChalkInstance,
): string {
  return formatLog(
    {
      items: todos.map((todo, i) => ({ index: i + 1, todo })),
      allIds: todos.map((t) => t.id),
    },
    chalk,
  );
}

export function formatComplete(output: CompleteOutput): string {
  const label = formatStatus(output.status);
  return output.todos.map((t) => `${label}: ${oneLine(t.content)}`).join("\n");
}

export function formatRemove(output: RemoveOutput): string {
  if (output.removed.length === 0) {
    return formatStatus(output.status);
  }
  return output.removed
    .map((t) => `removed: ${oneLine(t.content)}`)
    .join("\n");
}

export function formatTags(output: TagListOutput): string {
  if (output.tags.length === 0) {
    return "No tags";
  }
  return output.tags.map(({ tag, count }) => `${tag} (${count})`).join("\n");
}

export function formatTagCreate(output: TagCreateOutput): string {
  return `${formatStatus(output.status)}: ${output.tag}`;
}

export function formatTagPrune(output: TagPruneOutput): string {
  if (output.pruned.length === 0) {
    return "nothing pruned";
  }
  return `pruned: ${output.pruned.join(", ")}`;
}

export function formatTagRename(output: TagRenameOutput): string {
  const noun = output.updatedCount === 1 ? "todo" : "todos";
  return `${formatStatus(output.status)}: ${output.oldTag} -> ${output.newTag} (${output.updatedCount} ${noun})`;
}

export function formatEdit(output: EditOutput): string {
  if (output.status !== "saved") {
    return output.status;
  }
  return `saved (${output.dropped} dropped, ${output.updated} updated)`;
}

export function formatError(error: MarcError): string {
  return `error: ${error.code}\n${error.message}`;
}
