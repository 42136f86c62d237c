// Selector resolution - maps a user-supplied reference to one record

import { MarcError } from "./errors.js";
import type { TodoRecord } from "./todo.js";

/**
 * Resolve a selector to the 0-based position of a record.
 *
 * Resolution order:
 *   1. all digits within 1..n -> 1-based position (as printed by `log`)
 *   2. case-insensitive ID prefix
 *   3. case-insensitive exact content, then content substring
 */
export function resolveSelector(
  selector: string,
  todos: readonly TodoRecord[],
): number {
  const trimmed = selector.trim();
  if (trimmed.length === 0) {
    throw new MarcError("invalid_args", "Selector cannot be empty");
  }

  if (/^\d+$/.test(trimmed)) {
    const position = parseInt(trimmed, 10);
    if (position >= 1 && position <= todos.length) {
      return position - 1;
    }
  }

  const needle = trimmed.toLowerCase();

  const byId = matchingPositions(
    todos,
    (t) => t.id.toLowerCase().startsWith(needle),
  );
  if (byId.length === 1) return byId[0];
  if (byId.length > 1) throw ambiguous(trimmed, byId, todos);

  const exact = matchingPositions(
    todos,
    (t) => t.content.toLowerCase() === needle,
  );
  if (exact.length === 1) return exact[0];

  const partial = matchingPositions(
    todos,
    (t) => t.content.toLowerCase().includes(needle),
  );
  if (partial.length === 1) return partial[0];
  if (partial.length > 1) throw ambiguous(trimmed, partial, todos);

  throw new MarcError("todo_not_found", `No todo found matching: ${trimmed}`);
}

/**
 * Resolve several selectors at once, dropping duplicates.
 * Throws before returning anything if one selector fails.
 */
export function resolveSelectors(
  selectors: readonly string[],
  todos: readonly TodoRecord[],
): number[] {
  const positions = new Set<number>();
  for (const selector of selectors) {
    positions.add(resolveSelector(selector, todos));
  }
  return Array.from(positions).sort((a, b) => a - b);
}

function matchingPositions(
  todos: readonly TodoRecord[],
  predicate: (todo: TodoRecord) => boolean,
): number[] {
  const positions: number[] = [];
  todos.forEach((todo, i) => {
    if (predicate(todo)) positions.push(i);
  });
  return positions;
}

function ambiguous(
  selector: string,
  positions: readonly number[],
  todos: readonly TodoRecord[],
): MarcError {
  const lines = [
    `Ambiguous selector '${selector}' matches ${positions.length} todos:`,
  ];
  for (const i of positions.slice(0, 10)) {
    lines.push(`  ${i + 1}  ${todos[i].id}  "${todos[i].content}"`);
  }
  return new MarcError("ambiguous_selector", lines.join("\n"));
}
