// Editor view port - terminal surface used by the interactive editor

import type { TodoRecord } from "../entities/todo.js";

export interface EditorView {
  /** Draw the current list of records. */
  show(todos: readonly TodoRecord[]): void;

  /** Print one line of feedback (errors, help). */
  message(text: string): void;

  /** Read the next command line. Resolves to null at end of input. */
  read(): Promise<string | null>;

  close(): void;
}
