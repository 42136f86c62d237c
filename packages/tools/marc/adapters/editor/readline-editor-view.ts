/**
 * Adapter: ReadlineEditorView
 *
 * EditorView over node:readline. Lines are pulled from the interface's
 * async iterator so end of input resolves read() with null.
 */

import { createInterface, type Interface } from "node:readline";
import type { Readable, Writable } from "node:stream";
import type { TodoRecord } from "../../domain/entities/todo.js";
import type { EditorView } from "../../domain/ports/editor-view.js";

export class ReadlineEditorView implements EditorView {
  private readonly rl: Interface;
  private readonly lines: AsyncIterableIterator<string>;

  constructor(
    input: Readable,
    private readonly output: Writable,
    private readonly render: (todos: readonly TodoRecord[]) => string,
  ) {
    this.rl = createInterface({ input, output });
    this.rl.setPrompt("marc> ");
    this.lines = this.rl[Symbol.asyncIterator]();
  }

  show(todos: readonly TodoRecord[]): void {
    this.output.write(this.render(todos) + "\n");
  }

  message(text: string): void {
    this.output.write(text + "\n");
  }

  async read(): Promise<string | null> {
    this.rl.prompt();
    const next = await this.lines.next();
    return next.done ? null : next.value;
  }

  close(): void {
    this.rl.close();
  }
}
