// Main module exports for marc

// ============================================================================
// Domain entities
// ============================================================================

export * from "./types.js";
export { resolveSelector, resolveSelectors } from "./domain/entities/selector.js";

// ============================================================================
// Domain ports (interfaces)
// ============================================================================

export type { EditorView } from "./domain/ports/editor-view.js";
export type { FileSystem } from "./domain/ports/filesystem.js";
export type { TodoRepository } from "./domain/ports/todo-repository.js";

// ============================================================================
// Use cases
// ============================================================================

export { AddTodosUseCase } from "./domain/use-cases/add-todos.js";
export { LogTodosUseCase } from "./domain/use-cases/log-todos.js";
export { CompleteTodosUseCase } from "./domain/use-cases/complete-todos.js";
export { RemoveTodosUseCase } from "./domain/use-cases/remove-todos.js";
export { ManageTagsUseCase } from "./domain/use-cases/manage-tags.js";
export {
  EditTodosUseCase,
  parseEditCommand,
} from "./domain/use-cases/edit-todos.js";

// ============================================================================
// Adapters
// ============================================================================

export { NodeFileSystem } from "./adapters/filesystem/node-fs.js";
export { InMemoryFileSystem } from "./adapters/filesystem/in-memory-fs.js";
export { JsonTodoRepository } from "./adapters/repositories/json-todo-repo.js";
export { ReadlineEditorView } from "./adapters/editor/readline-editor-view.js";

// ============================================================================
// CLI
// ============================================================================

export { type CliContext, main } from "./cli.js";
export { type MarcConfig, resolveConfig } from "./config.js";
