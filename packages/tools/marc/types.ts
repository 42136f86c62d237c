// Marc types - re-exported from domain entities

export type { TodoRecord } from "./domain/entities/todo.js";
export type { TodoStore } from "./domain/entities/store.js";
export { emptyStore, STORE_VERSION } from "./domain/entities/store.js";
export type {
  AddOutput,
  CompleteOutput,
  EditOutput,
  LogItem,
  LogOutput,
  RemoveOutput,
  TagCount,
  TagCreateOutput,
  TagListOutput,
  TagPruneOutput,
  TagRenameOutput,
} from "./domain/entities/outputs.js";
export type { MarcErrorCode } from "./domain/entities/errors.js";
export { MarcError } from "./domain/entities/errors.js";
