// Command output types - immutable result types for all marc commands

import type { TodoRecord } from "./todo.js";

export type AddOutput = {
  readonly todos: readonly TodoRecord[];
};

export type LogItem = {
  readonly index: number; // 1-based position in the full store
  readonly todo: TodoRecord;
};

export type LogOutput = {
  readonly items: readonly LogItem[];
  readonly allIds: readonly string[]; // For short ID computation
};

export type CompleteOutput = {
  readonly status: "todo_done" | "todo_undone";
  readonly todos: readonly TodoRecord[];
};

export type RemoveOutput = {
  readonly status: "todo_removed" | "nothing_removed";
  readonly removed: readonly TodoRecord[];
};

export type TagCount = {
  readonly tag: string;
  readonly count: number;
};

export type TagListOutput = {
  readonly tags: readonly TagCount[];
};

export type TagCreateOutput = {
  readonly status: "tag_created" | "tag_exists";
  readonly tag: string;
};

export type TagPruneOutput = {
  readonly pruned: readonly string[];
};

export type TagRenameOutput = {
  readonly status: "tag_renamed";
  readonly updatedCount: number;
  readonly oldTag: string;
  readonly newTag: string;
};

export type EditOutput = {
  readonly status: "saved" | "discarded" | "unchanged";
  readonly dropped: number;
  readonly updated: number;
};
