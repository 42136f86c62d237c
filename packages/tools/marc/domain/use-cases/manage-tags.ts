// ManageTagsUseCase - List, create, prune and rename tags

import type {
  TagCreateOutput,
  TagListOutput,
  TagPruneOutput,
  TagRenameOutput,
} from "../entities/outputs.js";
import { MarcError } from "../entities/errors.js";
import {
  countTags,
  normalizeTag,
  withTag,
  withTags,
} from "../entities/todo-helpers.js";
import type { TodoRepository } from "../ports/todo-repository.js";

export interface RenameTagInput {
  readonly oldTag: string;
  readonly newTag: string;
}

export class ManageTagsUseCase {
  constructor(private readonly todoRepo: TodoRepository) {}

  /**
   * Every declared or used tag, sorted, with the number of records
   * carrying it.
   */
  async list(): Promise<TagListOutput> {
    const store = await this.todoRepo.load();
    const counts = countTags(store.todos);

    const tags = withTags(store.tags, ...counts.keys())
      .map((tag) => ({ tag, count: counts.get(tag) ?? 0 }));

    return { tags };
  }

  async create(name: string): Promise<TagCreateOutput> {
    const tag = normalizeTag(name);
    const store = await this.todoRepo.load();

    if (store.tags.includes(tag)) {
      return { status: "tag_exists", tag };
    }

    await this.todoRepo.save({ ...store, tags: withTags(store.tags, tag) });
    return { status: "tag_created", tag };
  }

  /** Drop declared tags no record carries. */
  async prune(): Promise<TagPruneOutput> {
    const store = await this.todoRepo.load();
    const counts = countTags(store.todos);

    const pruned = store.tags.filter((tag) => !counts.has(tag));
    if (pruned.length === 0) {
      return { pruned };
    }

    await this.todoRepo.save({
      ...store,
      tags: store.tags.filter((tag) => counts.has(tag)),
    });
    return { pruned };
  }

  async rename(input: RenameTagInput): Promise<TagRenameOutput> {
    const oldTag = normalizeTag(input.oldTag);
    const newTag = normalizeTag(input.newTag);

    const store = await this.todoRepo.load();
    const declared = store.tags.includes(oldTag);
    const affected = store.todos.filter((t) => t.tag === oldTag).length;

    if (!declared && affected === 0) {
      throw new MarcError("tag_not_found", `Tag not found: ${oldTag}`);
    }

    const todos = store.todos.map((t) =>
      t.tag === oldTag ? withTag(t, newTag) : t
    );
    const tags = withTags(store.tags.filter((t) => t !== oldTag), newTag);

    await this.todoRepo.save({ ...store, tags, todos });

    return { status: "tag_renamed", updatedCount: affected, oldTag, newTag };
  }
}
