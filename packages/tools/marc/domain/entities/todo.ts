// Todo entity - a single annotated note in the store

/**
 * Immutable todo record.
 * `tag` is absent for untagged records; `metadata` holds the extra
 * attributes given with `add --meta key=value`.
 */
export type TodoRecord = {
  readonly id: string; // Unique 7-char base62 ID
  readonly content: string;
  readonly done: boolean;
  readonly tag?: string;
  readonly metadata?: Readonly<Record<string, string>>;
  readonly created_at: string; // ISO 8601 with offset
  readonly done_at: string | null;
};
