// Error types for the marc domain

export type MarcErrorCode =
  | "io_error"
  | "invalid_store"
  | "todo_not_found"
  | "ambiguous_selector"
  | "tag_not_found"
  | "invalid_args";

export class MarcError extends Error {
  constructor(
    public readonly code: MarcErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "MarcError";
  }

  toJSON(): { error: string; code: MarcErrorCode; message: string } {
    return {
      error: this.code,
      code: this.code,
      message: this.message,
    };
  }
}
