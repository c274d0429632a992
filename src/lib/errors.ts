export type ErrorKind =
  | 'missing_source_directory'
  | 'wrong_field_count'
  | 'unreadable_file'
  | 'malformed_json'
  | 'invalid_document'
  | 'unknown_model'
  | 'missing_required_flag'
  | 'model_mismatch'
  | 'name_collision';

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export const ok = <T>(value: T): { ok: true; value: T } => ({ ok: true, value });
export const err = <E>(error: E): { ok: false; error: E } => ({ ok: false, error });

export interface FormatError {
  kind: 'wrong_field_count';
  filename: string;
  expected: number;
  actual: number;
}

export interface ParseError {
  kind: 'malformed_json' | 'invalid_document' | 'unreadable_file';
  message: string;
  issues?: string[];
}

export type IssueKind = ErrorKind | 'empty_collection' | 'malformed_folder_name';

export interface FileIssue {
  file: string;
  kind: IssueKind;
  message: string;
}

// Fatal to a single batch; sibling batches keep running.
export class BatchError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string) {
    super(message);
    this.name = 'BatchError';
    this.kind = kind;
  }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}
