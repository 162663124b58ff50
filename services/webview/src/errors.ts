/** Request-scoped failures surfaced to callers of the backlog service. */
export type BacklogErrorCode =
  | 'invalid_product_name'
  | 'product_not_found'
  | 'item_not_found'
  | 'workspace_not_found';

/** Per-record failures; these never abort a scan. */
export type RecordErrorCode = 'malformed_frontmatter' | 'malformed_manifest' | 'file_unreadable';

export class BacklogError extends Error {
  readonly code: BacklogErrorCode;

  constructor(code: BacklogErrorCode, message: string) {
    super(message);
    this.name = 'BacklogError';
    this.code = code;
  }
}

export class RecordParseError extends Error {
  readonly code: RecordErrorCode;

  constructor(code: RecordErrorCode, message: string) {
    super(message);
    this.name = 'RecordParseError';
    this.code = code;
  }
}

const HTTP_STATUS: Record<BacklogErrorCode, number> = {
  invalid_product_name: 400,
  product_not_found: 404,
  item_not_found: 404,
  workspace_not_found: 400,
};

export function httpStatusFor(err: BacklogError): number {
  return HTTP_STATUS[err.code];
}
