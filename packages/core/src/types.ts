/**
 * tokensum wire types
 *
 * Shapes exchanged over HTTP by the token and checksum endpoints.
 */

// ---------------------------------------------------------------------------
// Requests
// ---------------------------------------------------------------------------

/** Body accepted by `POST /tokens` once it has passed validation */
export interface TokensRequest {
  /** Text to fingerprint; one token is issued per whitespace-separated word */
  text: string;
}

/**
 * Payload as the handler tolerates it when called directly.
 * Absent or null text is treated as the empty string.
 */
export interface TokensPayload {
  text?: string | null;
}

// ---------------------------------------------------------------------------
// Responses
// ---------------------------------------------------------------------------

export interface TokensResponse {
  /** SHA-256 of the UTF-8 text, lowercase hex (64 chars) */
  checksum: string;
  /** One 16-char hex token per word, never empty */
  tokens: string[];
}

export interface GenerateResponse {
  /** 32-char lowercase hex token */
  token: string;
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

/** Location segment of a validation issue, e.g. `['body', 'text']` */
export type IssueLocation = (string | number)[];

/** A single request validation failure, reported in a 422 `detail` array */
export interface ValidationIssue {
  type: string;
  loc: IssueLocation;
  msg: string;
  input?: unknown;
}

export type ParseResult<T> =
  | { success: true; data: T }
  | { success: false; issues: ValidationIssue[] };
