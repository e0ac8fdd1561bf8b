// @tokensum/core — checksums and pseudorandom tokens

export { computeChecksum } from './checksum.js';
export { generateToken, GENERATE_TOKEN_BYTES, WORD_TOKEN_BYTES } from './token.js';
export { handleTokensRequest, splitWords, countWords } from './tokens.js';
export { TokensRequestSchema, parseTokensRequest } from './schema.js';
export { renderIndexPage, DEFAULT_TEMPLATE_PATH, DEFAULT_PAGE_TITLE } from './render.js';
export type { IndexPageOptions } from './render.js';
export { AppError, isAppError, toAppError } from './errors.js';
export type { ErrorCode, AppErrorOptions } from './errors.js';

export type {
  TokensRequest,
  TokensPayload,
  TokensResponse,
  GenerateResponse,
  IssueLocation,
  ValidationIssue,
  ParseResult,
} from './types.js';
