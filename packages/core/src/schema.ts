import { z } from 'zod';
import type { IssueLocation, ParseResult, TokensRequest, ValidationIssue } from './types.js';

/** Body schema for `POST /tokens`. Unknown keys are ignored. */
export const TokensRequestSchema = z.object({
  text: z.string().describe('Text to checksum; one token is generated per word'),
});

/**
 * Validate a decoded JSON body against the tokens request schema.
 * Failures are reported as validation issues located under `body`.
 */
export function parseTokensRequest(body: unknown): ParseResult<TokensRequest> {
  const result = TokensRequestSchema.safeParse(body);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return {
    success: false,
    issues: result.error.issues.map((issue) => toValidationIssue(issue, body)),
  };
}

function toValidationIssue(issue: z.ZodIssue, body: unknown): ValidationIssue {
  const loc: IssueLocation = ['body', ...issue.path];

  // A missing key reports the enclosing object as the input
  if (issue.code === z.ZodIssueCode.invalid_type && issue.received === z.ZodParsedType.undefined) {
    return {
      type: 'missing',
      loc,
      msg: 'Field required',
      input: valueAt(body, issue.path.slice(0, -1)),
    };
  }

  return {
    type: issue.code,
    loc,
    msg: issue.message,
    input: valueAt(body, issue.path),
  };
}

function valueAt(root: unknown, path: (string | number)[]): unknown {
  let current = root;
  for (const key of path) {
    if (typeof current !== 'object' || current === null) return undefined;
    current = Reflect.get(current, key);
  }
  return current;
}
