/**
 * Client-facing request errors
 */

import type { ErrorBody } from './index.js';

export type RequestErrorCode =
  | 'BAD_BODY_PARAM'     // Unknown key in a merge body
  | 'MISSING_FIELD'      // Required key absent from a create body
  | 'INVALID_FIELD'      // Known key with a value of the wrong type
  | 'NOT_AN_OBJECT'      // Body parsed but is not a JSON object
  | 'MALFORMED_JSON'     // Body failed to parse
  | 'NOT_JSON'           // PUT/POST body not declared as application/json
  | 'INVALID_BODY'       // Body rejected while being read (size, charset, encoding)
  | 'UNSUPPORTED_METHOD'
  | 'NOT_FOUND';

/**
 * Error carrying the HTTP status it should be reported with
 */
export class RequestError extends Error {
  public readonly code: RequestErrorCode;
  public readonly status: number;

  constructor(code: RequestErrorCode, message: string, status = 400) {
    super(message);
    this.name = 'RequestError';
    this.code = code;
    this.status = status;
  }

  toJSON(): ErrorBody {
    return { error: this.message };
  }
}

export function badBodyParam(): RequestError {
  return new RequestError('BAD_BODY_PARAM', 'bad body param');
}

export function missingField(field: string): RequestError {
  return new RequestError('MISSING_FIELD', `missing field ${field}`);
}

export function invalidField(field: string): RequestError {
  return new RequestError('INVALID_FIELD', `invalid field ${field}`);
}

export function notAnObject(): RequestError {
  return new RequestError('NOT_AN_OBJECT', 'body must be a JSON object');
}

export function malformedJson(): RequestError {
  return new RequestError('MALFORMED_JSON', 'malformed json body');
}

export function notJson(): RequestError {
  return new RequestError('NOT_JSON', 'expected application/json body');
}

const BODY_ERROR_MESSAGES: Record<string, string> = {
  'entity.too.large': 'body too large',
  'charset.unsupported': 'unsupported charset',
  'encoding.unsupported': 'unsupported content encoding',
  'request.aborted': 'request aborted',
};

/**
 * Translate an error raised by the JSON body parser into a client error.
 * Returns null for anything that is not a 4xx.
 */
export function fromBodyParserError(err: unknown): RequestError | null {
  if (typeof err !== 'object' || err === null) return null;

  const status = 'status' in err ? err.status : 'statusCode' in err ? err.statusCode : undefined;
  if (typeof status !== 'number' || status < 400 || status > 499) return null;

  const type = 'type' in err && typeof err.type === 'string' ? err.type : '';
  if (type === 'entity.parse.failed') return malformedJson();

  return new RequestError('INVALID_BODY', BODY_ERROR_MESSAGES[type] ?? 'invalid request body');
}

export function unsupportedMethod(): RequestError {
  return new RequestError('UNSUPPORTED_METHOD', 'unsupported method');
}

export function notFound(): RequestError {
  return new RequestError('NOT_FOUND', 'not found', 404);
}
