import { describe, expect, it } from 'vitest';
import { normalizeError, transformErrorToResponse } from './errorTransformation.js';
import {
  DecodeError,
  ErrorCode,
  PayloadTooLargeError,
  UpstreamUnavailableError,
} from '../types/errors.js';

const req = { path: '/resume/analyze' };

function bodyParserError(status: number, type: string, extra: Record<string, unknown> = {}): Error {
  return Object.assign(new Error('request failed'), { status, type, ...extra });
}

describe('normalizeError', () => {
  it('turns an oversized body into PayloadTooLargeError', () => {
    const error = normalizeError(
      bodyParserError(413, 'entity.too.large', { length: 10 * 1024 * 1024, limit: 5 * 1024 * 1024 })
    );

    expect(error).toBeInstanceOf(PayloadTooLargeError);
    expect(error.message).toBe('File exceeds the 5 MB limit. Received 10.00 MB.');
  });

  it('turns other client-side body errors into bad requests', () => {
    const error = normalizeError(bodyParserError(400, 'request.aborted'));

    expect(error.code).toBe(ErrorCode.BAD_REQUEST);
    expect(error.statusCode).toBe(400);
  });

  it('wraps unknown errors as internal errors', () => {
    const error = normalizeError(new TypeError('x is undefined'));

    expect(error.code).toBe(ErrorCode.INTERNAL_SERVER_ERROR);
    expect(error.isOperational).toBe(false);
  });
});

describe('transformErrorToResponse', () => {
  it('builds the standard body for application errors', () => {
    const response = transformErrorToResponse(new DecodeError(), req);

    expect(response).toEqual({
      error: 'Bad Request',
      code: 'DECODE_ERROR',
      message: 'Text file is not valid UTF-8',
      statusCode: 400,
      timestamp: expect.any(String),
      path: '/resume/analyze',
    });
  });

  it('leaves error context out of the body', () => {
    const error = new UpstreamUnavailableError('connection', 'Analysis service is unreachable', {
      url: 'http://analysis.internal/webhook',
    });

    expect(Object.keys(transformErrorToResponse(error, req)).sort()).toEqual([
      'code',
      'error',
      'message',
      'path',
      'statusCode',
      'timestamp',
    ]);
  });

  it('hides the message of unexpected errors', () => {
    const response = transformErrorToResponse(new Error('secret internals'), req);

    expect(response.message).toBe('An unexpected error occurred');
    expect(response.statusCode).toBe(500);
    expect(response.stack).toBeUndefined();
  });

  it('shows message and stack when asked to', () => {
    const response = transformErrorToResponse(new Error('secret internals'), req, true);

    expect(response.message).toBe('secret internals');
    expect(response.stack).toContain('secret internals');
  });
});
