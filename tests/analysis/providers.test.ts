import { PipelineError } from '../../src/domain/errors';
import { failureFromException, failureFromResponse, readJson } from '../../src/analysis/providers/types';
import { supportsVision } from '../../src/analysis/providers';
import { parseRetryAfter } from '../../src/http';
import { textResponse } from '../helpers';

describe('failureFromResponse', () => {
  it('maps 429 to RateLimited with the Retry-After hint', async () => {
    const err = await failureFromResponse('OpenAI', textResponse(429, 'slow', { 'Retry-After': '2' }), []);
    expect(err.kind).toBe('RateLimited');
    expect(err.typedError.details).toEqual({ service: 'OpenAI', retryAfterMs: 2000 });
  });

  it('maps 401 and 403 to AuthError', async () => {
    expect((await failureFromResponse('OpenAI', textResponse(401, ''), [])).kind).toBe('AuthError');
    expect((await failureFromResponse('OpenAI', textResponse(403, ''), [])).kind).toBe('AuthError');
  });

  it('maps 5xx to TransientNetworkError with a masked snippet', async () => {
    const err = await failureFromResponse('OpenAI', textResponse(500, 'key test-secret broke'), ['test-secret']);
    expect(err.kind).toBe('TransientNetworkError');
    expect(err.message).toBe('OpenAI: HTTP 500: key *******cret broke');
  });

  it('maps other statuses to ProviderError', async () => {
    const err = await failureFromResponse('OpenAI', textResponse(400, 'bad request'), []);
    expect(err.kind).toBe('ProviderError');
    expect(err.message).toBe('OpenAI returned HTTP 400: bad request');
  });
});

describe('failureFromException', () => {
  it('passes typed errors through', () => {
    const typed = new PipelineError({
      kind: 'Internal',
      code: 'SYSTEM.INTERNAL',
      message: 'x',
      retryable: false,
      suggestedFixes: [],
    });
    expect(failureFromException('OpenAI', typed, [])).toBe(typed);
  });

  it('wraps anything else as a transient failure', () => {
    const err = failureFromException('OpenAI', new Error('ECONNRESET'), []);
    expect(err.kind).toBe('TransientNetworkError');
    expect(err.message).toBe('OpenAI: connection failed: ECONNRESET');
  });
});

describe('readJson', () => {
  it('raises ProviderError for a non-JSON body', async () => {
    await expect(readJson('OpenAI', textResponse(200, '<html>'))).rejects.toMatchObject({
      kind: 'ProviderError',
      message: 'OpenAI returned a non-JSON body (HTTP 200)',
    });
  });
});

describe('supportsVision', () => {
  it('matches vision-capable model names', () => {
    expect(supportsVision('gpt-4o-2024-08-06')).toBe(true);
    expect(supportsVision('gpt-3.5-turbo')).toBe(false);
  });
});

describe('parseRetryAfter', () => {
  it('reads seconds and HTTP dates', () => {
    expect(parseRetryAfter('1.5')).toBe(1500);
    expect(parseRetryAfter('Thu, 01 Jan 1970 00:00:10 GMT', 4000)).toBe(6000);
    expect(parseRetryAfter(null)).toBeUndefined();
    expect(parseRetryAfter('soon')).toBeUndefined();
  });
});
