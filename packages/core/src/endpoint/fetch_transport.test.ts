import { Agent } from 'undici';
import { sendRequest, toFetchInit } from './fetch_transport';
import { buildRequest } from './request_builder';
import { TransportError } from './errors';
import type { EndpointFetchFn, EndpointFetchResponse, RequestOptions } from './endpoint.types';

// ==================== Test Helpers ====================

function createMockResponse(status: number, body: string, headers: Record<string, string> = {}): EndpointFetchResponse {
  return {
    status,
    headers: new Headers(headers),
    text: jest.fn().mockResolvedValue(body),
  };
}

function createStreamingResponse(status: number, chunks: string[]) {
  const pending = chunks.map(chunk => Buffer.from(chunk, 'utf8'));
  const reader = {
    read: jest.fn(async () => {
      const value = pending.shift();
      return value === undefined ? { done: true } : { done: false, value };
    }),
    cancel: jest.fn().mockResolvedValue(undefined),
  };
  const response: EndpointFetchResponse = {
    status,
    headers: new Headers(),
    body: { getReader: () => reader },
    text: jest.fn().mockResolvedValue(chunks.join('')),
  };
  return { response, reader };
}

function build(options: RequestOptions = {}) {
  return buildRequest(options, { userAgent: 'test-agent', accept: '', authorization: null });
}

const API_URL = 'https://api.example.test/things';

// ==================== Tests ====================

describe('toFetchInit', () => {
  it('should map a default request', () => {
    const init = toFetchInit(build());

    expect(init).toEqual({
      method: 'GET',
      headers: { 'User-Agent': 'test-agent' },
      redirect: 'follow',
    });
  });

  it('should carry the payload as the body', () => {
    const init = toFetchInit(build({ method: 'PUT', payload: '{"a":1}' }));

    expect(init.method).toBe('PUT');
    expect(init.body).toBe('{"a":1}');
    expect(init.headers['Content-Type']).toBe('application/json');
  });

  it('should refuse redirects when followRedirects is false', () => {
    expect(toFetchInit(build({ followRedirects: false })).redirect).toBe('manual');
  });

  it('should attach a timeout signal for a deadline', () => {
    const init = toFetchInit(build({ deadline: 2 }));

    expect(init.signal).toBeInstanceOf(AbortSignal);
    expect(init.signal?.aborted).toBe(false);
  });

  it('should use a lenient dispatcher when certificates are not validated', () => {
    const first = toFetchInit(build({ validateCertificate: false }));
    const second = toFetchInit(build({ validateCertificate: false }));

    expect(first.dispatcher).toBeInstanceOf(Agent);
    expect(second.dispatcher).toBe(first.dispatcher);
    expect(toFetchInit(build()).dispatcher).toBeUndefined();
  });
});

describe('sendRequest', () => {
  let mockFetch: jest.Mock<ReturnType<EndpointFetchFn>, Parameters<EndpointFetchFn>>;

  beforeEach(() => {
    mockFetch = jest.fn();
  });

  it('should return status, body and lower-cased headers', async () => {
    mockFetch.mockResolvedValue(createMockResponse(201, '{"ok":true}', { 'X-RateLimit-Remaining': '42' }));

    const result = await sendRequest(mockFetch, API_URL, build());

    expect(result).toEqual({
      statusCode: 201,
      content: '{"ok":true}',
      headers: { 'x-ratelimit-remaining': '42' },
      truncated: false,
    });
    expect(mockFetch).toHaveBeenCalledWith(API_URL, expect.objectContaining({ method: 'GET' }));
  });

  it('should wrap fetch failures in TransportError', async () => {
    mockFetch.mockRejectedValue(new Error('connect ECONNREFUSED'));

    const error = await sendRequest(mockFetch, API_URL, build()).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransportError);
    expect((error as TransportError).message).toBe(`GET: ${API_URL} failed (connect ECONNREFUSED)`);
    expect((error as TransportError).url).toBe(API_URL);
  });

  it('should report an expired deadline', async () => {
    mockFetch.mockRejectedValue(Object.assign(new Error('The operation was aborted due to timeout'), { name: 'TimeoutError' }));

    const error = await sendRequest(mockFetch, API_URL, build({ deadline: 2 })).catch((e: unknown) => e);

    expect((error as TransportError).message).toBe(`GET: ${API_URL} failed (deadline of 2s exceeded)`);
  });

  it('should fail on an oversized body unless truncation is allowed', async () => {
    mockFetch.mockResolvedValue(createMockResponse(200, 'abcdefghij'));

    const error = await sendRequest(mockFetch, API_URL, build(), 4).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransportError);
    expect((error as TransportError).message).toBe(`GET: ${API_URL} returned more than the 4 bytes allowed`);
  });

  it('should truncate an oversized body when allowed', async () => {
    mockFetch.mockResolvedValue(createMockResponse(200, 'abcdefghij'));

    const result = await sendRequest(mockFetch, API_URL, build({ allowTruncated: true }), 4);

    expect(result.content).toBe('abcd');
    expect(result.truncated).toBe(true);
  });

  it('should read a streamed body chunk by chunk', async () => {
    const { response } = createStreamingResponse(200, ['{"ok":', 'true}']);
    mockFetch.mockResolvedValue(response);

    const result = await sendRequest(mockFetch, API_URL, build());

    expect(result.content).toBe('{"ok":true}');
    expect(result.truncated).toBe(false);
    expect(response.text).not.toHaveBeenCalled();
  });

  it('should stop reading a stream once it passes the limit', async () => {
    const { response, reader } = createStreamingResponse(200, ['abcd', 'efgh', 'ijkl']);
    mockFetch.mockResolvedValue(response);

    const result = await sendRequest(mockFetch, API_URL, build({ allowTruncated: true }), 6);

    expect(result.content).toBe('abcdef');
    expect(result.truncated).toBe(true);
    expect(reader.read).toHaveBeenCalledTimes(2);
    expect(reader.cancel).toHaveBeenCalledTimes(1);
  });

  it('should fail on an oversized stream without reading the rest', async () => {
    const { response, reader } = createStreamingResponse(200, ['abcd', 'efgh', 'ijkl']);
    mockFetch.mockResolvedValue(response);

    const error = await sendRequest(mockFetch, API_URL, build(), 6).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransportError);
    expect(reader.read).toHaveBeenCalledTimes(2);
  });

  it('should not split a multi-byte character when truncating', async () => {
    mockFetch.mockResolvedValue(createMockResponse(200, 'aé'));

    const result = await sendRequest(mockFetch, API_URL, build({ allowTruncated: true }), 2);

    expect(result.content).toBe('a');
    expect(result.truncated).toBe(true);
  });
});
