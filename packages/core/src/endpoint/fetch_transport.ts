import { StringDecoder } from 'string_decoder';
import { Agent, fetch as undiciFetch } from 'undici';
import type {
  EndpointFetchFn,
  EndpointFetchInit,
  EndpointFetchResponse,
  EndpointRequest,
  HttpResult,
} from './endpoint.types';
import { TransportError } from './errors';

export const DEFAULT_MAX_RESPONSE_BYTES = 32 * 1024 * 1024;

/** undici's fetch, so requests can carry a dispatcher */
export const defaultFetch: EndpointFetchFn = (url, init) => undiciFetch(url, init);

let insecureAgent: Agent | null = null;

/** Shared dispatcher for requests that skip certificate validation */
function getInsecureAgent(): Agent {
  if (!insecureAgent) {
    insecureAgent = new Agent({ connect: { rejectUnauthorized: false } });
  }
  return insecureAgent;
}

/** Maps a built request onto fetch init options. */
export function toFetchInit(request: EndpointRequest): EndpointFetchInit {
  const init: EndpointFetchInit = {
    method: request.method,
    headers: { ...request.headers },
    redirect: request.followRedirects ? 'follow' : 'manual',
  };
  if (request.payload !== undefined) {
    init.body = request.payload;
  }
  if (request.deadline !== undefined) {
    init.signal = AbortSignal.timeout(Math.round(request.deadline * 1000));
  }
  if (!request.validateCertificate) {
    init.dispatcher = getInsecureAgent();
  }
  return init;
}

function describeFailure(error: unknown, request: EndpointRequest): string {
  if (error instanceof Error && error.name === 'TimeoutError') {
    return `deadline of ${request.deadline}s exceeded`;
  }
  return error instanceof Error ? error.message : String(error);
}

type BodyRead = {
  content: string;
  truncated: boolean;
};

/** Decodes the first `limit` bytes, dropping a character cut in half. */
function decodePrefix(bytes: Buffer, limit: number): string {
  return new StringDecoder('utf8').write(bytes.subarray(0, limit));
}

/**
 * Reads a body, stopping once it exceeds `limit` bytes. A streamed body is
 * cancelled at that point; only a response without a stream is read whole.
 */
async function readBody(response: EndpointFetchResponse, limit: number): Promise<BodyRead> {
  if (!response.body) {
    const text = await response.text();
    const bytes = Buffer.from(text, 'utf8');
    if (bytes.length <= limit) {
      return { content: text, truncated: false };
    }
    return { content: decodePrefix(bytes, limit), truncated: true };
  }

  const reader = response.body.getReader();
  const chunks: Uint8Array[] = [];
  let size = 0;
  for (;;) {
    const { done, value } = await reader.read();
    if (done) {
      break;
    }
    if (value) {
      chunks.push(value);
      size += value.byteLength;
    }
    if (size > limit) {
      await reader.cancel();
      return { content: decodePrefix(Buffer.concat(chunks), limit), truncated: true };
    }
  }
  return { content: Buffer.concat(chunks).toString('utf8'), truncated: false };
}

/**
 * Sends one request and reads the body, at most `maxResponseBytes` of it.
 *
 * Never returns for a failed exchange: every fetch or body-read failure
 * becomes a TransportError.
 */
export async function sendRequest(
  fetchFn: EndpointFetchFn,
  url: string,
  request: EndpointRequest,
  maxResponseBytes: number = DEFAULT_MAX_RESPONSE_BYTES,
): Promise<HttpResult> {
  let statusCode: number;
  let body: BodyRead;
  const headers: Record<string, string> = {};

  try {
    const response = await fetchFn(url, toFetchInit(request));
    statusCode = response.status;
    response.headers.forEach((value, key) => {
      headers[key] = value;
    });
    body = await readBody(response, maxResponseBytes);
  } catch (error: unknown) {
    throw new TransportError(
      `${request.method}: ${url} failed (${describeFailure(error, request)})`,
      url,
      error,
    );
  }

  if (body.truncated && !request.allowTruncated) {
    throw new TransportError(
      `${request.method}: ${url} returned more than the ${maxResponseBytes} bytes allowed`,
      url,
    );
  }

  return { statusCode, content: body.content, headers, truncated: body.truncated };
}
