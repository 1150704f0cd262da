import type { EndpointRequest, RequestDefaults, RequestOptions } from './endpoint.types';

export const DEFAULT_USER_AGENT = 'Hookline/1.0.0';

/** Body fields that carry a credential */
const SECRET_FIELDS: readonly string[] = ['github_token', 'access_token'];

/** Header names are case-insensitive. */
function hasHeader(headers: Readonly<Record<string, string>>, name: string): boolean {
  const wanted = name.toLowerCase();
  return Object.keys(headers).some(key => key.toLowerCase() === wanted);
}

/**
 * Builds the option set for one request.
 *
 * Caller headers win over every default, whatever their casing. The caller's
 * header object is copied, never mutated.
 */
export function buildRequest(options: RequestOptions, defaults: RequestDefaults): EndpointRequest {
  const headers: Record<string, string> = { ...options.headers };

  if (!hasHeader(headers, 'User-Agent')) {
    headers['User-Agent'] = defaults.userAgent;
  }
  if (defaults.accept && !hasHeader(headers, 'Accept')) {
    headers['Accept'] = defaults.accept;
  }
  if (defaults.authorization !== null && !hasHeader(headers, 'Authorization')) {
    headers['Authorization'] = defaults.authorization;
  }
  if (options.payload !== undefined && !hasHeader(headers, 'Content-Type')) {
    headers['Content-Type'] = 'application/json';
  }

  return Object.freeze({
    payload: options.payload,
    method: options.method ?? 'GET',
    headers: Object.freeze(headers),
    allowTruncated: options.allowTruncated ?? false,
    followRedirects: options.followRedirects ?? true,
    deadline: options.deadline,
    validateCertificate: options.validateCertificate ?? true,
  });
}

/** Copy of the headers safe to write to a log. */
export function redactHeaders(headers: Readonly<Record<string, string>>): Record<string, string> {
  const redacted: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    redacted[key] = key.toLowerCase() === 'authorization' ? 'token ***' : value;
  }
  return redacted;
}

/**
 * A JSON body safe to write to a log: credential fields are masked.
 * Anything that is not a JSON object is returned unchanged.
 */
export function redactBody(body: string): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return body;
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return body;
  }

  const fields = Object.entries(parsed);
  if (!fields.some(([key]) => SECRET_FIELDS.includes(key))) {
    return body;
  }
  return JSON.stringify(Object.fromEntries(
    fields.map(([key, value]) => [key, SECRET_FIELDS.includes(key) ? '***' : value]),
  ));
}
