import type { Context } from 'hono';
import type { EngineResponse } from '../types/oauth.js';
import type { RawRequest, RequestFields } from '../services/request-parser.js';
import { HEADER_AUTHORIZATION } from '../config/constants.js';

function isString(value: unknown): value is string {
  return typeof value === 'string';
}

/**
 * Keep string values only; a parameter given once stays a plain string
 */
function toFields(source: Record<string, unknown>): RequestFields {
  const fields: RequestFields = {};

  for (const [name, value] of Object.entries(source)) {
    if (isString(value)) {
      fields[name] = value;
    } else if (Array.isArray(value)) {
      const values = value.filter(isString);
      // File parts only
      if (values.length === 0) {
        continue;
      }
      fields[name] = values.length === 1 ? values[0] : values;
    }
  }

  return fields;
}

// Resource owner credentials are never read from the URL
const BODY_ONLY_FIELDS: readonly string[] = ['username', 'password'];

function valuesOf(value: string | string[]): string[] {
  return isString(value) ? [value] : value;
}

/**
 * Body fields plus query fields; a name present in both counts as repeated
 */
function mergeQuery(body: RequestFields, query: RequestFields): RequestFields {
  const fields: RequestFields = { ...body };

  for (const [name, value] of Object.entries(query)) {
    if (value === undefined || BODY_ONLY_FIELDS.includes(name)) {
      continue;
    }
    const existing = fields[name];
    fields[name] = existing === undefined ? value : [...valuesOf(existing), ...valuesOf(value)];
  }

  return fields;
}

export interface ReadFieldsOptions {
  /** Also read the query of a POST (authorization endpoint) */
  includeQuery?: boolean;
}

/**
 * Read form fields of a POST body, or the query of any other request
 */
export async function readFields(c: Context, options: ReadFieldsOptions = {}): Promise<RequestFields> {
  if (c.req.method === 'GET') {
    return toFields(c.req.queries());
  }

  const body = toFields(await c.req.parseBody({ all: true }));
  return options.includeQuery ? mergeQuery(body, toFields(c.req.queries())) : body;
}

/**
 * Transport-neutral view of a Hono request
 */
export async function readRawRequest(c: Context, options: ReadFieldsOptions = {}): Promise<RawRequest> {
  const raw: RawRequest = {
    method: c.req.method,
    fields: await readFields(c, options),
  };

  const authorization = c.req.header(HEADER_AUTHORIZATION);
  if (authorization) {
    raw.authorization = authorization;
  }

  return raw;
}

/**
 * Turn an engine response into an HTTP response
 */
export function sendEngineResponse(response: EngineResponse): Response {
  const init = { status: response.status, headers: response.headers };

  switch (response.kind) {
    case 'json':
      return new Response(JSON.stringify(response.body), init);
    case 'text':
      return new Response(response.body, init);
    case 'redirect':
    case 'empty':
      return new Response(null, init);
  }
}
