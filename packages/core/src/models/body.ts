/**
 * @module models/body
 * Conversions between {@link Body}, raw bytes and the pact JSON forms.
 */

import { isJsonObject, MISSING_BODY, type Body, type JsonObject, type JsonValue, type MultiValueMap } from '../types.js';

const JSON_CONTENT_TYPE = /^application\/(?:[\w.+-]+\+)?json\b|^application\/json/i;

export function isJsonContentType(contentType: string | undefined): boolean {
  return contentType !== undefined && JSON_CONTENT_TYPE.test(contentType.trim());
}

function isTextContentType(contentType: string): boolean {
  const base = contentType.split(';')[0]?.trim().toLowerCase() ?? '';
  return base.startsWith('text/') || base.endsWith('xml') || base === 'application/x-www-form-urlencoded'
    || base === 'application/javascript';
}

/** Case-insensitive single header lookup returning the first value. */
export function headerValue(headers: MultiValueMap, name: string): string | undefined {
  const lower = name.toLowerCase();
  for (const [key, values] of Object.entries(headers)) {
    if (key.toLowerCase() === lower) return values[0];
  }
  return undefined;
}

export function bodyContentType(body: Body): string | undefined {
  return body.kind === 'missing' ? undefined : body.contentType;
}

// =====================================================================
// Raw bytes
// =====================================================================

/** Body read off the wire. Unparseable JSON is kept as text. */
export function bodyFromBuffer(data: Buffer | undefined, contentType: string | undefined): Body {
  if (!data || data.length === 0) return MISSING_BODY;
  const type = contentType ?? 'application/octet-stream';
  if (isJsonContentType(type)) {
    const text = data.toString('utf8');
    try {
      const value: JsonValue = JSON.parse(text);
      return { kind: 'json', value, contentType: type };
    } catch {
      return { kind: 'text', text, contentType: type };
    }
  }
  if (isTextContentType(type) || contentType === undefined) {
    return { kind: 'text', text: data.toString('utf8'), contentType: type };
  }
  return { kind: 'binary', base64: data.toString('base64'), contentType: type };
}

export function bodyToBuffer(body: Body): Buffer | undefined {
  switch (body.kind) {
    case 'missing': return undefined;
    case 'json': return Buffer.from(JSON.stringify(body.value), 'utf8');
    case 'text': return Buffer.from(body.text, 'utf8');
    case 'binary': return Buffer.from(body.base64, 'base64');
  }
}

/** Build a body from a string supplied by a caller, parsing JSON content. */
export function bodyFromString(text: string, contentType: string | undefined): Body {
  if (isJsonContentType(contentType)) {
    try {
      const value: JsonValue = JSON.parse(text);
      return { kind: 'json', value, contentType: contentType ?? 'application/json' };
    } catch {
      return { kind: 'text', text, ...(contentType ? { contentType } : {}) };
    }
  }
  return { kind: 'text', text, ...(contentType ? { contentType } : {}) };
}

// =====================================================================
// Pact JSON
// =====================================================================

/**
 * Read a body from a pact document.
 *
 * V4 documents wrap bodies as `{ content, contentType, encoded }`; older
 * documents store the JSON value or string directly.
 */
export function bodyFromPactJson(json: JsonValue | undefined, headers: MultiValueMap, v4: boolean): Body {
  if (json === undefined) return MISSING_BODY;
  if (v4 && isJsonObject(json) && 'content' in json) {
    const contentType = typeof json['contentType'] === 'string' ? json['contentType'] : headerValue(headers, 'content-type');
    const content = json['content'] ?? null;
    const encoded = json['encoded'];
    if (encoded === 'base64' && typeof content === 'string') {
      return { kind: 'binary', base64: content, contentType: contentType ?? 'application/octet-stream' };
    }
    if (encoded === 'json' && typeof content === 'string') {
      return bodyFromString(content, contentType ?? 'application/json');
    }
    if (typeof content === 'string' && !isJsonContentType(contentType)) {
      return { kind: 'text', text: content, ...(contentType ? { contentType } : {}) };
    }
    return { kind: 'json', value: content, contentType: contentType ?? 'application/json' };
  }
  const contentType = headerValue(headers, 'content-type');
  if (typeof json === 'string' && !isJsonContentType(contentType)) {
    return { kind: 'text', text: json, ...(contentType ? { contentType } : {}) };
  }
  return { kind: 'json', value: json, contentType: contentType ?? 'application/json' };
}

/** Write a body in the form the target specification expects. */
export function bodyToPactJson(body: Body, v4: boolean): JsonValue | undefined {
  switch (body.kind) {
    case 'missing':
      return undefined;
    case 'json':
      return v4 ? { content: body.value, contentType: body.contentType, encoded: false } : body.value;
    case 'text': {
      if (!v4) return body.text;
      const json: JsonObject = { content: body.text, encoded: false };
      if (body.contentType) json['contentType'] = body.contentType;
      return json;
    }
    case 'binary':
      return v4 ? { content: body.base64, contentType: body.contentType, encoded: 'base64' } : body.base64;
  }
}
