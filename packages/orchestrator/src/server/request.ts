/**
 * Request body helpers. Every route reads its body as unknown and narrows
 * field by field; bad input becomes a ValidationError, which the app's
 * error handler turns into a 400.
 */

import type { Context } from 'hono';
import type { TasklaneError } from '@tasklane/core';
import { invalidInput, invalidJson, missingRequiredField, errorMessage } from '@tasklane/core';

export type JsonBody = Record<string, unknown>;

export async function readJsonBody(c: Context): Promise<JsonBody> {
  const text = await c.req.text();
  if (text.trim() === '') {
    return {};
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw invalidJson(text, error instanceof Error ? error : new Error(errorMessage(error)));
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw invalidInput('body', parsed, 'JSON object');
  }
  return Object.fromEntries(Object.entries(parsed));
}

export function requireString(body: JsonBody, field: string): string {
  const value = body[field];
  if (value === undefined || value === null) {
    throw missingRequiredField(field);
  }
  if (typeof value !== 'string' || value.trim() === '') {
    throw invalidInput(field, value, 'non-empty string');
  }
  return value;
}

export function optionalString(body: JsonBody, field: string): string | undefined {
  const value = body[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw invalidInput(field, value, 'string');
  }
  return value;
}

export function optionalInteger(body: JsonBody, field: string): number | undefined {
  const value = body[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw invalidInput(field, value, 'integer');
  }
  return value;
}

export function optionalStringArray(body: JsonBody, field: string): string[] | undefined {
  const value = body[field];
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw invalidInput(field, value, 'array of strings');
  }
  return value;
}

/** Query parameter as a non-negative integer */
export function queryInteger(c: Context, name: string): number | undefined {
  const raw = c.req.query(name);
  if (raw === undefined || raw === '') return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw invalidInput(name, raw, 'non-negative integer');
  }
  return value;
}

/** A retryable error tells the client to come back in a second */
export function errorResponse(error: TasklaneError): Response {
  const headers: Record<string, string> = { 'content-type': 'application/json' };
  if (error.retryable) {
    headers['retry-after'] = '1';
  }
  return new Response(JSON.stringify({ error: error.toJSON() }), { status: error.httpStatus, headers });
}
