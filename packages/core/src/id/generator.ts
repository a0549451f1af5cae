/**
 * Task id generation
 *
 * Ids are `TASK-` followed by a base36 digest of the title, the creation
 * time and random bytes, so concurrent creators on different machines do
 * not collide.
 */

import { createHash, randomBytes } from 'node:crypto';

export const TASK_ID_PREFIX = 'TASK';

/** Base36 character set (0-9, a-z) */
export const BASE36_CHARS = '0123456789abcdefghijklmnopqrstuvwxyz';

export const TASK_HASH_LENGTH = 8;

export const GENERATED_TASK_ID_PATTERN = /^TASK-[0-9a-z]{8}$/;

/**
 * Converts a byte array to Base36 string
 */
export function toBase36(bytes: Uint8Array): string {
  let num = BigInt(0);
  for (const byte of bytes) {
    num = (num << BigInt(8)) | BigInt(byte);
  }
  if (num === BigInt(0)) {
    return '0';
  }

  let result = '';
  const base = BigInt(36);
  while (num > BigInt(0)) {
    result = BASE36_CHARS[Number(num % base)] + result;
    num = num / base;
  }
  return result;
}

export interface TaskIdInput {
  title: string;
  createdAt?: Date;
  /** Fixed entropy for deterministic output */
  nonce?: Uint8Array;
}

export function generateTaskId(input: TaskIdInput): string {
  const createdAt = input.createdAt ?? new Date();
  const nonce = input.nonce ?? randomBytes(8);
  const hash = createHash('sha256')
    .update(input.title)
    .update('|')
    .update(createdAt.toISOString())
    .update('|')
    .update(nonce)
    .digest();
  const encoded = toBase36(hash).padStart(TASK_HASH_LENGTH, '0');
  return `${TASK_ID_PREFIX}-${encoded.slice(0, TASK_HASH_LENGTH)}`;
}

export function isGeneratedTaskId(value: string): boolean {
  return GENERATED_TASK_ID_PATTERN.test(value);
}
