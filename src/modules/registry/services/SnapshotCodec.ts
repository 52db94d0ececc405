import { z } from 'zod';
import { DecodeError, ID_PATTERN, MAX_ID, MAX_USERNAME_LENGTH, type RegistrySnapshot } from '../types.js';

/**
 * Blob layout: a JSON array of `[id, username, password]` triples.
 *
 * Ids are written as strings. Older backups wrote them as JSON numbers,
 * which decode as long as they are safe integers. Anything the
 * registry_users table would reject or rewrite is refused here.
 */
const idSchema = z.union([
  z.string()
    .regex(ID_PATTERN, 'id must be a canonical decimal string')
    // the refinement also sees strings the regex already flagged
    .refine(value => !ID_PATTERN.test(value) || BigInt(value) <= MAX_ID, 'id exceeds the BIGINT UNSIGNED range'),
  z.number().int().nonnegative().refine(Number.isSafeInteger, 'id exceeds safe integer range')
    .transform(value => String(value)),
]);

const usernameSchema = z.string().max(MAX_USERNAME_LENGTH, `username longer than ${MAX_USERNAME_LENGTH} characters`);

const snapshotSchema = z.array(z.tuple([idSchema, usernameSchema, z.string()]));

export type DecodeResult =
  | { success: true; snapshot: RegistrySnapshot }
  | { success: false; error: DecodeError };

export function encodeSnapshot(snapshot: RegistrySnapshot): string {
  return JSON.stringify(snapshot.map(record => [record.id, record.username, record.password]));
}

export function decodeSnapshot(blob: string): DecodeResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(blob);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return { success: false, error: new DecodeError(`Snapshot is not valid JSON: ${reason}`) };
  }

  const result = snapshotSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.errors[0];
    const where = issue && issue.path.length > 0 ? ` at [${issue.path.join('][')}]` : '';
    return {
      success: false,
      error: new DecodeError(`Malformed snapshot${where}: ${issue?.message ?? 'invalid shape'}`),
    };
  }

  return {
    success: true,
    snapshot: result.data.map(([id, username, password]) => ({ id, username, password })),
  };
}
