/**
 * A registered player. `id` is the Discord user ID (snowflake) of whoever
 * registered, kept as a decimal string because snowflakes do not fit a
 * safe JS number.
 *
 * Passwords are stored in clear text. This is a known deficiency.
 */
export interface UserRecord {
  id: string;
  username: string;
  password: string;
}

/**
 * The whole registry at a point in time, in table order
 */
export type RegistrySnapshot = UserRecord[];

/**
 * Where the latest backup lives: the message carrying it and the
 * attachment holding the blob.
 */
export interface SnapshotPointer {
  channelId: string;
  anchorMessageId: string;
  blobId: string;
}

/**
 * One row of a ranked view
 */
export interface RankedUser {
  id: string;
  username: string;
  /** 1-based position when ordered by descending id */
  rank: number;
}

/**
 * The bits of an inbound chat message the registry cares about.
 * Adapters build it from whatever message type the transport delivers.
 */
export interface InboundMessageRef {
  chatId: string;
  messageId: string;
  documentFileId: string | null;
}

export type InsertResult = { status: 'inserted' } | { status: 'conflict' };

export type DeleteResult =
  | { status: 'deleted'; count: number }
  | { status: 'not-found' };

/**
 * The serialized blob could not be turned back into a snapshot
 */
export class DecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DecodeError';
  }
}

/**
 * The external channel could not store or return a blob
 */
export class ChannelError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'ChannelError';
  }
}

export type SyncError = DecodeError | ChannelError;

/**
 * Snowflake ordering. Numeric comparison on BigInt since the IDs
 * overflow Number precision.
 */
export function compareIdsDescending(a: string, b: string): number {
  const left = BigInt(a);
  const right = BigInt(b);
  if (left === right) return 0;
  return left > right ? -1 : 1;
}

/** Canonical decimal: no sign, no leading zeros */
export const ID_PATTERN = /^(0|[1-9]\d{0,19})$/;

/** Largest value of the BIGINT UNSIGNED id column */
export const MAX_ID = 18446744073709551615n;

/** Length of the VARCHAR username column */
export const MAX_USERNAME_LENGTH = 255;
