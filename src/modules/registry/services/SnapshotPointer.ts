import type { SnapshotPointer } from '../types.js';

/**
 * Holds the live snapshot pointer. Created once at startup from
 * configuration and handed to the SyncManager, which is the only writer.
 * Values are frozen copies, so a reader can never observe a half-written
 * pointer.
 */
export class SnapshotPointerState {
  private pointer: Readonly<SnapshotPointer> | null;

  constructor(initial: SnapshotPointer | null = null) {
    this.pointer = initial ? Object.freeze({ ...initial }) : null;
  }

  current(): Readonly<SnapshotPointer> | null {
    return this.pointer;
  }

  commit(next: SnapshotPointer): Readonly<SnapshotPointer> {
    this.pointer = Object.freeze({ ...next });
    return this.pointer;
  }
}

/**
 * Build the startup pointer from the three SNAPSHOT_* settings.
 * The environment schema guarantees they are set together.
 */
export function pointerFromConfig(config: {
  SNAPSHOT_CHANNEL_ID?: string;
  SNAPSHOT_MESSAGE_ID?: string;
  SNAPSHOT_BLOB_ID?: string;
}): SnapshotPointer | null {
  const { SNAPSHOT_CHANNEL_ID, SNAPSHOT_MESSAGE_ID, SNAPSHOT_BLOB_ID } = config;
  if (!SNAPSHOT_CHANNEL_ID || !SNAPSHOT_MESSAGE_ID || !SNAPSHOT_BLOB_ID) {
    return null;
  }
  return {
    channelId: SNAPSHOT_CHANNEL_ID,
    anchorMessageId: SNAPSHOT_MESSAGE_ID,
    blobId: SNAPSHOT_BLOB_ID,
  };
}
