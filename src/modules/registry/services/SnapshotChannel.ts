import type { ChannelError, SnapshotPointer } from '../types.js';

export type ChannelResult<T> =
  | { success: true; value: T }
  | { success: false; error: ChannelError };

/**
 * Where backups are kept. Implementations report failures as results and
 * never throw for transport problems.
 */
export interface SnapshotChannel {
  /**
   * Store `blob` as a brand-new message in `channelId`
   */
  publish(channelId: string, blob: string): Promise<ChannelResult<SnapshotPointer>>;

  /**
   * Swap the blob attached to the pointer's anchor message.
   * The anchor usually stays and the blob id changes; an anchor the bot
   * cannot edit is superseded by a new message in the same channel.
   */
  replace(pointer: SnapshotPointer, blob: string): Promise<ChannelResult<SnapshotPointer>>;

  /**
   * Download the blob the pointer names
   */
  fetch(pointer: SnapshotPointer): Promise<ChannelResult<string>>;
}
