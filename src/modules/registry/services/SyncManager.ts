import { Logger } from '../../../shared/utils/logger.js';
import { ChannelError, type SnapshotPointer, type SyncError } from '../types.js';
import type { RegistryStore } from './RegistryStore.js';
import type { SnapshotChannel, ChannelResult } from './SnapshotChannel.js';
import type { SnapshotPointerState } from './SnapshotPointer.js';
import { decodeSnapshot, encodeSnapshot } from './SnapshotCodec.js';

const logger = new Logger('Registry:Sync');

export type PushState = 'idle' | 'pushing';

export type PushResult =
  | { success: true; pointer: Readonly<SnapshotPointer>; records: number }
  | { success: false; error: ChannelError };

export type RestoreResult =
  | { success: true; restored: true; records: number }
  | { success: true; restored: false }
  | { success: false; error: SyncError };

/**
 * Moves the registry between the local store and the backup channel.
 *
 * Push: encode the store, hand the blob to the channel, and only on
 * acknowledgment move the pointer. Restore: fetch and decode the blob at
 * the pointer, and only on success replace the store. Failures come back
 * as results and leave both the pointer and the store as they were.
 * Nothing is retried here.
 */
export class SyncManager {
  private pushState: PushState = 'idle';

  constructor(
    private store: RegistryStore,
    private channel: SnapshotChannel,
    private pointer: SnapshotPointerState
  ) {}

  get state(): PushState {
    return this.pushState;
  }

  currentPointer(): Readonly<SnapshotPointer> | null {
    return this.pointer.current();
  }

  /**
   * Back up the registry as a new message in `channelId` and point at it
   */
  async pushNew(channelId: string): Promise<PushResult> {
    return this.push('publish', (blob) => this.channel.publish(channelId, blob));
  }

  /**
   * Overwrite the blob at the current pointer
   */
  async pushReplace(): Promise<PushResult> {
    const current = this.pointer.current();
    if (!current) {
      return {
        success: false,
        error: new ChannelError('No backup location configured; run /save first'),
      };
    }
    return this.push('replace', (blob) => this.channel.replace(current, blob));
  }

  /**
   * Replace the store with the snapshot at the current pointer.
   * Without a pointer there is nothing to restore from and the store is
   * left alone.
   */
  async restore(): Promise<RestoreResult> {
    const current = this.pointer.current();
    if (!current) {
      logger.debug('No backup location configured, skipping restore');
      return { success: true, restored: false };
    }

    const fetched = await this.channel.fetch(current);
    if (!fetched.success) {
      logger.warn(`Restore aborted: ${fetched.error.message}`);
      return { success: false, error: fetched.error };
    }

    const decoded = decodeSnapshot(fetched.value);
    if (!decoded.success) {
      logger.warn(`Restore aborted: ${decoded.error.message}`);
      return { success: false, error: decoded.error };
    }

    await this.store.replaceAll(decoded.snapshot);
    logger.debug(`Restored ${decoded.snapshot.length} record(s) from backup ${current.blobId}`);
    return { success: true, restored: true, records: decoded.snapshot.length };
  }

  private async push(
    operation: 'publish' | 'replace',
    send: (blob: string) => Promise<ChannelResult<SnapshotPointer>>
  ): Promise<PushResult> {
    if (this.pushState === 'pushing') {
      return { success: false, error: new ChannelError('A backup push is already in progress') };
    }

    this.pushState = 'pushing';
    try {
      const records = await this.store.all();
      const acknowledged = await send(encodeSnapshot(records));

      if (!acknowledged.success) {
        logger.warn(`Backup ${operation} failed: ${acknowledged.error.message}`);
        return { success: false, error: acknowledged.error };
      }

      const pointer = this.pointer.commit(acknowledged.value);
      logger.info(
        `Backup ${operation} stored ${records.length} record(s) at ` +
        `${pointer.channelId}/${pointer.anchorMessageId}/${pointer.blobId}`
      );
      return { success: true, pointer, records: records.length };
    } finally {
      this.pushState = 'idle';
    }
  }
}
