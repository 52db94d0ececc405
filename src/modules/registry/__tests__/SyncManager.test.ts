import { describe, it, expect, beforeEach } from 'vitest';
import { SyncManager } from '../services/SyncManager.js';
import { SnapshotPointerState } from '../services/SnapshotPointer.js';
import { encodeSnapshot } from '../services/SnapshotCodec.js';
import { ChannelError, DecodeError, type SnapshotPointer } from '../types.js';
import { ALICE, BOB, CAROL, MemoryRegistryStore, MemorySnapshotChannel } from './fakes.js';

const BACKUP_CHANNEL = '500';

describe('SyncManager', () => {
  let store: MemoryRegistryStore;
  let channel: MemorySnapshotChannel;
  let pointer: SnapshotPointerState;
  let sync: SyncManager;

  beforeEach(() => {
    store = new MemoryRegistryStore([ALICE, BOB]);
    channel = new MemorySnapshotChannel();
    pointer = new SnapshotPointerState();
    sync = new SyncManager(store, channel, pointer);
  });

  describe('pushNew', () => {
    it('moves the pointer to the new message', async () => {
      const result = await sync.pushNew(BACKUP_CHANNEL);

      expect(result).toEqual({
        success: true,
        pointer: { channelId: BACKUP_CHANNEL, anchorMessageId: '1000', blobId: '1001' },
        records: 2,
      });
      expect(sync.currentPointer()).toEqual({
        channelId: BACKUP_CHANNEL,
        anchorMessageId: '1000',
        blobId: '1001',
      });
      expect(channel.messages.get('1000')?.blob).toBe(encodeSnapshot([ALICE, BOB]));
    });

    it('leaves the pointer and the store alone when the channel fails', async () => {
      await sync.pushNew(BACKUP_CHANNEL);
      const before = sync.currentPointer();
      channel.failing = true;

      const result = await sync.pushNew('600');

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(ChannelError);
      }
      expect(sync.currentPointer()).toEqual(before);
      expect(store.records).toEqual([ALICE, BOB]);
      expect(sync.state).toBe('idle');
    });

    it('refuses a second push while one is in flight', async () => {
      const first = sync.pushNew(BACKUP_CHANNEL);
      const second = sync.pushNew(BACKUP_CHANNEL);

      expect(sync.state).toBe('pushing');
      const [firstResult, secondResult] = await Promise.all([first, second]);

      expect(firstResult.success).toBe(true);
      expect(secondResult.success).toBe(false);
      if (!secondResult.success) {
        expect(secondResult.error.message).toBe('A backup push is already in progress');
      }
      expect(sync.state).toBe('idle');
    });
  });

  describe('pushReplace', () => {
    it('keeps the anchor message and changes the blob id', async () => {
      await sync.pushNew(BACKUP_CHANNEL);
      await store.insert(CAROL);

      const result = await sync.pushReplace();

      expect(result).toEqual({
        success: true,
        pointer: { channelId: BACKUP_CHANNEL, anchorMessageId: '1000', blobId: '1002' },
        records: 3,
      });
      expect(channel.messages.get('1000')?.blob).toBe(encodeSnapshot([ALICE, BOB, CAROL]));
    });

    it('fails without a backup location', async () => {
      const result = await sync.pushReplace();

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.message).toBe('No backup location configured; run /save first');
      }
      expect(channel.calls).toBe(0);
    });

    it('leaves the pointer alone when the anchor message is gone', async () => {
      const stale: SnapshotPointer = { channelId: BACKUP_CHANNEL, anchorMessageId: '1', blobId: '2' };
      pointer.commit(stale);

      const result = await sync.pushReplace();

      expect(result.success).toBe(false);
      expect(sync.currentPointer()).toEqual(stale);
    });
  });

  describe('restore', () => {
    it('rebuilds the pushed registry from the pointer', async () => {
      await sync.pushNew(BACKUP_CHANNEL);

      const freshStore = new MemoryRegistryStore([CAROL]);
      const restarted = new SyncManager(
        freshStore,
        channel,
        new SnapshotPointerState(sync.currentPointer())
      );

      const result = await restarted.restore();

      expect(result).toEqual({ success: true, restored: true, records: 2 });
      expect(freshStore.records).toEqual([ALICE, BOB]);
    });

    it('skips without a backup location', async () => {
      const result = await sync.restore();

      expect(result).toEqual({ success: true, restored: false });
      expect(store.records).toEqual([ALICE, BOB]);
      expect(channel.calls).toBe(0);
    });

    it('leaves the store untouched when the blob cannot be decoded', async () => {
      const location = { channelId: BACKUP_CHANNEL, anchorMessageId: '10', blobId: '11' };
      channel.seed(location, '[["oops"]]');
      pointer.commit(location);

      const result = await sync.restore();

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(DecodeError);
      }
      expect(store.records).toEqual([ALICE, BOB]);
    });

    it('leaves the store untouched when the channel fails', async () => {
      await sync.pushNew(BACKUP_CHANNEL);
      await store.insert(CAROL);
      channel.failing = true;

      const result = await sync.restore();

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(ChannelError);
      }
      expect(store.records).toEqual([ALICE, BOB, CAROL]);
    });

    it('restores an empty backup as an empty registry', async () => {
      const location = { channelId: BACKUP_CHANNEL, anchorMessageId: '10', blobId: '11' };
      channel.seed(location, '[]');
      pointer.commit(location);

      expect(await sync.restore()).toEqual({ success: true, restored: true, records: 0 });
      expect(store.records).toEqual([]);
    });
  });
});
