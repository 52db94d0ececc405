import { describe, it, expect } from 'vitest';
import { SnapshotPointerState, pointerFromConfig } from '../services/SnapshotPointer.js';

describe('SnapshotPointer', () => {
  it('builds a pointer when all three settings are present', () => {
    expect(pointerFromConfig({
      SNAPSHOT_CHANNEL_ID: '1',
      SNAPSHOT_MESSAGE_ID: '2',
      SNAPSHOT_BLOB_ID: '3',
    })).toEqual({ channelId: '1', anchorMessageId: '2', blobId: '3' });
  });

  it('has no pointer when any setting is missing', () => {
    expect(pointerFromConfig({})).toBeNull();
    expect(pointerFromConfig({ SNAPSHOT_CHANNEL_ID: '1', SNAPSHOT_MESSAGE_ID: '2' })).toBeNull();
  });

  it('hands out frozen copies', () => {
    const source = { channelId: '1', anchorMessageId: '2', blobId: '3' };
    const state = new SnapshotPointerState(source);
    source.blobId = '99';

    const current = state.current();
    expect(current).toEqual({ channelId: '1', anchorMessageId: '2', blobId: '3' });
    expect(Object.isFrozen(current)).toBe(true);
  });

  it('replaces the pointer on commit', () => {
    const state = new SnapshotPointerState();
    expect(state.current()).toBeNull();

    const committed = state.commit({ channelId: '4', anchorMessageId: '5', blobId: '6' });
    expect(state.current()).toBe(committed);
  });
});
