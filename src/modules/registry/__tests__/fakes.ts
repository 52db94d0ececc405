import { ChannelError, type DeleteResult, type InsertResult, type RegistrySnapshot, type SnapshotPointer, type UserRecord } from '../types.js';
import type { RegistryStore } from '../services/RegistryStore.js';
import type { ChannelResult, SnapshotChannel } from '../services/SnapshotChannel.js';

/**
 * RegistryStore over an array, same rules as the MySQL table
 */
export class MemoryRegistryStore implements RegistryStore {
  records: UserRecord[] = [];

  constructor(initial: UserRecord[] = []) {
    this.records = initial.map(record => ({ ...record }));
  }

  async insert(record: UserRecord): Promise<InsertResult> {
    if (this.records.some(existing => existing.username === record.username)) {
      return { status: 'conflict' };
    }
    this.records.push({ ...record });
    return { status: 'inserted' };
  }

  async findByUsername(username: string): Promise<UserRecord | null> {
    return this.records.find(record => record.username === username) ?? null;
  }

  async findById(id: string): Promise<UserRecord | null> {
    return this.records.find(record => record.id === id) ?? null;
  }

  async deleteById(id: string): Promise<DeleteResult> {
    const kept = this.records.filter(record => record.id !== id);
    const count = this.records.length - kept.length;
    this.records = kept;
    return count === 0 ? { status: 'not-found' } : { status: 'deleted', count };
  }

  async replaceAll(records: RegistrySnapshot): Promise<void> {
    this.records = records.map(record => ({ ...record }));
  }

  async all(): Promise<RegistrySnapshot> {
    return this.records.map(record => ({ ...record }));
  }
}

interface StoredMessage {
  channelId: string;
  blobId: string;
  blob: string;
}

export type ChannelOperation = 'publish' | 'replace' | 'fetch';

/**
 * SnapshotChannel kept in a map of messages. Ids count up from 1000.
 * Set `failing` to make every call fail, or add operations to `failOn`.
 */
export class MemorySnapshotChannel implements SnapshotChannel {
  messages = new Map<string, StoredMessage>();
  failing = false;
  failOn = new Set<ChannelOperation>();
  calls = 0;
  private nextId = 1000;

  async publish(channelId: string, blob: string): Promise<ChannelResult<SnapshotPointer>> {
    this.calls++;
    if (this.fails('publish')) return this.failure('publish');

    const anchorMessageId = String(this.nextId++);
    const blobId = String(this.nextId++);
    this.messages.set(anchorMessageId, { channelId, blobId, blob });
    return { success: true, value: { channelId, anchorMessageId, blobId } };
  }

  async replace(pointer: SnapshotPointer, blob: string): Promise<ChannelResult<SnapshotPointer>> {
    this.calls++;
    if (this.fails('replace')) return this.failure('replace');

    const message = this.messages.get(pointer.anchorMessageId);
    if (!message) {
      return { success: false, error: new ChannelError(`Backup message ${pointer.anchorMessageId} not found`) };
    }

    const blobId = String(this.nextId++);
    this.messages.set(pointer.anchorMessageId, { ...message, blobId, blob });
    return { success: true, value: { ...pointer, blobId } };
  }

  async fetch(pointer: SnapshotPointer): Promise<ChannelResult<string>> {
    this.calls++;
    if (this.fails('fetch')) return this.failure('fetch');

    const message = this.messages.get(pointer.anchorMessageId);
    if (!message || message.blobId !== pointer.blobId) {
      return { success: false, error: new ChannelError(`Attachment ${pointer.blobId} not found`) };
    }
    return { success: true, value: message.blob };
  }

  /**
   * Put a blob in place as if uploaded by hand
   */
  seed(pointer: SnapshotPointer, blob: string): void {
    this.messages.set(pointer.anchorMessageId, {
      channelId: pointer.channelId,
      blobId: pointer.blobId,
      blob,
    });
  }

  private fails(operation: ChannelOperation): boolean {
    return this.failing || this.failOn.has(operation);
  }

  private failure<T>(operation: ChannelOperation): ChannelResult<T> {
    return { success: false, error: new ChannelError(`Channel unavailable during ${operation}`) };
  }
}

export const ALICE: UserRecord = { id: '100', username: 'alice', password: 'p1' };
export const BOB: UserRecord = { id: '300', username: 'bob', password: 'p2' };
export const CAROL: UserRecord = { id: '200', username: 'carol', password: 'p3' };
