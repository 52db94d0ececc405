import { SerialQueue } from '../../../shared/utils/queue.js';
import { Logger } from '../../../shared/utils/logger.js';
import type { ChannelError, RankedUser, RegistrySnapshot, SnapshotPointer, SyncError, UserRecord } from '../types.js';
import type { RegistryStore } from './RegistryStore.js';
import type { PushResult, SyncManager } from './SyncManager.js';
import { rankAll, rankOf, rankPage, topN, type RankedPage } from './RankEngine.js';

const logger = new Logger('Registry:Service');

export type RegisterOutcome =
  | { status: 'registered'; top: RankedUser[]; placement: RankedUser[]; backup: PushResult }
  | { status: 'conflict' }
  | { status: 'sync-failed'; error: SyncError }
  | { status: 'backup-failed'; error: ChannelError };

export type DeleteOutcome =
  | { status: 'deleted'; count: number; backup: PushResult }
  | { status: 'not-found' }
  | { status: 'backup-failed'; error: ChannelError };

type PushOutcome =
  | { kept: true; backup: PushResult }
  | { kept: false; error: ChannelError };

export type SignInOutcome =
  | { status: 'not-registered' }
  | { status: 'found'; passwordMatches: boolean }
  | { status: 'sync-failed'; error: SyncError };

export interface RegistryServiceOptions {
  /** Entries in the top list returned after registering */
  leaderboardSize: number;
}

/**
 * The registry's command operations. Each runs alone, start to finish,
 * including its restore and push, so check-then-insert never interleaves.
 */
export class RegistryService {
  private queue = new SerialQueue();

  constructor(
    private store: RegistryStore,
    private sync: SyncManager,
    private options: RegistryServiceOptions
  ) {}

  /**
   * Restore from backup, insert, back up again, then report the top list
   * and where the new player landed. If a backup exists but cannot be
   * updated the insert is undone. Without a backup location the
   * registration stays and `backup` carries the failed push.
   */
  register(record: UserRecord): Promise<RegisterOutcome> {
    return this.queue.run(async (): Promise<RegisterOutcome> => {
      const restored = await this.sync.restore();
      if (!restored.success) {
        return { status: 'sync-failed', error: restored.error };
      }

      const before = await this.store.all();
      const inserted = await this.store.insert(record);
      if (inserted.status === 'conflict') {
        return { status: 'conflict' };
      }

      const pushed = await this.pushOrRevert(before);
      if (!pushed.kept) {
        return { status: 'backup-failed', error: pushed.error };
      }
      logger.info(`Registered ${record.username} (${record.id})`);

      const snapshot = await this.store.all();
      return {
        status: 'registered',
        top: topN(snapshot, this.options.leaderboardSize),
        placement: rankOf(snapshot, record.username),
        backup: pushed.backup,
      };
    });
  }

  signIn(username: string, password: string): Promise<SignInOutcome> {
    return this.queue.run(async (): Promise<SignInOutcome> => {
      const restored = await this.sync.restore();
      if (!restored.success) {
        return { status: 'sync-failed', error: restored.error };
      }

      const record = await this.store.findByUsername(username);
      if (!record) {
        return { status: 'not-registered' };
      }

      const passwordMatches = record.password === password;
      logger.debug(`Sign-in for ${username}: ${passwordMatches ? 'accepted' : 'rejected'}`);
      return { status: 'found', passwordMatches };
    });
  }

  /**
   * Removes every record registered under `id`, then overwrites the
   * backup. Without the push the next restore would bring them back, so
   * a failed push puts them back right away.
   */
  delete(id: string): Promise<DeleteOutcome> {
    return this.queue.run(async (): Promise<DeleteOutcome> => {
      const before = await this.store.all();
      const result = await this.store.deleteById(id);
      if (result.status === 'not-found') {
        return result;
      }

      const pushed = await this.pushOrRevert(before);
      if (!pushed.kept) {
        return { status: 'backup-failed', error: pushed.error };
      }
      logger.info(`Deleted ${result.count} record(s) for ${id}`);
      return { ...result, backup: pushed.backup };
    });
  }

  /**
   * Back up into a brand-new message in `channelId`
   */
  save(channelId: string): Promise<PushResult> {
    return this.queue.run(() => this.sync.pushNew(channelId));
  }

  /**
   * Overwrite the current backup
   */
  update(): Promise<PushResult> {
    return this.queue.run(() => this.sync.pushReplace());
  }

  /**
   * Where the live backup is, if anywhere
   */
  backupLocation(): Readonly<SnapshotPointer> | null {
    return this.sync.currentPointer();
  }

  /**
   * Back up a change. The next restore replaces the store with the
   * backup, so when a backup exists and the push fails the store goes
   * back to `before`.
   */
  private async pushOrRevert(before: RegistrySnapshot): Promise<PushOutcome> {
    const hasBackup = this.sync.currentPointer() !== null;
    const backup = await this.sync.pushReplace();
    if (backup.success || !hasBackup) {
      return { kept: true, backup };
    }

    await this.store.replaceAll(before);
    logger.warn(`Change reverted, backup push failed: ${backup.error.message}`);
    return { kept: false, error: backup.error };
  }

  leaderboard(page: number, pageSize: number): Promise<RankedPage> {
    return this.queue.run(async () => rankPage(await this.store.all(), page, pageSize));
  }

  rank(username: string): Promise<RankedUser[]> {
    return this.queue.run(async () => rankOf(await this.store.all(), username));
  }

  /**
   * Ranks of every record registered under a Discord user id
   */
  rankById(id: string): Promise<RankedUser[]> {
    return this.queue.run(async () => {
      const ranked = rankAll(await this.store.all());
      return ranked.filter(entry => entry.id === id);
    });
  }
}
