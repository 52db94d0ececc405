import { AttachmentBuilder, type Client } from 'discord.js';
import { Logger } from '../../../shared/utils/logger.js';
import { ChannelError, type SnapshotPointer } from '../types.js';
import type { ChannelResult, SnapshotChannel } from './SnapshotChannel.js';

const logger = new Logger('Registry:DiscordChannel');

export const SNAPSHOT_FILENAME = 'registry-snapshot.json';

export interface BackupAttachment {
  id: string;
  url: string;
}

/**
 * The parts of a discord.js Message the backup channel touches
 */
export interface BackupMessage {
  id: string;
  /** False for messages the bot did not author */
  editable: boolean;
  attachments: ReadonlyMap<string, BackupAttachment>;
  edit(options: { files: AttachmentBuilder[]; attachments: never[] }): Promise<BackupMessage>;
}

export interface BackupTextChannel {
  send(options: { content: string; files: AttachmentBuilder[] }): Promise<BackupMessage>;
  messages: {
    fetch(messageId: string): Promise<BackupMessage>;
  };
}

/** Resolves a channel id to something backups can be posted in, or null */
export type ChannelLookup = (channelId: string) => Promise<BackupTextChannel | null>;

export function clientChannelLookup(client: Client): ChannelLookup {
  return async (channelId: string): Promise<BackupTextChannel | null> => {
    const channel = await client.channels.fetch(channelId);
    if (!channel || !channel.isTextBased() || !('send' in channel)) {
      return null;
    }
    return channel;
  };
}

function failure<T>(message: string, cause?: unknown): ChannelResult<T> {
  const detail = cause instanceof Error ? `: ${cause.message}` : '';
  logger.warn(`${message}${detail}`);
  return { success: false, error: new ChannelError(`${message}${detail}`, cause) };
}

function snapshotAttachment(blob: string): AttachmentBuilder {
  return new AttachmentBuilder(Buffer.from(blob, 'utf-8'), { name: SNAPSHOT_FILENAME });
}

function firstAttachment(message: BackupMessage): BackupAttachment | undefined {
  for (const attachment of message.attachments.values()) {
    return attachment;
  }
  return undefined;
}

/**
 * Keeps backups as file attachments on Discord messages.
 * The pointer's blob id is the attachment id; attachments are downloaded
 * from their CDN url.
 */
export class DiscordSnapshotChannel implements SnapshotChannel {
  constructor(
    private findChannel: ChannelLookup,
    private download: typeof fetch = fetch
  ) {}

  private async sendBackup(
    channel: BackupTextChannel,
    channelId: string,
    blob: string
  ): Promise<ChannelResult<SnapshotPointer>> {
    const message = await channel.send({
      content: 'Registry backup',
      files: [snapshotAttachment(blob)],
    });
    const attachment = firstAttachment(message);
    if (!attachment) {
      return failure(`Backup message ${message.id} came back without an attachment`);
    }

    logger.debug(`Published backup ${attachment.id} in message ${message.id}`);
    return {
      success: true,
      value: { channelId, anchorMessageId: message.id, blobId: attachment.id },
    };
  }

  async publish(channelId: string, blob: string): Promise<ChannelResult<SnapshotPointer>> {
    try {
      const channel = await this.findChannel(channelId);
      if (!channel) {
        return failure(`Channel ${channelId} cannot hold backups`);
      }
      return await this.sendBackup(channel, channelId, blob);
    } catch (error) {
      return failure(`Could not publish backup to channel ${channelId}`, error);
    }
  }

  async replace(pointer: SnapshotPointer, blob: string): Promise<ChannelResult<SnapshotPointer>> {
    try {
      const channel = await this.findChannel(pointer.channelId);
      if (!channel) {
        return failure(`Channel ${pointer.channelId} cannot hold backups`);
      }

      const message = await channel.messages.fetch(pointer.anchorMessageId);
      if (!message.editable) {
        // e.g. a restore from a file a user uploaded
        logger.info(`Message ${message.id} is not ours to edit; publishing a new backup`);
        return await this.sendBackup(channel, pointer.channelId, blob);
      }

      const edited = await message.edit({
        files: [snapshotAttachment(blob)],
        attachments: [],
      });
      const attachment = firstAttachment(edited);
      if (!attachment) {
        return failure(`Edited message ${edited.id} came back without an attachment`);
      }

      logger.debug(`Replaced backup on message ${edited.id} with ${attachment.id}`);
      return {
        success: true,
        value: { ...pointer, blobId: attachment.id },
      };
    } catch (error) {
      return failure(`Could not replace backup on message ${pointer.anchorMessageId}`, error);
    }
  }

  async fetch(pointer: SnapshotPointer): Promise<ChannelResult<string>> {
    try {
      const channel = await this.findChannel(pointer.channelId);
      if (!channel) {
        return failure(`Channel ${pointer.channelId} cannot hold backups`);
      }

      const message = await channel.messages.fetch(pointer.anchorMessageId);
      const attachment = message.attachments.get(pointer.blobId);
      if (!attachment) {
        return failure(`Message ${pointer.anchorMessageId} has no attachment ${pointer.blobId}`);
      }

      const response = await this.download(attachment.url);
      if (!response.ok) {
        return failure(`Backup download failed: ${response.status} ${response.statusText}`);
      }

      return { success: true, value: await response.text() };
    } catch (error) {
      return failure(`Could not fetch backup ${pointer.blobId}`, error);
    }
  }
}
