import { Events, type Message } from 'discord.js';
import { defineEvent } from '../../../types/event.types.js';
import { Logger } from '../../../shared/utils/logger.js';
import { getRegistryService } from '../state.js';
import { uploadReferenceEmbed } from '../embeds.js';
import type { InboundMessageRef } from '../types.js';

const logger = new Logger('Registry:Upload');

/**
 * Just what the adapter reads from a discord.js Message
 */
export interface AttachmentCarrier {
  channelId: string;
  id: string;
  attachments: ReadonlyMap<string, { id: string }>;
}

/**
 * One ref per attachment; a message without files yields a single ref
 * with no document.
 */
export function toInboundMessageRefs(message: AttachmentCarrier): InboundMessageRef[] {
  if (message.attachments.size === 0) {
    return [{ chatId: message.channelId, messageId: message.id, documentFileId: null }];
  }

  return [...message.attachments.values()].map(attachment => ({
    chatId: message.channelId,
    messageId: message.id,
    documentFileId: attachment.id,
  }));
}

/**
 * Uploads are answered in DMs and in the channel holding the live backup
 */
export function acceptsUploadsFrom(
  channelId: string,
  isDirectMessage: boolean,
  backupChannelId: string | null
): boolean {
  return isDirectMessage || channelId === backupChannelId;
}

export const messageCreateEvent = defineEvent(
  Events.MessageCreate,
  async (message: Message) => {
    if (message.author.bot || message.attachments.size === 0) return;

    const pointer = getRegistryService().backupLocation();
    const isDirectMessage = !message.inGuild();
    if (!acceptsUploadsFrom(message.channelId, isDirectMessage, pointer?.channelId ?? null)) {
      return;
    }

    const refs = toInboundMessageRefs(message).filter(ref => ref.documentFileId !== null);
    logger.info(`Upload of ${refs.length} file(s) in ${message.channelId} by ${message.author.id}`);

    await message.reply({ embeds: [uploadReferenceEmbed(refs)] });
  }
);
