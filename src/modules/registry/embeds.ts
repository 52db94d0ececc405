import type { EmbedBuilder } from 'discord.js';
import {
  createEmbed,
  COLORS,
  errorEmbed,
  rankLabel,
  successEmbed,
  truncateField,
} from '../../shared/utils/embed.js';
import type { RankedPage } from './services/RankEngine.js';
import type { PushResult } from './services/SyncManager.js';
import { DecodeError } from './types.js';
import type { ChannelError, InboundMessageRef, RankedUser, SnapshotPointer, SyncError } from './types.js';

/**
 * One line per entry: medal or ordinal, name, Discord mention
 */
export function rankingLines(entries: RankedUser[]): string {
  if (entries.length === 0) {
    return 'No players registered yet.';
  }
  return entries
    .map(entry => `${rankLabel(entry.rank)} ${entry.username} (<@${entry.id}>)`)
    .join('\n');
}

export function placementText(placement: RankedUser[]): string {
  if (placement.length === 0) {
    return 'Not ranked';
  }
  return placement.map(entry => `#${entry.rank}`).join(', ');
}

/**
 * The three configuration lines that point the bot at a backup
 */
export function pointerConfigBlock(pointer: SnapshotPointer): string {
  return [
    '```',
    `SNAPSHOT_CHANNEL_ID=${pointer.channelId}`,
    `SNAPSHOT_MESSAGE_ID=${pointer.anchorMessageId}`,
    `SNAPSHOT_BLOB_ID=${pointer.blobId}`,
    '```',
  ].join('\n');
}

export function registeredEmbed(
  username: string,
  top: RankedUser[],
  placement: RankedUser[],
  backup: PushResult
): EmbedBuilder {
  const embed = successEmbed('Registered', `Welcome, **${username}**!`)
    .addFields(
      { name: 'Your Rank', value: placementText(placement), inline: true },
      { name: `Top ${top.length}`, value: truncateField(rankingLines(top)) }
    );

  return withBackupWarning(embed, backup);
}

export function deletedEmbed(count: number, backup: PushResult): EmbedBuilder {
  const embed = successEmbed('Deleted', `Removed ${count} record(s) registered to you.`);
  return withBackupWarning(embed, backup);
}

/**
 * Without a backup location a change is kept in the database alone; say so
 */
export function withBackupWarning(embed: EmbedBuilder, backup: PushResult): EmbedBuilder {
  if (!backup.success) {
    embed.addFields({
      name: 'Backup',
      value: truncateField(`⚠️ Saved locally, backup failed: ${backup.error.message}`),
    });
  }
  return embed;
}

/**
 * The backup could not take the change, so it was undone
 */
export function notSavedEmbed(error: ChannelError): EmbedBuilder {
  return errorEmbed('Not Saved', `The backup could not be updated, so nothing changed: ${error.message}`);
}

export function syncFailedEmbed(error: SyncError): EmbedBuilder {
  const title = error instanceof DecodeError ? 'Backup Unreadable' : 'Backup Unavailable';
  return errorEmbed(title, `Could not restore the registry: ${error.message}`);
}

export function pushResultEmbed(action: 'saved' | 'updated', result: PushResult): EmbedBuilder {
  if (!result.success) {
    return errorEmbed('Backup Failed', result.error.message);
  }

  return successEmbed(
    action === 'saved' ? 'Backup Saved' : 'Backup Updated',
    `Stored ${result.records} record(s). Restart configuration:\n${pointerConfigBlock(result.pointer)}`
  );
}

export function leaderboardEmbed(page: RankedPage, callerRanks: RankedUser[]): EmbedBuilder {
  const embed = createEmbed(COLORS.primary)
    .setTitle('🏆 Leaderboard')
    .setDescription(rankingLines(page.entries))
    .setFooter({ text: `Page ${page.page + 1} of ${page.totalPages} • ${page.total} players` });

  if (callerRanks.length > 0) {
    embed.addFields({ name: 'Your Rank', value: placementText(callerRanks) });
  }

  return embed;
}

export function uploadReferenceEmbed(refs: InboundMessageRef[]): EmbedBuilder {
  const lines = refs.map(ref =>
    pointerConfigBlock({
      channelId: ref.chatId,
      anchorMessageId: ref.messageId,
      blobId: ref.documentFileId ?? 'none',
    })
  );
  return createEmbed(COLORS.info)
    .setTitle('📎 File References')
    .setDescription(truncateField(lines.join('\n'), 4096));
}
