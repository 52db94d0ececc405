import { EmbedBuilder, ColorResolvable } from 'discord.js';

/**
 * Standard embed colors used throughout the bot
 */
export const COLORS = {
  primary: 0x5865F2,    // Discord Blurple
  success: 0x57F287,    // Green
  warning: 0xFEE75C,    // Yellow
  error: 0xED4245,      // Red
  info: 0x5865F2,       // Blurple
} as const;

/**
 * Create a base embed with consistent styling
 */
export function createEmbed(color: ColorResolvable = COLORS.primary): EmbedBuilder {
  return new EmbedBuilder()
    .setColor(color)
    .setTimestamp();
}

function titledEmbed(color: ColorResolvable, title: string, description?: string): EmbedBuilder {
  const embed = createEmbed(color).setTitle(title);
  if (description) {
    embed.setDescription(description);
  }
  return embed;
}

export function successEmbed(title: string, description?: string): EmbedBuilder {
  return titledEmbed(COLORS.success, `✅ ${title}`, description);
}

export function errorEmbed(title: string, description?: string): EmbedBuilder {
  return titledEmbed(COLORS.error, `❌ ${title}`, description);
}

export function warningEmbed(title: string, description?: string): EmbedBuilder {
  return titledEmbed(COLORS.warning, `⚠️ ${title}`, description);
}

export function infoEmbed(title: string, description?: string): EmbedBuilder {
  return titledEmbed(COLORS.info, `ℹ️ ${title}`, description);
}

/**
 * Format a field value for embed display.
 * Truncates if too long and adds ellipsis.
 */
export function truncateField(value: string, maxLength: number = 1024): string {
  if (value.length <= maxLength) {
    return value;
  }
  return value.slice(0, maxLength - 3) + '...';
}

/**
 * Medal for the podium, bold ordinal otherwise
 */
export function rankLabel(rank: number): string {
  switch (rank) {
    case 1:
      return '🥇';
    case 2:
      return '🥈';
    case 3:
      return '🥉';
    default:
      return `**${rank}.**`;
  }
}
