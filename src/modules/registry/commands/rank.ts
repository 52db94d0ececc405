import { SlashCommandBuilder, ChatInputCommandInteraction } from 'discord.js';
import { defineSlashCommand } from '../../../types/command.types.js';
import { infoEmbed, warningEmbed } from '../../../shared/utils/embed.js';
import { getRegistryService } from '../state.js';
import { rankingLines } from '../embeds.js';

export const command = defineSlashCommand(
  new SlashCommandBuilder()
    .setName('rank')
    .setDescription('Show where a player stands')
    .addStringOption((opt) =>
      opt
        .setName('username')
        .setDescription('Player to look up (defaults to the players you registered)')
        .setRequired(false)
        .setMaxLength(255)
    ),

  async (interaction: ChatInputCommandInteraction) => {
    const service = getRegistryService();
    const username = interaction.options.getString('username');

    const entries = username
      ? await service.rank(username)
      : await service.rankById(interaction.user.id);

    if (entries.length === 0) {
      const who = username ? `**${username}** is` : 'You are';
      await interaction.reply({
        embeds: [warningEmbed('Not Ranked', `${who} not on the leaderboard.`)],
        ephemeral: true,
      });
      return;
    }

    await interaction.reply({
      embeds: [infoEmbed('Rank', rankingLines(entries))],
      ephemeral: true,
    });
  },
  {
    cooldown: 3,
  }
);
