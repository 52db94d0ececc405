import { SlashCommandBuilder, ChatInputCommandInteraction } from 'discord.js';
import { defineSlashCommand } from '../../../types/command.types.js';
import { errorEmbed } from '../../../shared/utils/embed.js';
import { getRegistryService } from '../state.js';
import { notSavedEmbed, registeredEmbed, syncFailedEmbed } from '../embeds.js';

export const command = defineSlashCommand(
  new SlashCommandBuilder()
    .setName('register')
    .setDescription('Register a username on the leaderboard')
    .addStringOption((opt) =>
      opt
        .setName('username')
        .setDescription('Name to register')
        .setRequired(true)
        .setMaxLength(255)
    )
    .addStringOption((opt) =>
      opt
        .setName('password')
        .setDescription('Password used by /signin')
        .setRequired(true)
    ),

  async (interaction: ChatInputCommandInteraction) => {
    const username = interaction.options.getString('username', true);
    const password = interaction.options.getString('password', true);

    const outcome = await getRegistryService().register({
      id: interaction.user.id,
      username,
      password,
    });

    switch (outcome.status) {
      case 'conflict':
        await interaction.editReply({
          embeds: [errorEmbed('Username Taken', `**${username}** is already registered.`)],
        });
        return;
      case 'sync-failed':
        await interaction.editReply({ embeds: [syncFailedEmbed(outcome.error)] });
        return;
      case 'backup-failed':
        await interaction.editReply({ embeds: [notSavedEmbed(outcome.error)] });
        return;
      case 'registered':
        await interaction.editReply({
          embeds: [registeredEmbed(username, outcome.top, outcome.placement, outcome.backup)],
        });
        return;
    }
  },
  {
    defer: true,
    ephemeral: true,
    cooldown: 5,
  }
);
