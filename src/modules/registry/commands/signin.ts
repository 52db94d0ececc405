import { SlashCommandBuilder, ChatInputCommandInteraction } from 'discord.js';
import { defineSlashCommand } from '../../../types/command.types.js';
import { errorEmbed, successEmbed, warningEmbed } from '../../../shared/utils/embed.js';
import { getRegistryService } from '../state.js';
import { syncFailedEmbed } from '../embeds.js';

export const command = defineSlashCommand(
  new SlashCommandBuilder()
    .setName('signin')
    .setDescription('Check a username and password')
    .addStringOption((opt) =>
      opt
        .setName('username')
        .setDescription('Registered name')
        .setRequired(true)
        .setMaxLength(255)
    )
    .addStringOption((opt) =>
      opt
        .setName('password')
        .setDescription('Password given at registration')
        .setRequired(true)
    ),

  async (interaction: ChatInputCommandInteraction) => {
    const username = interaction.options.getString('username', true);
    const password = interaction.options.getString('password', true);

    const outcome = await getRegistryService().signIn(username, password);

    if (outcome.status === 'sync-failed') {
      await interaction.editReply({ embeds: [syncFailedEmbed(outcome.error)] });
      return;
    }

    if (outcome.status === 'not-registered') {
      await interaction.editReply({
        embeds: [warningEmbed('Not Registered', `No player named **${username}**. Use /register first.`)],
      });
      return;
    }

    await interaction.editReply({
      embeds: [
        outcome.passwordMatches
          ? successEmbed('Signed In', `Welcome back, **${username}**!`)
          : errorEmbed('Wrong Password', 'The password does not match.'),
      ],
    });
  },
  {
    defer: true,
    ephemeral: true,
    cooldown: 3,
  }
);
