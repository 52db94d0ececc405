import { SlashCommandBuilder, ChatInputCommandInteraction } from 'discord.js';
import { defineSlashCommand } from '../../../types/command.types.js';
import { warningEmbed } from '../../../shared/utils/embed.js';
import { getRegistryService } from '../state.js';
import { deletedEmbed, notSavedEmbed } from '../embeds.js';

export const command = defineSlashCommand(
  new SlashCommandBuilder()
    .setName('delete')
    .setDescription('Remove every player you registered'),

  async (interaction: ChatInputCommandInteraction) => {
    const outcome = await getRegistryService().delete(interaction.user.id);

    if (outcome.status === 'not-found') {
      await interaction.editReply({
        embeds: [warningEmbed('No Such User', 'You have not registered anyone.')],
      });
      return;
    }

    if (outcome.status === 'backup-failed') {
      await interaction.editReply({ embeds: [notSavedEmbed(outcome.error)] });
      return;
    }

    await interaction.editReply({ embeds: [deletedEmbed(outcome.count, outcome.backup)] });
  },
  {
    defer: true,
    ephemeral: true,
    cooldown: 5,
  }
);
