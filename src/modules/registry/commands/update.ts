import { SlashCommandBuilder, ChatInputCommandInteraction, PermissionFlagsBits } from 'discord.js';
import { defineSlashCommand } from '../../../types/command.types.js';
import { getRegistryService } from '../state.js';
import { pushResultEmbed } from '../embeds.js';

export const command = defineSlashCommand(
  new SlashCommandBuilder()
    .setName('update')
    .setDescription('Overwrite the current registry backup (Admin only)')
    .setDefaultMemberPermissions(PermissionFlagsBits.Administrator),

  async (interaction: ChatInputCommandInteraction) => {
    const result = await getRegistryService().update();
    await interaction.editReply({ embeds: [pushResultEmbed('updated', result)] });
  },
  {
    permissions: [PermissionFlagsBits.Administrator],
    defer: true,
    ephemeral: true,
  }
);
