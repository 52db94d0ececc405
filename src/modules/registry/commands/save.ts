import { SlashCommandBuilder, ChatInputCommandInteraction, PermissionFlagsBits } from 'discord.js';
import { defineSlashCommand } from '../../../types/command.types.js';
import { getRegistryService } from '../state.js';
import { pushResultEmbed } from '../embeds.js';

export const command = defineSlashCommand(
  new SlashCommandBuilder()
    .setName('save')
    .setDescription('Back up the registry into a new message in this channel (Admin only)')
    .setDefaultMemberPermissions(PermissionFlagsBits.Administrator),

  async (interaction: ChatInputCommandInteraction) => {
    const result = await getRegistryService().save(interaction.channelId);
    await interaction.editReply({ embeds: [pushResultEmbed('saved', result)] });
  },
  {
    permissions: [PermissionFlagsBits.Administrator],
    defer: true,
    ephemeral: true,
  }
);
