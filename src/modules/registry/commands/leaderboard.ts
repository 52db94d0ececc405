import {
  SlashCommandBuilder,
  ChatInputCommandInteraction,
  ActionRowBuilder,
  ButtonBuilder,
  ButtonStyle,
  ComponentType,
} from 'discord.js';
import { defineSlashCommand } from '../../../types/command.types.js';
import { Logger } from '../../../shared/utils/logger.js';
import { getRegistryService } from '../state.js';
import { leaderboardEmbed } from '../embeds.js';

const logger = new Logger('Registry:Leaderboard');

const PAGE_SIZE = 10;

export type PageAction = 'first' | 'prev' | 'next' | 'last';

/**
 * Page a pagination button leads to
 */
export function nextPage(action: string, page: number, totalPages: number): number {
  switch (action) {
    case 'first':
      return 0;
    case 'prev':
      return Math.max(0, page - 1);
    case 'next':
      return Math.min(totalPages - 1, page + 1);
    case 'last':
      return totalPages - 1;
    default:
      return page;
  }
}

function buildPaginationButtons(page: number, totalPages: number, disabled: boolean = false) {
  const button = (action: PageAction, emoji: string, atEdge: boolean) =>
    new ButtonBuilder()
      .setCustomId(`leaderboard:${action}`)
      .setEmoji(emoji)
      .setStyle(ButtonStyle.Secondary)
      .setDisabled(disabled || atEdge);

  return new ActionRowBuilder<ButtonBuilder>().addComponents(
    button('first', '⏮️', page === 0),
    button('prev', '◀️', page === 0),
    button('next', '▶️', page >= totalPages - 1),
    button('last', '⏭️', page >= totalPages - 1)
  );
}

export const command = defineSlashCommand(
  new SlashCommandBuilder()
    .setName('leaderboard')
    .setDescription('View registered players, newest accounts first')
    .addIntegerOption((opt) =>
      opt
        .setName('page')
        .setDescription('Page to open')
        .setRequired(false)
        .setMinValue(1)
    ),

  async (interaction: ChatInputCommandInteraction) => {
    const service = getRegistryService();
    const callerRanks = await service.rankById(interaction.user.id);
    let page = (interaction.options.getInteger('page') ?? 1) - 1;
    let pages = 1;

    const render = async (disabled: boolean = false) => {
      const ranked = await service.leaderboard(page, PAGE_SIZE);
      page = ranked.page;
      pages = ranked.totalPages;
      const view = {
        embeds: [leaderboardEmbed(ranked, callerRanks)],
        components: ranked.totalPages > 1
          ? [buildPaginationButtons(ranked.page, ranked.totalPages, disabled)]
          : [],
      };
      return { view, totalPages: ranked.totalPages };
    };

    const initial = await render();
    const response = await interaction.reply({ ...initial.view, fetchReply: true });

    if (initial.totalPages <= 1) return;

    const collector = response.createMessageComponentCollector({
      componentType: ComponentType.Button,
      filter: (i) => i.user.id === interaction.user.id,
      time: 120000,
    });

    collector.on('collect', async (buttonInteraction) => {
      try {
        const action = buttonInteraction.customId.split(':')[1] ?? '';
        // render() clamps again if players were deleted meanwhile
        page = nextPage(action, page, pages);

        const { view } = await render();
        await buttonInteraction.update(view);
      } catch (error) {
        logger.error('Error handling leaderboard interaction:', error);
      }
    });

    collector.on('end', async () => {
      try {
        const { view } = await render(true);
        await interaction.editReply(view);
      } catch (error) {
        logger.debug('Could not disable leaderboard buttons:', error);
      }
    });
  },
  {
    cooldown: 5,
  }
);
