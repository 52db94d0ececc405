/**
 * Leaderboard Registry Bot
 *
 * Entry point for the application.
 */

import { startBot } from './bot.js';
import { env } from './config/environment.js';
import { Logger } from './shared/utils/logger.js';

const logger = new Logger('Main');

async function main(): Promise<void> {
  logger.info('Leaderboard registry bot starting...');
  logger.info(`Environment: ${env.NODE_ENV}`);

  try {
    await startBot();
    logger.info('Bot is now running!');
  } catch (error) {
    logger.error('Failed to start bot:', error);
    process.exit(1);
  }
}

void main();
