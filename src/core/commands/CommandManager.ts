import {
  REST,
  Routes,
  Collection,
  ChatInputCommandInteraction,
  Interaction,
} from 'discord.js';
import type { BotModule, ModuleCommand } from '../../types/module.types.js';
import { env, isDevelopment } from '../../config/environment.js';
import { Logger } from '../../shared/utils/logger.js';
import { errorEmbed } from '../../shared/utils/embed.js';

const logger = new Logger('CommandManager');

/**
 * Manages slash command registration and execution.
 */
export class CommandManager {
  private rest: REST;

  /** All registered commands by name */
  private commands: Collection<string, ModuleCommand> = new Collection();

  /** Commands grouped by module ID */
  private moduleCommands: Map<string, string[]> = new Map();

  /** Cooldown expiry timestamps: command name -> user ID -> ms */
  private cooldowns: Map<string, Map<string, number>> = new Map();

  constructor() {
    this.rest = new REST({ version: '10' }).setToken(env.BOT_TOKEN);
  }

  /**
   * Register commands from a module
   */
  registerModuleCommands(module: BotModule): void {
    const moduleId = module.metadata.id;
    const commandNames: string[] = [];

    for (const command of module.commands) {
      const name = command.data.name;
      command.moduleId = moduleId;
      this.commands.set(name, command);
      commandNames.push(name);

      logger.debug(`Registered command: ${name} (module: ${moduleId})`);
    }

    this.moduleCommands.set(moduleId, commandNames);
    logger.info(`Registered ${commandNames.length} command(s) from module: ${moduleId}`);
  }

  /**
   * Unregister commands from a module
   */
  unregisterModuleCommands(moduleId: string): void {
    const commandNames = this.moduleCommands.get(moduleId) ?? [];

    for (const name of commandNames) {
      this.commands.delete(name);
      this.cooldowns.delete(name);
    }

    this.moduleCommands.delete(moduleId);
    logger.info(`Unregistered ${commandNames.length} command(s) from module: ${moduleId}`);
  }

  /**
   * Deploy commands to Discord API.
   * Call this after all modules are loaded.
   */
  async deployCommands(): Promise<void> {
    const commandData = this.commands.map(cmd => cmd.data.toJSON());

    if (commandData.length === 0) {
      logger.warn('No commands to deploy');
      return;
    }

    logger.info(`Deploying ${commandData.length} command(s)...`);

    if (isDevelopment && env.DEV_GUILD_ID) {
      // Guild commands for development (instant update)
      await this.rest.put(
        Routes.applicationGuildCommands(env.CLIENT_ID, env.DEV_GUILD_ID),
        { body: commandData }
      );
      logger.info(`Deployed ${commandData.length} guild command(s) to ${env.DEV_GUILD_ID}`);
    } else {
      // Global commands for production (up to 1 hour propagation)
      await this.rest.put(
        Routes.applicationCommands(env.CLIENT_ID),
        { body: commandData }
      );
      logger.info(`Deployed ${commandData.length} global command(s)`);
    }
  }

  /**
   * Handle an incoming interaction
   */
  async handleInteraction(interaction: Interaction): Promise<void> {
    if (interaction.isChatInputCommand()) {
      await this.handleSlashCommand(interaction);
    }
  }

  private async handleSlashCommand(interaction: ChatInputCommandInteraction): Promise<void> {
    const command = this.commands.get(interaction.commandName);

    if (!command) {
      logger.warn(`Unknown command: ${interaction.commandName}`);
      return;
    }

    if (command.guildOnly && !interaction.guildId) {
      await interaction.reply({
        embeds: [errorEmbed('Server Only', 'This command can only be used in a server.')],
        ephemeral: true,
      });
      return;
    }

    if (command.cooldown) {
      const remaining = this.checkCooldown(
        interaction.commandName,
        interaction.user.id,
        command.cooldown
      );

      if (remaining !== null) {
        await interaction.reply({
          embeds: [errorEmbed(
            'Cooldown',
            `Please wait ${remaining.toFixed(1)} seconds before using this command again.`
          )],
          ephemeral: true,
        });
        return;
      }
    }

    if (command.permissions) {
      const permissions = interaction.memberPermissions;
      const missing = command.permissions.filter(perm => !permissions?.has(perm));

      if (missing.length > 0) {
        await interaction.reply({
          embeds: [errorEmbed(
            'Missing Permissions',
            `You need the following permissions: ${missing.join(', ')}`
          )],
          ephemeral: true,
        });
        return;
      }
    }

    try {
      if (command.defer) {
        await interaction.deferReply({ ephemeral: command.ephemeral });
      }

      await command.execute(interaction);

    } catch (error) {
      logger.error(`Error executing command ${interaction.commandName}:`, error);

      const embed = errorEmbed('Command Error', 'An error occurred while executing this command.');

      if (interaction.deferred || interaction.replied) {
        await interaction.editReply({ embeds: [embed] });
      } else {
        await interaction.reply({ embeds: [embed], ephemeral: true });
      }
    }
  }

  /**
   * Check and arm a command cooldown.
   * @returns Seconds left when still cooling down, otherwise null
   */
  checkCooldown(
    commandName: string,
    userId: string,
    cooldownSeconds: number,
    now: number = Date.now()
  ): number | null {
    let timestamps = this.cooldowns.get(commandName);
    if (!timestamps) {
      timestamps = new Map();
      this.cooldowns.set(commandName, timestamps);
    }

    const expirationTime = timestamps.get(userId);
    if (expirationTime !== undefined && now < expirationTime) {
      return (expirationTime - now) / 1000;
    }

    timestamps.set(userId, now + cooldownSeconds * 1000);
    return null;
  }

  getCommand(name: string): ModuleCommand | undefined {
    return this.commands.get(name);
  }

  getCommandCount(): number {
    return this.commands.size;
  }
}
