import type {
  SlashCommandBuilder,
  SlashCommandOptionsOnlyBuilder,
  SlashCommandSubcommandsOnlyBuilder,
  ChatInputCommandInteraction,
  PermissionResolvable,
} from 'discord.js';

/**
 * Function signature for slash command execution
 */
export type SlashCommandExecute = (
  interaction: ChatInputCommandInteraction
) => Promise<void>;

/**
 * Slash command builder types
 */
export type SlashCommandData =
  | SlashCommandBuilder
  | SlashCommandOptionsOnlyBuilder
  | SlashCommandSubcommandsOnlyBuilder;

/**
 * Slash command definition
 */
export interface SlashCommand {
  /** Slash command builder data */
  data: SlashCommandData;

  /** Command execution handler */
  execute: SlashCommandExecute;

  /** Module this command belongs to (set on registration) */
  moduleId?: string;

  /** Required member permissions */
  permissions?: PermissionResolvable[];

  /** Whether the command can only be used in guilds */
  guildOnly?: boolean;

  /** Cooldown in seconds between uses per user */
  cooldown?: number;

  /** Defer the reply before executing (for commands that hit the network) */
  defer?: boolean;

  /** Whether the deferred reply should be ephemeral */
  ephemeral?: boolean;
}

export type ModuleCommand = SlashCommand;

/**
 * Helper to create a slash command definition
 */
export function defineSlashCommand(
  data: SlashCommandData,
  execute: SlashCommandExecute,
  options?: Omit<SlashCommand, 'data' | 'execute'>
): SlashCommand {
  return {
    data,
    execute,
    ...options,
  };
}
