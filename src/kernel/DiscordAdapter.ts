/**
 * DISCORD ADAPTER - Bridge between discord.js and the security core
 *
 * Converts gateway events into ChatMessages for the SecurityCoordinator and
 * marks deleted/edited messages so a pending action does not try to delete
 * them. Also serves two moderator commands:
 *
 *   !vigil report @user
 *   !vigil pardon @user <reason>
 *
 * Design Pattern: Adapter Pattern (Anti-Corruption Layer)
 */

import { Client, Message as DiscordMessage, PartialMessage, PermissionFlagsBits } from 'discord.js';
import type { ChatMessage } from '../types/Security.types';
import type { SecurityCoordinator } from '../core/SecurityCoordinator';
import { SecurityReporter, formatUserReport } from '../monitoring/SecurityReporter';
import { extractUrls } from '../analyzers/LinkReputationDetector';
import { toError } from '../domain/errors/SecurityErrors';
import { createLogger } from '../services/Logger';

const logger = createLogger('DiscordAdapter');

export const COMMAND_PREFIX = '!vigil';

/**
 * The parts of a discord.js Message the core needs.
 */
export interface InboundMessage {
  id: string;
  content: string;
  createdTimestamp: number;
  channelId: string;
  guildId: string | null;
  author: { id: string; bot: boolean; createdTimestamp: number };
  mentions: {
    everyone: boolean;
    users: ReadonlyMap<string, unknown>;
    roles: ReadonlyMap<string, unknown>;
  };
  embeds: ReadonlyArray<{ url: string | null }>;
}

/**
 * null for DMs and bot messages.
 */
export function toChatMessage(message: InboundMessage): ChatMessage | null {
  if (message.author.bot || message.guildId === null) {
    return null;
  }

  const mentions = [...message.mentions.users.keys(), ...message.mentions.roles.keys()];
  if (message.mentions.everyone) mentions.push('@everyone');

  const declared = message.embeds.flatMap(embed => (embed.url ? [embed.url] : []));

  return {
    messageId: message.id,
    userId: message.author.id,
    guildId: message.guildId,
    channelId: message.channelId,
    content: message.content,
    timestamp: message.createdTimestamp,
    mentions,
    urls: extractUrls(message.content, declared),
    accountCreatedAt: message.author.createdTimestamp,
  };
}

export type ModeratorCommand =
  | { kind: 'report'; userId: string }
  | { kind: 'pardon'; userId: string; reason: string };

/**
 * Parse "!vigil report <@id>" / "!vigil pardon <@id> reason...".
 */
export function parseCommand(content: string): ModeratorCommand | null {
  const match = /^!vigil\s+(report|pardon)\s+<@!?(\d+)>\s*(.*)$/s.exec(content.trim());
  if (!match) return null;

  const [, kind, userId, rest] = match;
  if (kind === 'report') return { kind: 'report', userId };
  return { kind: 'pardon', userId, reason: rest.trim() || 'no reason given' };
}

export class DiscordAdapter {
  private isInitialized = false;

  constructor(
    private readonly client: Client,
    private readonly coordinator: SecurityCoordinator,
    private readonly reporter: SecurityReporter
  ) {}

  /**
   * Initialize adapter - wire up discord.js events to the coordinator
   */
  initialize(): void {
    if (this.isInitialized) {
      logger.warn('DiscordAdapter already initialized');
      return;
    }

    logger.info('🔌 Initializing Discord Adapter...');

    this.client.on('messageCreate', message => {
      this.handleMessageCreate(message).catch(error => logger.error('Error handling messageCreate', error));
    });
    this.client.on('messageUpdate', (oldMessage, newMessage) => this.handleMessageUpdate(oldMessage, newMessage));
    this.client.on('messageDelete', message => this.handleMessageDelete(message));

    this.isInitialized = true;
    logger.info('✅ Discord Adapter initialized');
    logger.info('   → Listening to: messageCreate, messageUpdate, messageDelete');
  }

  private async handleMessageCreate(discordMessage: DiscordMessage): Promise<void> {
    const message = toChatMessage(discordMessage);
    if (!message) return;

    if (message.content.startsWith(COMMAND_PREFIX)) {
      const command = parseCommand(message.content);
      if (command && discordMessage.member?.permissions.has(PermissionFlagsBits.ModerateMembers)) {
        await this.runCommand(command, discordMessage, message);
        return;
      }
    }

    const outcome = await this.coordinator.handleMessage(message);
    if (outcome.execution && !outcome.execution.success) {
      logger.warn(`Action for ${message.messageId} failed: ${outcome.execution.error ?? 'unknown error'}`);
    }
  }

  private handleMessageUpdate(
    oldMessage: DiscordMessage | PartialMessage,
    newMessage: DiscordMessage | PartialMessage
  ): void {
    if (newMessage.author?.bot) return;
    // Embed unfurls also fire messageUpdate; only content edits count
    if (oldMessage.content !== null && oldMessage.content === newMessage.content) return;

    this.coordinator.markMessageGone(newMessage.id);
    logger.debug(`✏️ Message edited: ${newMessage.id}`);
  }

  private handleMessageDelete(message: DiscordMessage | PartialMessage): void {
    this.coordinator.markMessageGone(message.id);
    logger.debug(`🗑️ Message deleted: ${message.id}`);
  }

  private async runCommand(command: ModeratorCommand, discordMessage: DiscordMessage, message: ChatMessage): Promise<void> {
    let reply: string;
    try {
      if (command.kind === 'report') {
        const report = await this.reporter.getUserReport(command.userId, message.guildId, Date.now());
        reply = report ? formatUserReport(report) : `No record for <@${command.userId}>.`;
      } else {
        const result = await this.coordinator.pardon(command.userId, message.guildId, message.userId, command.reason);
        reply =
          `Pardoned <@${command.userId}>: trust reset to ${result.profile.trustScore}.` +
          (result.persisted ? '' : ' (store unavailable, will be saved later)');
      }
    } catch (error) {
      logger.error(`Command ${command.kind} failed`, error);
      reply = `Could not ${command.kind} <@${command.userId}>: ${toError(error).message}`;
    }
    await discordMessage.reply(reply);
  }

  /**
   * Shutdown adapter - cleanup
   */
  shutdown(): void {
    logger.info('🛑 Shutting down Discord Adapter...');

    this.client.removeAllListeners('messageCreate');
    this.client.removeAllListeners('messageUpdate');
    this.client.removeAllListeners('messageDelete');

    this.isInitialized = false;
    logger.info('✅ Discord Adapter shutdown complete');
  }

  healthCheck(): boolean {
    return this.isInitialized && this.client.isReady();
  }
}
