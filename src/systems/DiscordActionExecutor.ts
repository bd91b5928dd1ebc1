/**
 * DISCORD ACTION EXECUTOR
 *
 * Applies a moderation outcome through discord.js: message deletion, member
 * timeout/kick/ban, a DM to the user and an audit line in the first mod-log
 * channel found. Enforcement failures raise ActionExecutionError; DM and
 * audit failures are logged and skipped.
 */

import { Client, Guild, GuildMember } from 'discord.js';
import type { ActionResult, ChatMessage, ModerationOutcome } from '../types/Security.types';
import { ActionExecutionError, toError } from '../domain/errors/SecurityErrors';
import { createLogger } from '../services/Logger';
import {
  ActionExecutor,
  ActionStep,
  ExecutionOptions,
  describeOutcome,
  formatDuration,
  isEnforcementStep,
  planActions,
} from './ActionExecutor';

const logger = createLogger('DiscordActionExecutor');

const SUPPORTIVE_TEXT =
  "Hey, it sounds like you might be going through a hard time. You're not alone - " +
  'the moderators here are happy to listen, and if you are in danger please reach out to a local crisis line.';

export class DiscordActionExecutor implements ActionExecutor {
  constructor(
    private readonly client: Client,
    private readonly modLogChannels: string[]
  ) {}

  async apply(outcome: ModerationOutcome, message: ChatMessage, options: ExecutionOptions): Promise<ActionResult> {
    const steps = planActions(outcome.decision, outcome.primary, options, outcome.violations);
    const actionsTaken: string[] = [];
    if (steps.length === 0) {
      return { success: true, actionsTaken };
    }

    const guild = await this.client.guilds.fetch(message.guildId);
    let member: GuildMember | null = null;

    for (const step of steps) {
      try {
        if (step !== 'audit_log' && step !== 'delete_message' && step !== 'ban' && member === null) {
          member = await guild.members.fetch(message.userId);
        }
        const done = await this.runStep(step, guild, member, outcome, message, options);
        if (done) actionsTaken.push(step);
      } catch (error) {
        if (isEnforcementStep(step)) {
          throw new ActionExecutionError(
            step,
            message.userId,
            `${step} failed after [${actionsTaken.join(', ')}]: ${toError(error).message}`,
            error
          );
        }
        logger.warn(`Skipped ${step} for ${message.userId}`, { error: toError(error).message });
      }
    }

    return { success: true, actionsTaken };
  }

  private async runStep(
    step: ActionStep,
    guild: Guild,
    member: GuildMember | null,
    outcome: ModerationOutcome,
    message: ChatMessage,
    options: ExecutionOptions
  ): Promise<boolean> {
    const decision = outcome.decision;
    const reason = decision?.rationale ?? 'automated moderation';

    switch (step) {
      case 'delete_message': {
        const channel = await this.client.channels.fetch(message.channelId);
        if (!channel || !channel.isTextBased() || channel.isDMBased()) return false;
        await channel.messages.delete(message.messageId);
        return true;
      }

      case 'timeout':
        if (!member || decision?.durationMs === undefined) return false;
        await member.timeout(decision.durationMs, reason);
        logger.moderation('timeout', message.userId, reason, { durationMs: decision.durationMs });
        return true;

      case 'kick':
        if (!member) return false;
        await member.kick(reason);
        logger.moderation('kick', message.userId, reason);
        return true;

      case 'ban':
        await guild.members.ban(message.userId, { reason });
        logger.moderation('ban', message.userId, reason);
        return true;

      case 'notify_user':
        if (!member || !decision) return false;
        await member.send(this.noticeFor(outcome, guild.name));
        return true;

      case 'supportive_message':
        if (!member) return false;
        await member.send(SUPPORTIVE_TEXT);
        return true;

      case 'audit_log': {
        const line = describeOutcome(outcome, message, options);
        logger.moderation(decision?.type ?? 'none', message.userId, reason, { messageId: message.messageId });
        const channel = guild.channels.cache.find(c => this.modLogChannels.includes(c.name));
        if (!channel || !channel.isTextBased()) return false;
        await channel.send(line);
        return true;
      }
    }
  }

  private noticeFor(outcome: ModerationOutcome, guildName: string): string {
    const decision = outcome.decision;
    const what = outcome.primary ? outcome.primary.type.replace(/_/g, ' ') : 'a rule violation';
    if (!decision) return '';

    switch (decision.type) {
      case 'timeout':
        return `You have been timed out in ${guildName} for ${formatDuration(decision.durationMs ?? 0)} (${what}).`;
      case 'kick':
        return `You are being removed from ${guildName} (${what}).`;
      case 'ban':
        return `You are being banned from ${guildName} (${what}).`;
      case 'warning':
        return `Warning from ${guildName}: your message was removed (${what}). Further violations lead to a timeout.`;
      default:
        return `Reminder from ${guildName}: please keep the community rules in mind (${what}).`;
    }
  }
}
