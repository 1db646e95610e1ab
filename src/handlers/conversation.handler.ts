import logger from '../config/logger';
import { SessionStore } from '../services/session.store';
import { UserLock } from '../services/user.lock';
import { InboundEvent, MessageTransport, OutboundInstruction } from '../types/conversation';
import { errorMessage } from '../utils/AppError';
import { maskPhone } from '../utils/phoneNormalizer';
import { withTimeout } from '../utils/withTimeout';
import { ConversationEngine } from './conversation.engine';
import { tryAgain } from './conversation.messages';

export interface ConversationHandlerDeps {
  sessions: SessionStore;
  lock: UserLock;
  engine: ConversationEngine;
  transport: MessageTransport;
  storageTimeoutMs: number;
  clock?: () => Date;
}

/**
 * ConversationHandler runs one inbound event end to end:
 * lock the sender, load → engine → save, then hand replies to the transport
 */
export class ConversationHandler {
  private readonly clock: () => Date;

  constructor(private readonly deps: ConversationHandlerDeps) {
    this.clock = deps.clock ?? (() => new Date());
  }

  async handleEvent(event: InboundEvent): Promise<void> {
    let instructions: OutboundInstruction[];
    try {
      instructions = await this.deps.lock.runExclusive(event.senderId, () => this.process(event));
    } catch (error) {
      // Request-scoped: the user is asked to retry, other sessions carry on
      logger.error('Failed to handle inbound event:', {
        user: maskPhone(event.senderId),
        messageId: event.messageId,
        error: errorMessage(error),
      });
      instructions = [{ ...tryAgain(), recipientId: event.senderId }];
    }

    await this.deliverAll(instructions);
  }

  private async process(event: InboundEvent): Promise<OutboundInstruction[]> {
    const now = this.clock();
    const { sessions, engine, storageTimeoutMs } = this.deps;

    const session = await withTimeout(sessions.load(event.senderId, now), storageTimeoutMs, 'Session load');
    const result = await engine.handle(session, event, now);

    if (result.changed) {
      await withTimeout(sessions.save(result.session), storageTimeoutMs, 'Session save');
    }

    logger.info(`Conversation ${maskPhone(event.senderId)}: ${session.state} -> ${result.session.state}`);
    return result.instructions;
  }

  /**
   * Sends in order and stops at the first failure, so a user never gets a
   * later message without the one before it
   */
  private async deliverAll(instructions: OutboundInstruction[]): Promise<void> {
    for (const instruction of instructions) {
      try {
        await this.deps.transport.deliver(instruction);
      } catch (error) {
        logger.error('Failed to deliver outbound message:', {
          user: maskPhone(instruction.recipientId),
          kind: instruction.kind,
          error: errorMessage(error),
        });
        return;
      }
    }
  }
}
