import { PIPELINE_CONFIG } from '../../config/constants.js';
import { AppError, NotFoundError } from '../../errors.js';
import { createLogger } from '../../utils/logger.js';
import type { Conversation } from '../../db/schema.js';
import type {
  ConversationFilter,
  ConversationKey,
  ConversationPatch,
  ConversationRepository,
  CreateConversationInput,
} from './repository.js';

const log = createLogger('conversations');

export type ConversationDefaults = Omit<CreateConversationInput, keyof ConversationKey>;

/**
 * Resolves the single active conversation for an
 * (organization, user, contact, medium) tuple and owns conversation state
 * other than the last-message fields.
 */
export class ConversationService {
  constructor(private readonly repository: ConversationRepository) {}

  /**
   * Get-or-create the active conversation for the tuple.
   *
   * The create path is an insert-if-absent against the partial unique
   * index; losing that race means another worker created the row, so the
   * winner is re-read and returned.
   */
  async resolve(
    organizationId: string,
    userId: string,
    contactId: string,
    mediumId: number,
    defaults: ConversationDefaults = {}
  ): Promise<Conversation> {
    const key: ConversationKey = { organizationId, userId, contactId, mediumId };

    for (let attempt = 1; attempt <= PIPELINE_CONFIG.RESOLVE_MAX_ATTEMPTS; attempt++) {
      const existing = await this.repository.findActive(key);
      if (existing) {
        return existing;
      }

      const created = await this.repository.createActive({ ...defaults, ...key });
      if (created) {
        log.info({ conversationId: created.id, ...key }, 'Created conversation');
        return created;
      }

      // Lost the insert race; the next loop reads the winner
      log.debug({ ...key, attempt }, 'Concurrent conversation create, re-fetching');
    }

    // Winner was deactivated between our insert and re-read on every attempt
    throw new AppError(
      'CONVERSATION_CONFLICT',
      `Could not resolve active conversation after ${PIPELINE_CONFIG.RESOLVE_MAX_ATTEMPTS} attempts`,
      { ...key }
    );
  }

  async getConversation(id: string, organizationId?: string): Promise<Conversation> {
    const conversation = await this.repository.findById(id);
    if (
      !conversation ||
      conversation.isDeleted ||
      (organizationId && conversation.organizationId !== organizationId)
    ) {
      throw new NotFoundError('Conversation', id, 'CONVERSATION_NOT_FOUND');
    }
    return conversation;
  }

  async listConversations(filter: ConversationFilter): Promise<Conversation[]> {
    return this.repository.list(filter);
  }

  /**
   * Status, priority, AI settings and metadata. Activation goes through
   * reactivateConversation so siblings are deactivated with it.
   */
  async updateConversation(
    id: string,
    patch: Pick<ConversationPatch, 'status' | 'priority' | 'aiEnabled' | 'aiConfig' | 'metadata'>
  ): Promise<Conversation> {
    await this.getConversation(id);
    return this.requireUpdated(id, await this.repository.update(id, patch));
  }

  async archiveConversation(id: string): Promise<Conversation> {
    await this.getConversation(id);
    return this.requireUpdated(id, await this.repository.update(id, { isArchived: true }));
  }

  /**
   * Soft delete. The conversation also gives up the active slot.
   */
  async deleteConversation(id: string): Promise<Conversation> {
    await this.getConversation(id);
    const deleted = await this.repository.update(id, { isDeleted: true, isActive: false });
    log.info({ conversationId: id }, 'Conversation soft-deleted');
    return this.requireUpdated(id, deleted);
  }

  async reactivateConversation(id: string): Promise<Conversation> {
    const activated = await this.repository.activate(id);
    if (!activated) {
      throw new NotFoundError('Conversation', id, 'CONVERSATION_NOT_FOUND');
    }
    log.info({ conversationId: id }, 'Conversation reactivated');
    return activated;
  }

  private requireUpdated(id: string, conversation: Conversation | null): Conversation {
    if (!conversation) {
      throw new NotFoundError('Conversation', id, 'CONVERSATION_NOT_FOUND');
    }
    return conversation;
  }
}
