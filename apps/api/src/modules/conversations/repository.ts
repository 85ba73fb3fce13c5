import { and, desc, eq, ne, sql, type SQL } from 'drizzle-orm';
import type {
  AIConfig,
  ConversationMetadata,
  ConversationPriority,
  ConversationStatus,
  MessageType,
  SenderType,
} from '@relaydesk/shared';
import type { Database } from '../../db/index.js';
import { conversations, type Conversation } from '../../db/schema.js';

// ============================================
// TYPES
// ============================================

/**
 * The scope a single active conversation is unique within
 */
export interface ConversationKey {
  organizationId: string;
  userId: string;
  contactId: string;
  mediumId: number;
}

export interface CreateConversationInput extends ConversationKey {
  status?: ConversationStatus;
  priority?: ConversationPriority;
  aiEnabled?: boolean;
  aiConfig?: AIConfig;
  metadata?: ConversationMetadata;
}

export interface ConversationPatch {
  status?: ConversationStatus;
  priority?: ConversationPriority;
  aiEnabled?: boolean;
  aiConfig?: AIConfig;
  metadata?: ConversationMetadata;
  isArchived?: boolean;
  isActive?: boolean;
  isDeleted?: boolean;
}

export interface ConversationFilter {
  organizationId: string;
  status?: ConversationStatus;
  mediumId?: number;
  contactId?: string;
  activeOnly?: boolean;
  includeArchived?: boolean;
  limit?: number;
  offset?: number;
}

export interface LastMessageSnapshot {
  at: Date;
  byId: string | null;
  byType: SenderType;
  byName: string;
  content: string;
  type: MessageType;
  mediaUrl: string | null;
  isHumanInbound: boolean;
  isAi: boolean;
}

export interface ConversationRepository {
  findById(id: string): Promise<Conversation | null>;
  findActive(key: ConversationKey): Promise<Conversation | null>;

  /**
   * Insert an active conversation for the tuple and deactivate its siblings
   * in one transaction. Resolves null when another writer already holds the
   * active slot (the partial unique index rejected the insert).
   */
  createActive(input: CreateConversationInput): Promise<Conversation | null>;

  /**
   * Make the conversation the active one for its tuple, deactivating the rest
   */
  activate(id: string): Promise<Conversation | null>;

  update(id: string, patch: ConversationPatch): Promise<Conversation | null>;

  /**
   * Write the denormalized last-message fields unless a newer message is
   * already recorded. Human/AI timestamps only ever move forward.
   * Returns whether the last-message fields were written.
   */
  recordLastMessage(id: string, snapshot: LastMessageSnapshot): Promise<boolean>;

  list(filter: ConversationFilter): Promise<Conversation[]>;
}

// ============================================
// DRIZZLE IMPLEMENTATION
// ============================================

function tupleWhere(key: ConversationKey): SQL | undefined {
  return and(
    eq(conversations.organizationId, key.organizationId),
    eq(conversations.userId, key.userId),
    eq(conversations.contactId, key.contactId),
    eq(conversations.mediumId, key.mediumId)
  );
}

export class DrizzleConversationRepository implements ConversationRepository {
  constructor(private readonly db: Database) {}

  async findById(id: string): Promise<Conversation | null> {
    const [row] = await this.db
      .select()
      .from(conversations)
      .where(eq(conversations.id, id))
      .limit(1);
    return row ?? null;
  }

  async findActive(key: ConversationKey): Promise<Conversation | null> {
    const [row] = await this.db
      .select()
      .from(conversations)
      .where(and(tupleWhere(key), eq(conversations.isActive, true)))
      .limit(1);
    return row ?? null;
  }

  async createActive(input: CreateConversationInput): Promise<Conversation | null> {
    return this.db.transaction(async (tx) => {
      const [created] = await tx
        .insert(conversations)
        .values({ ...input, isActive: true })
        .onConflictDoNothing()
        .returning();

      if (!created) return null;

      await tx
        .update(conversations)
        .set({ isActive: false, updatedAt: new Date() })
        .where(and(
          tupleWhere(input),
          ne(conversations.id, created.id),
          eq(conversations.isActive, true)
        ));

      return created;
    });
  }

  async activate(id: string): Promise<Conversation | null> {
    return this.db.transaction(async (tx) => {
      const [target] = await tx
        .select()
        .from(conversations)
        .where(eq(conversations.id, id))
        .for('update');

      if (!target) return null;
      if (target.isActive) return target;

      // Siblings first, the partial unique index allows one active row
      await tx
        .update(conversations)
        .set({ isActive: false, updatedAt: new Date() })
        .where(and(tupleWhere(target), ne(conversations.id, id), eq(conversations.isActive, true)));

      const [activated] = await tx
        .update(conversations)
        .set({ isActive: true, isDeleted: false, isArchived: false, updatedAt: new Date() })
        .where(eq(conversations.id, id))
        .returning();

      return activated ?? null;
    });
  }

  async update(id: string, patch: ConversationPatch): Promise<Conversation | null> {
    const [row] = await this.db
      .update(conversations)
      .set({ ...patch, updatedAt: new Date() })
      .where(eq(conversations.id, id))
      .returning();
    return row ?? null;
  }

  async recordLastMessage(id: string, snapshot: LastMessageSnapshot): Promise<boolean> {
    const updated = await this.db
      .update(conversations)
      .set({
        lastMessageAt: snapshot.at,
        lastMessageById: snapshot.byId,
        lastMessageByType: snapshot.byType,
        lastMessageByName: snapshot.byName,
        lastMessageContent: snapshot.content,
        lastMessageType: snapshot.type,
        lastMessageMediaUrl: snapshot.mediaUrl,
        ...(snapshot.isHumanInbound ? { lastHumanMessageAt: snapshot.at } : {}),
        ...(snapshot.isAi ? { lastAiMessageAt: snapshot.at } : {}),
        updatedAt: new Date(),
      })
      .where(and(
        eq(conversations.id, id),
        sql`(${conversations.lastMessageAt} IS NULL OR ${conversations.lastMessageAt} <= ${snapshot.at})`
      ))
      .returning({ id: conversations.id });

    if (updated.length > 0) return true;

    // Older than the recorded last message: only advance the per-author timestamps
    if (snapshot.isHumanInbound || snapshot.isAi) {
      await this.db
        .update(conversations)
        .set({
          ...(snapshot.isHumanInbound
            ? { lastHumanMessageAt: sql`GREATEST(COALESCE(${conversations.lastHumanMessageAt}, ${snapshot.at}), ${snapshot.at})` }
            : {}),
          ...(snapshot.isAi
            ? { lastAiMessageAt: sql`GREATEST(COALESCE(${conversations.lastAiMessageAt}, ${snapshot.at}), ${snapshot.at})` }
            : {}),
          updatedAt: new Date(),
        })
        .where(eq(conversations.id, id));
    }

    return false;
  }

  async list(filter: ConversationFilter): Promise<Conversation[]> {
    const conditions = [
      eq(conversations.organizationId, filter.organizationId),
      eq(conversations.isDeleted, false),
    ];

    if (filter.status) {
      conditions.push(eq(conversations.status, filter.status));
    }
    if (filter.mediumId !== undefined) {
      conditions.push(eq(conversations.mediumId, filter.mediumId));
    }
    if (filter.contactId) {
      conditions.push(eq(conversations.contactId, filter.contactId));
    }
    if (filter.activeOnly) {
      conditions.push(eq(conversations.isActive, true));
    }
    if (!filter.includeArchived) {
      conditions.push(eq(conversations.isArchived, false));
    }

    return this.db
      .select()
      .from(conversations)
      .where(and(...conditions))
      .orderBy(sql`${conversations.lastMessageAt} DESC NULLS LAST`, desc(conversations.createdAt))
      .limit(filter.limit ?? 50)
      .offset(filter.offset ?? 0);
  }
}
