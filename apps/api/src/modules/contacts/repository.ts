import { and, asc, eq } from 'drizzle-orm';
import type { Database } from '../../db/index.js';
import { contacts, users, type Contact, type User } from '../../db/schema.js';

export interface ContactIdentity {
  organizationId: string;
  mediumId: number;
  identifier: string;
  name?: string;
}

export interface ContactRepository {
  /**
   * Get-or-create by (organization, medium, identifier). Concurrent callers
   * converge on the same row.
   */
  findOrCreate(identity: ContactIdentity): Promise<Contact>;
}

export interface UserDirectory {
  /** The user new conversations are owned by: the organization's earliest user */
  findDefaultAssignee(organizationId: string): Promise<User | null>;
}

export class DrizzleContactRepository implements ContactRepository {
  constructor(private readonly db: Database) {}

  async findOrCreate(identity: ContactIdentity): Promise<Contact> {
    const [created] = await this.db
      .insert(contacts)
      .values(identity)
      .onConflictDoNothing({
        target: [contacts.organizationId, contacts.mediumId, contacts.identifier],
      })
      .returning();

    if (created) return created;

    const [existing] = await this.db
      .select()
      .from(contacts)
      .where(and(
        eq(contacts.organizationId, identity.organizationId),
        eq(contacts.mediumId, identity.mediumId),
        eq(contacts.identifier, identity.identifier)
      ))
      .limit(1);

    if (!existing) {
      throw new Error(`Contact ${identity.identifier} vanished after conflict`);
    }
    return existing;
  }
}

export class DrizzleUserDirectory implements UserDirectory {
  constructor(private readonly db: Database) {}

  async findDefaultAssignee(organizationId: string): Promise<User | null> {
    const [row] = await this.db
      .select()
      .from(users)
      .where(eq(users.organizationId, organizationId))
      .orderBy(asc(users.createdAt))
      .limit(1);
    return row ?? null;
  }
}
