import { asc, eq } from "drizzle-orm";
import type { Database } from "../db";
import { PersistenceError } from "../errors";
import { allowedUsers } from "../schema";
import type { AllowedUser, UserIdentity } from "../types";

export interface AllowListStore {
  has(userId: number): Promise<boolean>;
  /** Inserts the user or refreshes the stored names. */
  upsert(user: UserIdentity): Promise<void>;
  /** Resolves to false when the user was not on the list. */
  remove(userId: number): Promise<boolean>;
  list(): Promise<AllowedUser[]>;
}

export class PgAllowListStore implements AllowListStore {
  constructor(private readonly db: Database) {}

  async has(userId: number) {
    try {
      const rows = await this.db
        .select({ id: allowedUsers.id })
        .from(allowedUsers)
        .where(eq(allowedUsers.userId, userId))
        .limit(1);
      return rows.length > 0;
    } catch (err) {
      throw new PersistenceError("check allow-list", err);
    }
  }

  async upsert(user: UserIdentity) {
    const names = {
      username: user.username ?? null,
      firstName: user.firstName ?? null,
    };
    try {
      await this.db
        .insert(allowedUsers)
        .values({ userId: user.userId, ...names })
        .onConflictDoUpdate({ target: allowedUsers.userId, set: names });
    } catch (err) {
      throw new PersistenceError("grant access", err);
    }
  }

  async remove(userId: number) {
    try {
      const deleted = await this.db
        .delete(allowedUsers)
        .where(eq(allowedUsers.userId, userId))
        .returning({ id: allowedUsers.id });
      return deleted.length > 0;
    } catch (err) {
      throw new PersistenceError("revoke access", err);
    }
  }

  async list() {
    try {
      const rows = await this.db
        .select()
        .from(allowedUsers)
        .orderBy(asc(allowedUsers.createdAt));
      return rows.map(({ userId, username, firstName, createdAt }) => ({
        userId,
        username,
        firstName,
        createdAt,
      }));
    } catch (err) {
      throw new PersistenceError("list allow-list", err);
    }
  }
}
