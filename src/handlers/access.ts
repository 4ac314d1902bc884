import { AuthorizationError } from "../errors";
import type { AllowListStore } from "../store/allowList";
import { texts } from "../texts";
import type { UserIdentity } from "../types";
import type { ChatPort } from "./machine";

// oldest requests are forgotten first
export const MAX_PENDING_REQUESTS = 100;

/**
 * Owner plus allow-list access control. Without an owner id every user is
 * allowed and the owner commands are unavailable.
 */
export class AccessGate {
  // last access request per user, reused when the owner grants access
  private readonly requests = new Map<number, UserIdentity>();
  private readonly notifications = new Set<Promise<void>>();

  constructor(
    private readonly ownerId: number | undefined,
    private readonly allowList: AllowListStore,
  ) {}

  get enabled() {
    return this.ownerId !== undefined;
  }

  isOwner(userId: number) {
    return this.ownerId !== undefined && userId === this.ownerId;
  }

  assertOwner(userId: number) {
    if (!this.isOwner(userId)) {
      throw new AuthorizationError(userId, `user ${userId} is not the owner`);
    }
  }

  async isAllowed(userId: number) {
    if (this.ownerId === undefined || userId === this.ownerId) return true;
    return this.allowList.has(userId);
  }

  async ensureAllowed(userId: number) {
    if (!(await this.isAllowed(userId))) throw new AuthorizationError(userId);
  }

  /**
   * Tells the owner about a rejected user. Does not wait for delivery; a
   * failed notification is logged and dropped.
   */
  requestAccess(user: UserIdentity, port: ChatPort) {
    if (this.ownerId === undefined) return;
    this.remember(user);

    const notification: Promise<void> = port
      .notify(this.ownerId, texts.accessRequest(user))
      .catch((err: unknown) => {
        console.warn(
          `owner notification about user ${user.userId} failed:`,
          err,
        );
      })
      .finally(() => {
        this.notifications.delete(notification);
      });
    this.notifications.add(notification);
  }

  private remember(user: UserIdentity) {
    // re-inserting moves the user to the back of the eviction order
    this.requests.delete(user.userId);
    this.requests.set(user.userId, user);
    for (const userId of this.requests.keys()) {
      if (this.requests.size <= MAX_PENDING_REQUESTS) break;
      this.requests.delete(userId);
    }
  }

  /** Resolves once every owner notification started so far has finished. */
  async settled() {
    await Promise.all([...this.notifications]);
  }

  async grant(userId: number) {
    await this.allowList.upsert(this.requests.get(userId) ?? { userId });
    this.requests.delete(userId);
  }

  revoke(userId: number) {
    this.requests.delete(userId);
    return this.allowList.remove(userId);
  }

  list() {
    return this.allowList.list();
  }
}
