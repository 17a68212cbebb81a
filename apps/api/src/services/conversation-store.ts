/**
 * Conversation State Store
 *
 * Holds at most one pending reminder per user between the two turns of the
 * add flow (reminder text, then priority). Every operation is a synchronous
 * read or write of a single Map, so no two operations interleave.
 */

import type { PendingMessage } from '../../../../packages/shared-types/src';

interface ConversationState {
  awaitingPriority: boolean;
  pendingMessage: string;
  storedAt: number;
}

export interface ConversationStoreConfig {
  /**
   * Drop pending text older than this. Unset means pending text is kept until
   * the user replies.
   */
  pendingTtlMs?: number;
  /** Clock, for tests */
  now?: () => number;
}

export class ConversationStore {
  private state = new Map<string, ConversationState>();
  private pendingTtlMs: number | undefined;
  private now: () => number;

  constructor(config: ConversationStoreConfig = {}) {
    this.pendingTtlMs = config.pendingTtlMs;
    this.now = config.now ?? Date.now;
  }

  /**
   * Store text awaiting a priority, replacing anything pending for the user
   */
  setPendingMessage(userId: string, message: string): void {
    this.state.set(userId, {
      awaitingPriority: true,
      pendingMessage: message,
      storedAt: this.now(),
    });
  }

  /**
   * Remove and return the user's pending text
   */
  popPendingMessage(userId: string): PendingMessage {
    const entry = this.read(userId);
    if (!entry) {
      return { found: false, text: '' };
    }
    this.state.delete(userId);
    return { found: true, text: entry.pendingMessage };
  }

  isAwaitingPriority(userId: string): boolean {
    return this.read(userId)?.awaitingPriority ?? false;
  }

  /**
   * Number of users with a pending reminder (expired entries included until
   * they are next touched)
   */
  size(): number {
    return this.state.size;
  }

  private read(userId: string): ConversationState | undefined {
    const entry = this.state.get(userId);
    if (!entry) {
      return undefined;
    }
    if (this.pendingTtlMs !== undefined && this.now() - entry.storedAt > this.pendingTtlMs) {
      this.state.delete(userId);
      return undefined;
    }
    return entry;
  }
}
