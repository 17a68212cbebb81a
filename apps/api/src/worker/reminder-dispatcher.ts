/**
 * Reminder Dispatcher
 *
 * On every cron trigger, sends each user their saved reminders in listing
 * order, one every `spacingMs`. The sends of one trigger form a DispatchCycle
 * which can be abandoned or drained when the dispatcher stops.
 */

import type {
  Messenger,
  Reminder,
  ReminderRepository,
} from '../../../../packages/shared-types/src';
import { displayText } from '../services/conversation-engine';
import { getNextRunTime, isValidCronExpression } from '../services/cron-parser';
import { describeError } from '../services/errors';

// Node stores timer delays as signed 32-bit integers
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

/**
 * Dispatcher configuration
 */
export interface DispatcherConfig {
  repository: ReminderRepository;
  messenger: Messenger;
  cronExpression: string;
  spacingMs: number;
  now?: () => Date;
}

export interface CycleSummary {
  users: number;
  scheduled: number;
}

interface ScheduledSend {
  timer: NodeJS.Timeout | null;
  cancel: () => void;
}

/**
 * A group of delayed tasks started by one trigger
 */
export class DispatchCycle {
  private entries = new Set<ScheduledSend>();
  private pending = new Set<Promise<void>>();
  private aborted = false;

  get pendingCount(): number {
    return this.pending.size;
  }

  /**
   * Run `task` after `delayMs`. Returns false if the cycle was already aborted.
   */
  schedule(delayMs: number, task: () => Promise<void>): boolean {
    if (this.aborted) {
      return false;
    }

    const done = new Promise<void>((resolve) => {
      const entry: ScheduledSend = { timer: null, cancel: () => resolve() };
      this.entries.add(entry);

      const fire = async () => {
        this.entries.delete(entry);
        try {
          await task();
        } catch (error) {
          console.error('[Dispatcher] Scheduled task failed:', describeError(error));
        } finally {
          resolve();
        }
      };

      const arm = (remaining: number) => {
        const step = Math.min(remaining, MAX_TIMER_DELAY_MS);
        entry.timer = setTimeout(() => {
          entry.timer = null;
          if (remaining > step) {
            arm(remaining - step);
          } else {
            void fire();
          }
        }, step);
      };

      if (delayMs <= 0) {
        void fire();
      } else {
        arm(delayMs);
      }
    });

    this.track(done);
    return true;
  }

  /**
   * Count an in-flight promise toward settled()
   */
  track(promise: Promise<unknown>): void {
    const done = promise.then(
      () => undefined,
      () => undefined
    );
    this.pending.add(done);
    void done.then(() => {
      this.pending.delete(done);
    });
  }

  /**
   * Cancel every task that has not started. Returns how many were dropped.
   */
  abort(): number {
    this.aborted = true;
    const dropped = this.entries.size;
    for (const entry of this.entries) {
      if (entry.timer) {
        clearTimeout(entry.timer);
      }
      entry.cancel();
    }
    this.entries.clear();
    return dropped;
  }

  /**
   * Resolves once every scheduled task has finished or been cancelled
   */
  async settled(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all(this.pending);
    }
  }
}

/**
 * Reminder Dispatcher
 */
export class ReminderDispatcher {
  private config: Required<DispatcherConfig>;
  private isRunning = false;
  private triggerTimer: NodeJS.Timeout | null = null;
  private cycles = new Set<DispatchCycle>();

  constructor(config: DispatcherConfig) {
    if (!isValidCronExpression(config.cronExpression)) {
      throw new Error(`Invalid dispatch cron expression: "${config.cronExpression}"`);
    }
    if (!Number.isFinite(config.spacingMs) || config.spacingMs < 0) {
      throw new Error(`Invalid dispatch spacing: ${config.spacingMs}ms`);
    }

    this.config = {
      ...config,
      now: config.now ?? (() => new Date()),
    };
  }

  /**
   * Arm the cron trigger
   */
  start(): void {
    if (this.isRunning) {
      console.log('[Dispatcher] Already running');
      return;
    }

    console.log(
      `[Dispatcher] Config: cron="${this.config.cronExpression}", spacing=${this.config.spacingMs}ms`
    );
    this.scheduleNextTrigger();
    this.isRunning = true;
    console.log('[Dispatcher] Started');
  }

  /**
   * Disarm the trigger. Pending sends are abandoned unless `drain` is set,
   * in which case this waits for them.
   */
  async stop(options: { drain?: boolean } = {}): Promise<void> {
    this.isRunning = false;
    if (this.triggerTimer) {
      clearTimeout(this.triggerTimer);
      this.triggerTimer = null;
    }

    const cycles = Array.from(this.cycles);
    if (options.drain) {
      const pending = cycles.reduce((count, cycle) => count + cycle.pendingCount, 0);
      console.log(`[Dispatcher] Draining ${pending} pending task(s)...`);
      await Promise.all(cycles.map((cycle) => cycle.settled()));
    } else {
      const dropped = cycles.reduce((count, cycle) => count + cycle.abort(), 0);
      if (dropped > 0) {
        console.log(`[Dispatcher] Abandoned ${dropped} pending send(s)`);
      }
    }

    this.cycles.clear();
    console.log('[Dispatcher] Stopped');
  }

  /**
   * Load every user's reminders and schedule their sends. Resolves once all
   * sends are scheduled, not once they are delivered.
   */
  async runCycle(): Promise<CycleSummary> {
    const cycle = new DispatchCycle();
    this.cycles.add(cycle);

    const work = this.scheduleCycle(cycle);
    cycle.track(work);
    try {
      return await work;
    } finally {
      void cycle.settled().then(() => {
        this.cycles.delete(cycle);
      });
    }
  }

  private async scheduleCycle(cycle: DispatchCycle): Promise<CycleSummary> {
    let userIds: string[];
    try {
      userIds = await this.config.repository.distinctUserIds();
    } catch (error) {
      throw new Error(`Failed to load users for dispatch: ${describeError(error)}`, {
        cause: error,
      });
    }

    const counts = await Promise.all(userIds.map((userId) => this.scheduleUser(cycle, userId)));
    const scheduled = counts.reduce((total, count) => total + count, 0);
    console.log(
      `[Dispatcher] Cycle scheduled ${scheduled} reminder(s) for ${userIds.length} user(s)`
    );
    return { users: userIds.length, scheduled };
  }

  private async scheduleUser(cycle: DispatchCycle, userId: string): Promise<number> {
    let reminders: Reminder[];
    try {
      reminders = await this.config.repository.listByUser(userId);
    } catch (error) {
      console.error(`[Dispatcher] Failed to list reminders for ${userId}:`, describeError(error));
      return 0;
    }

    let scheduled = 0;
    reminders.forEach((reminder, index) => {
      if (cycle.schedule(index * this.config.spacingMs, () => this.send(userId, reminder))) {
        scheduled++;
      }
    });
    return scheduled;
  }

  private async send(userId: string, reminder: Reminder): Promise<void> {
    try {
      await this.config.messenger.send(userId, formatDispatchMessage(reminder));
    } catch (error) {
      console.error(
        `[Dispatcher] Failed to send reminder ${reminder.id} to ${userId}:`,
        describeError(error)
      );
    }
  }

  /**
   * Arm the trigger for the first run after both now and `after`
   */
  private scheduleNextTrigger(after?: Date): void {
    const now = this.config.now();
    const from = after && after.getTime() > now.getTime() ? after : now;
    const nextRun = getNextRunTime(this.config.cronExpression, from);
    console.log(`[Dispatcher] Next dispatch at ${nextRun.toString()}`);
    this.armTrigger(nextRun);
  }

  private armTrigger(at: Date): void {
    const delay = Math.max(0, at.getTime() - this.config.now().getTime());
    const step = Math.min(delay, MAX_TIMER_DELAY_MS);

    this.triggerTimer = setTimeout(() => {
      this.triggerTimer = null;
      if (!this.isRunning) return;

      if (delay > step) {
        this.armTrigger(at);
        return;
      }

      void this.runCycle().catch((error) => {
        console.error('[Dispatcher] Error in dispatch cycle:', describeError(error));
      });
      this.scheduleNextTrigger(at);
    }, step);
  }
}

export function formatDispatchMessage(reminder: Pick<Reminder, 'summary' | 'content' | 'priority'>): string {
  return `Reminder: ${displayText(reminder)} (priority ${reminder.priority})`;
}

/**
 * Create a reminder dispatcher (not started)
 */
export function createReminderDispatcher(config: DispatcherConfig): ReminderDispatcher {
  return new ReminderDispatcher(config);
}
