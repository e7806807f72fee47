/**
 * @textrelay/fallback - Status reporting
 *
 * Delivery helper for the optional StatusReporter sink, plus an in-memory
 * sink that keeps the latest status and a bounded history per provider.
 */

import type pino from 'pino';
import { errorMessage } from '@textrelay/core';
import type { AttemptStatus, StatusReporter } from './types.js';

export interface ProviderStatusEntry extends AttemptStatus {
  provider: string;
  timestamp: Date;
}

/**
 * Deliver one event to `reporter`. Sync throws and async rejections are
 * logged and dropped so they can never change an orchestration result.
 */
export function safeReport(
  reporter: StatusReporter | undefined,
  provider: string,
  status: AttemptStatus,
  log: pino.Logger,
): void {
  if (!reporter) return;

  const onError = (err: unknown): void => {
    log.warn({ provider, error: errorMessage(err) }, 'Status reporter failed');
  };

  try {
    void Promise.resolve(reporter.report(provider, status)).catch(onError);
  } catch (err: unknown) {
    onError(err);
  }
}

/**
 * Keeps what the status dashboard needs: the latest event per provider and
 * the most recent `maxHistory` events for each.
 */
export class InMemoryStatusReporter implements StatusReporter {
  private readonly latest = new Map<string, ProviderStatusEntry>();
  private readonly history = new Map<string, ProviderStatusEntry[]>();
  private readonly maxHistory: number;

  constructor(options: { maxHistory?: number } = {}) {
    this.maxHistory = Math.max(1, options.maxHistory ?? 100);
  }

  report(provider: string, status: AttemptStatus): void {
    const entry: ProviderStatusEntry = { provider, ...status, timestamp: new Date() };
    this.latest.set(provider, entry);

    const events = this.history.get(provider) ?? [];
    events.push(entry);
    if (events.length > this.maxHistory) {
      events.splice(0, events.length - this.maxHistory);
    }
    this.history.set(provider, events);
  }

  getLatest(provider: string): ProviderStatusEntry | undefined {
    return this.latest.get(provider);
  }

  getHistory(provider: string): readonly ProviderStatusEntry[] {
    return this.history.get(provider) ?? [];
  }

  /** Latest status of every provider seen so far. */
  getProvidersStatus(): Record<string, ProviderStatusEntry> {
    return Object.fromEntries(this.latest);
  }

  clear(): void {
    this.latest.clear();
    this.history.clear();
  }
}
