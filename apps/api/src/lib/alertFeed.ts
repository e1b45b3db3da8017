import type { RiskBand } from '@riskweave/core';

export const MAX_ALERT_CAPACITY = 200;

export interface AlertInput {
  title: string;
  message?: string;
  riskBand: RiskBand;
  source: string;
  session?: string;
  signalId?: string;
  unifiedRiskScore?: number;
  metadata?: Record<string, unknown>;
}

export interface Alert extends AlertInput {
  id: string;
  receivedAt: string;
}

/**
 * In-memory ring buffer of recent alerts. Oldest entries are dropped first;
 * nothing is persisted.
 */
export class AlertFeed {
  private readonly entries: Alert[] = [];
  private sequence = 0;
  readonly capacity: number;

  constructor(
    capacity: number = MAX_ALERT_CAPACITY,
    private readonly now: () => Date = () => new Date(),
  ) {
    if (!Number.isInteger(capacity) || capacity < 1 || capacity > MAX_ALERT_CAPACITY) {
      throw new Error(`Alert feed capacity must be an integer in [1, ${MAX_ALERT_CAPACITY}], got ${capacity}`);
    }
    this.capacity = capacity;
  }

  get size(): number {
    return this.entries.length;
  }

  push(input: AlertInput): Alert {
    this.sequence += 1;
    const alert: Alert = { ...input, id: `alert_${this.sequence}`, receivedAt: this.now().toISOString() };
    this.entries.push(alert);
    if (this.entries.length > this.capacity) {
      this.entries.splice(0, this.entries.length - this.capacity);
    }
    return alert;
  }

  /**
   * Most recent first
   */
  list(limit: number = this.capacity): Alert[] {
    return [...this.entries].reverse().slice(0, Math.max(limit, 0));
  }
}
