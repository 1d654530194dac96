import { computed, signal } from '@angular/core';

import type { RateLimitConfig } from '@core/config/gallery-config';
import type { HeaderSource } from '@services/api/github/models';

export type RateLimitLevel = 'unknown' | 'ok' | 'warning' | 'critical';

export interface RateLimitSnapshot {
    remaining: number;
    limit: number | null;
    resetAt: Date;
    observedAt: Date;
}

const REMAINING_HEADER = 'x-ratelimit-remaining';
const LIMIT_HEADER = 'x-ratelimit-limit';
const RESET_HEADER = 'x-ratelimit-reset';

function parseIntegerHeader(value: string | null): number | null {
    if (value === null || value.trim() === '') {
        return null;
    }

    const parsed = Number(value);
    return Number.isInteger(parsed) ? parsed : null;
}

/**
 * Holds the quota reported by the most recent response (last write wins) and classifies it against the
 * configured thresholds. Purely observational: nothing here blocks or delays a request.
 */
export class RateLimitTracker {
    private readonly snapshotState = signal<RateLimitSnapshot | null>(null);

    readonly snapshot = this.snapshotState.asReadonly();
    readonly level = computed<RateLimitLevel>(() => {
        const snapshot = this.snapshotState();
        return snapshot ? this.classify(snapshot.remaining) : 'unknown';
    });

    constructor(
        private readonly thresholds: RateLimitConfig,
        private readonly now: () => number = () => Date.now(),
    ) { }

    /** Refreshes the snapshot from response headers; responses without quota headers change nothing. */
    record(headers: HeaderSource): RateLimitSnapshot | null {
        const remaining = parseIntegerHeader(headers.get(REMAINING_HEADER));
        const resetEpochSeconds = parseIntegerHeader(headers.get(RESET_HEADER));
        if (remaining === null || resetEpochSeconds === null) {
            return null;
        }

        const previousLevel = this.level();
        const snapshot: RateLimitSnapshot = {
            remaining,
            limit: parseIntegerHeader(headers.get(LIMIT_HEADER)),
            resetAt: new Date(resetEpochSeconds * 1000),
            observedAt: new Date(this.now()),
        };
        this.snapshotState.set(snapshot);

        const level = this.level();
        if (level !== previousLevel) {
            if (level === 'critical') {
                console.warn(`RateLimitTracker: critical rate limit, ${remaining} requests remaining`);
            } else if (level === 'warning') {
                console.warn(`RateLimitTracker: rate limit warning, ${remaining} requests remaining`);
            }
        }

        return snapshot;
    }

    classify(remaining: number): Exclude<RateLimitLevel, 'unknown'> {
        if (remaining < this.thresholds.criticalThreshold) {
            return 'critical';
        }

        if (remaining < this.thresholds.warningThreshold) {
            return 'warning';
        }

        return 'ok';
    }

    secondsUntilReset(): number | null {
        const snapshot = this.snapshotState();
        if (!snapshot) {
            return null;
        }

        return Math.max(0, Math.ceil((snapshot.resetAt.getTime() - this.now()) / 1000));
    }

    clear(): void {
        this.snapshotState.set(null);
    }
}
