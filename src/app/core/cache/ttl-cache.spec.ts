import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { TtlCache } from './ttl-cache';

describe('TtlCache', () => {
    let clock: number;
    const now = () => clock;

    beforeEach(() => {
        clock = 1_000;
        vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    });

    it('returns a fresh value and drops it once its TTL has passed', () => {
        const cache = new TtlCache<string>({ defaultTtlMs: 60_000, maxItems: 10, now });

        cache.set('repo', 'contents', 1_000);
        expect(cache.get('repo')).toEqual({ found: true, value: 'contents' });

        clock += 1_000;
        expect(cache.get('repo')).toEqual({ found: true, value: 'contents' });

        clock += 1;
        expect(cache.get('repo')).toEqual({ found: false });
        expect(cache.size).toBe(0);
    });

    it('uses the default TTL when none is given', () => {
        const cache = new TtlCache<number>({ defaultTtlMs: 500, maxItems: 10, now });

        cache.set('a', 1);
        clock += 501;

        expect(cache.get('a').found).toBe(false);
    });

    it('overwrites an existing key with a new value and expiration', () => {
        const cache = new TtlCache<string>({ defaultTtlMs: 100, maxItems: 10, now });

        cache.set('k', 'old');
        clock += 90;
        cache.set('k', 'new');
        clock += 90;

        expect(cache.get('k')).toEqual({ found: true, value: 'new' });
        expect(cache.size).toBe(1);
    });

    it('evicts the earliest inserted key when never-expiring keys exceed the cap', () => {
        const cache = new TtlCache<number>({ defaultTtlMs: Infinity, maxItems: 3, now });

        for (const [index, key] of ['a', 'b', 'c', 'd'].entries()) {
            clock += 1;
            cache.set(key, index);
        }

        expect(cache.size).toBe(3);
        expect(cache.get('a').found).toBe(false);
        expect(cache.get('b')).toEqual({ found: true, value: 1 });
        expect(cache.get('d')).toEqual({ found: true, value: 3 });
    });

    it('evicts by creation time even when entries share a timestamp', () => {
        const cache = new TtlCache<number>({ defaultTtlMs: Infinity, maxItems: 2, now });

        cache.set('a', 1);
        cache.set('b', 2);
        cache.set('c', 3);

        expect(cache.get('a').found).toBe(false);
        expect(cache.get('b').found).toBe(true);
        expect(cache.get('c').found).toBe(true);
    });

    it('removes expired entries before touching live ones on overflow', () => {
        const cache = new TtlCache<string>({ defaultTtlMs: Infinity, maxItems: 2, now });

        cache.set('keep-old', 'x');
        cache.set('short', 'y', 10);
        clock += 11;
        cache.set('new', 'z');

        expect(cache.size).toBe(2);
        expect(cache.get('keep-old').found).toBe(true);
        expect(cache.get('new').found).toBe(true);
    });

    it('treats re-set keys as newly created for eviction order', () => {
        const cache = new TtlCache<string>({ defaultTtlMs: Infinity, maxItems: 2, now });

        cache.set('a', '1');
        clock += 1;
        cache.set('b', '2');
        clock += 1;
        cache.set('a', '1 again');
        clock += 1;
        cache.set('c', '3');

        expect(cache.get('b').found).toBe(false);
        expect(cache.get('a')).toEqual({ found: true, value: '1 again' });
    });

    it('makes delete and clear idempotent', () => {
        const cache = new TtlCache<string>({ defaultTtlMs: 100, maxItems: 10, now });
        cache.set('a', '1');

        expect(cache.delete('a')).toBe(true);
        expect(cache.delete('a')).toBe(false);

        cache.clear();
        cache.clear();
        expect(cache.size).toBe(0);
    });

    it('deletes only matching keys', () => {
        const cache = new TtlCache<number>({ defaultTtlMs: 100, maxItems: 10, now });
        cache.set('x:1', 1);
        cache.set('x:2', 2);
        cache.set('y:1', 3);

        expect(cache.deleteWhere(key => key.startsWith('x:'))).toBe(2);
        expect(cache.get('y:1')).toEqual({ found: true, value: 3 });
    });

    it('reports misses and ignores writes while disabled', () => {
        const cache = new TtlCache<string>({ defaultTtlMs: 100, maxItems: 10, now });
        cache.set('a', 'before');

        cache.setEnabled(false);
        cache.set('b', 'ignored');

        expect(cache.get('a')).toEqual({ found: false });
        expect(cache.size).toBe(1);

        cache.setEnabled(true);
        expect(cache.get('a')).toEqual({ found: true, value: 'before' });
        expect(cache.get('b').found).toBe(false);
    });

    it('counts valid and expired entries in its stats', () => {
        const cache = new TtlCache<string>({ defaultTtlMs: 100, maxItems: 5, now });
        cache.set('short', 'a', 10);
        cache.set('long', 'b', 1_000);
        clock += 50;

        expect(cache.getStats()).toEqual({
            totalItems: 2,
            validItems: 1,
            expiredItems: 1,
            maxItems: 5,
            enabled: true,
        });
    });

    describe('with the system clock', () => {
        beforeEach(() => {
            vi.useFakeTimers();
        });

        afterEach(() => {
            vi.useRealTimers();
        });

        it('expires a one second entry after the clock moves past it', () => {
            const cache = new TtlCache<string>({ defaultTtlMs: 300_000, maxItems: 10 });

            cache.set('k', 'v', 1_000);
            expect(cache.get('k')).toEqual({ found: true, value: 'v' });

            vi.advanceTimersByTime(1_001);

            expect(cache.get('k')).toEqual({ found: false });
            expect(cache.size).toBe(0);
        });
    });
});
