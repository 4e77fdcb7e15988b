import { describe, expect, it, vi } from 'vitest';

import { PoolClosedError, PoolExhaustedError } from '../../src/core/errors.js';
import { SyncPool } from '../../src/core/execution/pooling/sync-pool.js';

type Conn = { id: number };

const makePool = (opts: { max: number; maxIdle?: number; idleTimeoutMillis?: number }) => {
    let nextId = 0;
    const destroyed: number[] = [];
    const pool = new SyncPool<Conn>(
        {
            create: () => ({ id: ++nextId }),
            destroy: c => {
                destroyed.push(c.id);
            },
        },
        opts
    );
    return { pool, destroyed };
};

describe('SyncPool', () => {
    it('reuses a released resource', () => {
        const { pool } = makePool({ max: 2 });

        const a = pool.acquire();
        a.release();
        const b = pool.acquire();

        expect(b.resource.id).toBe(1);
        expect(pool.stats()).toEqual({ leased: 1, idle: 0, waiting: 0, max: 2 });
    });

    it('throws PoolExhaustedError at once when saturated', () => {
        const { pool } = makePool({ max: 1 });
        pool.acquire();

        expect(() => pool.acquire()).toThrow(PoolExhaustedError);
    });

    it('destroys overflow resources beyond maxIdle', () => {
        const { pool, destroyed } = makePool({ max: 2, maxIdle: 1 });
        const a = pool.acquire();
        const b = pool.acquire();
        a.release();
        b.release();

        expect(destroyed).toEqual([2]);
        expect(pool.stats().idle).toBe(1);
    });

    it('ignores a second release of the same lease', () => {
        const { pool } = makePool({ max: 2 });
        const a = pool.acquire();
        a.release();
        a.release();

        expect(pool.stats()).toEqual({ leased: 0, idle: 1, waiting: 0, max: 2 });
    });

    it('reaps idle resources past the idle timeout on the next acquire', () => {
        vi.useFakeTimers();
        try {
            const { pool, destroyed } = makePool({ max: 2, idleTimeoutMillis: 100 });
            pool.acquire().release();

            vi.advanceTimersByTime(150);
            const next = pool.acquire();

            expect(destroyed).toEqual([1]);
            expect(next.resource.id).toBe(2);
        } finally {
            vi.useRealTimers();
        }
    });

    it('closes idle resources on destroy and leased ones on release', () => {
        const { pool, destroyed } = makePool({ max: 2 });
        const a = pool.acquire();
        pool.acquire().release();

        pool.destroy();
        expect(destroyed).toEqual([2]);
        expect(() => pool.acquire()).toThrow(PoolClosedError);

        a.release();
        expect(destroyed).toEqual([2, 1]);
    });
});
