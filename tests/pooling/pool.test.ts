import { describe, expect, it, vi } from 'vitest';

import { PoolClosedError, PoolExhaustedError } from '../../src/core/errors.js';
import { Pool } from '../../src/core/execution/pooling/pool.js';

type Conn = { id: number };

// Lets acquire() get past its idle lookup and join the wait queue.
const settle = async () => {
    for (let i = 0; i < 10; i++) await Promise.resolve();
};

const makePool = (opts: { max: number; maxIdle?: number; acquireTimeoutMillis?: number }) => {
    let nextId = 0;
    const destroyed: number[] = [];
    const pool = new Pool<Conn>(
        {
            create: async () => ({ id: ++nextId }),
            destroy: async c => {
                destroyed.push(c.id);
            },
        },
        opts
    );
    return { pool, destroyed };
};

describe('Pool', () => {
    it('acquires and releases resources', async () => {
        let nextId = 0;
        const destroy = vi.fn(async () => { });

        const pool = new Pool(
            {
                create: async () => ({ id: ++nextId }),
                destroy,
            },
            { max: 2, idleTimeoutMillis: 1_000 }
        );

        const a = await pool.acquire();
        const b = await pool.acquire();
        expect(a.resource.id).toBe(1);
        expect(b.resource.id).toBe(2);

        await a.release();
        await b.release();
        expect(pool.stats()).toEqual({ leased: 0, idle: 2, waiting: 0, max: 2 });

        await pool.destroy();
        expect(destroy).toHaveBeenCalledTimes(2);
    });

    it('reuses idle resources', async () => {
        const { pool } = makePool({ max: 2 });

        const a = await pool.acquire();
        await a.release();
        const b = await pool.acquire();

        expect(b.resource.id).toBe(1);
        await b.release();
        await pool.destroy();
    });

    it('destroys overflow resources beyond maxIdle on release', async () => {
        const { pool, destroyed } = makePool({ max: 3, maxIdle: 1 });

        const a = await pool.acquire();
        const b = await pool.acquire();
        await a.release();
        await b.release();

        expect(destroyed).toEqual([2]);
        expect(pool.stats().idle).toBe(1);
        await pool.destroy();
    });

    it('hands a released resource to the first waiter', async () => {
        const { pool } = makePool({ max: 1 });

        const first = await pool.acquire();
        const waiting = pool.acquire();
        await settle();
        expect(pool.stats().waiting).toBe(1);

        await first.release();
        const second = await waiting;

        expect(second.resource.id).toBe(1);
        await second.release();
        await pool.destroy();
    });

    it('rejects with PoolExhaustedError when the acquire timeout elapses', async () => {
        vi.useFakeTimers();
        try {
            const { pool } = makePool({ max: 1, acquireTimeoutMillis: 50 });
            const held = await pool.acquire();

            const waiting = pool.acquire();
            await settle();
            const assertion = expect(waiting).rejects.toBeInstanceOf(PoolExhaustedError);
            await vi.advanceTimersByTimeAsync(50);
            await assertion;

            expect(pool.stats().waiting).toBe(0);
            await held.release();
            await pool.destroy();
        } finally {
            vi.useRealTimers();
        }
    });

    it('removes an aborted waiter without leaking a resource', async () => {
        const { pool } = makePool({ max: 1 });
        const held = await pool.acquire();

        const controller = new AbortController();
        const waiting = pool.acquire({ signal: controller.signal });
        await settle();
        controller.abort(new Error('caller gave up'));

        await expect(waiting).rejects.toThrow('caller gave up');
        expect(pool.stats()).toEqual({ leased: 1, idle: 0, waiting: 0, max: 1 });

        await held.release();
        expect(pool.stats()).toEqual({ leased: 0, idle: 1, waiting: 0, max: 1 });
        await pool.destroy();
    });

    it('rejects immediately when the signal is already aborted', async () => {
        const { pool } = makePool({ max: 1 });
        const controller = new AbortController();
        controller.abort(new Error('already'));

        await expect(pool.acquire({ signal: controller.signal })).rejects.toThrow('already');
        expect(pool.stats().leased).toBe(0);
        await pool.destroy();
    });

    it('rejects waiters and new callers once destroyed', async () => {
        const { pool, destroyed } = makePool({ max: 1 });
        const held = await pool.acquire();
        const waiting = pool.acquire();
        await settle();

        await pool.destroy();

        await expect(waiting).rejects.toBeInstanceOf(PoolClosedError);
        await expect(pool.acquire()).rejects.toBeInstanceOf(PoolClosedError);

        // Leased resources are destroyed as they come back.
        await held.release();
        expect(destroyed).toEqual([1]);
    });

    it('skips idle resources that fail validation', async () => {
        let nextId = 0;
        const destroyed: number[] = [];
        const pool = new Pool<Conn>(
            {
                create: async () => ({ id: ++nextId }),
                destroy: async c => {
                    destroyed.push(c.id);
                },
                validate: async c => c.id !== 1,
            },
            { max: 2 }
        );

        const a = await pool.acquire();
        await a.release();
        const b = await pool.acquire();

        expect(destroyed).toEqual([1]);
        expect(b.resource.id).toBe(2);
        await b.release();
        await pool.destroy();
    });

    it('counts an idle resource under validation against max', async () => {
        let created = 0;
        const pool = new Pool<Conn>(
            {
                create: async () => ({ id: ++created }),
                destroy: async () => { },
                validate: c => new Promise(resolve => setTimeout(() => resolve(c.id > 0), 5)),
            },
            { max: 1 }
        );
        const warm = await pool.acquire();
        await warm.release();

        const first = pool.acquire();
        const second = pool.acquire();
        const a = await first;

        expect(created).toBe(1);
        expect(pool.stats()).toEqual({ leased: 1, idle: 0, waiting: 1, max: 1 });

        await a.release();
        const b = await second;
        expect(b.resource.id).toBe(1);
        expect(created).toBe(1);
        await b.release();
        await pool.destroy();
    });

    it('gives up on a create that outlasts the acquire timeout', async () => {
        vi.useFakeTimers();
        try {
            let arrive: (conn: Conn) => void = () => { };
            const destroyed: number[] = [];
            const pool = new Pool<Conn>(
                {
                    create: () => new Promise<Conn>(resolve => {
                        arrive = resolve;
                    }),
                    destroy: async c => {
                        destroyed.push(c.id);
                    },
                },
                { max: 1, acquireTimeoutMillis: 50 }
            );

            const acquiring = pool.acquire();
            const assertion = expect(acquiring).rejects.toBeInstanceOf(PoolExhaustedError);
            await settle();
            await vi.advanceTimersByTimeAsync(50);
            await assertion;
            expect(pool.stats()).toEqual({ leased: 0, idle: 0, waiting: 0, max: 1 });

            // The connection finally shows up and is closed, not pooled.
            arrive({ id: 7 });
            await settle();
            expect(destroyed).toEqual([7]);
            expect(pool.stats().idle).toBe(0);
            await pool.destroy();
        } finally {
            vi.useRealTimers();
        }
    });
});
