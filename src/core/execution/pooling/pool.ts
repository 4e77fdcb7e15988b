import { PoolClosedError, PoolExhaustedError } from '../../errors.js';
import type { AcquireOptions, PoolAdapter, PoolLease, PoolOptions, PoolStats } from './pool-types.js';

/**
 * Node.js Timer with optional unref method (for preventing event loop from staying alive)
 */
type NodeTimer = ReturnType<typeof setInterval> & {
    unref?: () => void;
};

type Deferred<T> = {
    promise: Promise<T>;
    resolve: (value: T) => void;
    reject: (err: unknown) => void;
};

const deferred = <T>(): Deferred<T> => {
    let resolve!: (value: T) => void;
    let reject!: (err: unknown) => void;
    const promise = new Promise<T>((res, rej) => {
        resolve = res;
        reject = rej;
    });
    return { promise, resolve, reject };
};

type IdleEntry<T> = {
    resource: T;
    lastUsedAt: number;
};

/**
 * Bounded async resource pool. Callers suspend in `acquire()` until a
 * resource is free, the acquire timeout elapses, or their signal aborts.
 */
export class Pool<TResource> {
    private readonly adapter: PoolAdapter<TResource>;
    private readonly options: PoolOptions;
    private readonly maxIdle: number;

    private destroyed = false;
    private creating = 0;
    private leased = 0;
    private readonly idle: IdleEntry<TResource>[] = [];
    private readonly waiters: Array<Deferred<PoolLease<TResource>>> = [];
    private reapTimer: ReturnType<typeof setInterval> | null = null;

    constructor(adapter: PoolAdapter<TResource>, options: PoolOptions) {
        if (!Number.isFinite(options.max) || options.max <= 0) {
            throw new Error('Pool options.max must be a positive number');
        }

        this.adapter = adapter;
        this.options = options;
        this.maxIdle = Math.min(options.maxIdle ?? options.max, options.max);

        const idleTimeout = this.options.idleTimeoutMillis;
        if (idleTimeout && idleTimeout > 0) {
            const interval = Math.max(1_000, Math.floor(idleTimeout / 2));
            this.reapTimer = setInterval(() => {
                void this.reapIdle();
            }, interval);

            // Best-effort: avoid keeping the event loop alive.
            (this.reapTimer as NodeTimer).unref?.();
        }
    }

    stats(): PoolStats {
        return {
            leased: this.leased,
            idle: this.idle.length,
            waiting: this.waiters.length,
            max: this.options.max,
        };
    }

    /**
     * Acquire a resource lease.
     * The returned lease MUST be released or destroyed.
     * @throws PoolExhaustedError when acquireTimeoutMillis elapses first
     */
    async acquire(opts: AcquireOptions = {}): Promise<PoolLease<TResource>> {
        const { signal } = opts;
        if (this.destroyed) {
            throw new PoolClosedError();
        }
        signal?.throwIfAborted();

        // 1) Prefer idle. A returned entry is already counted as leased.
        const idle = await this.takeIdleValidated();
        if (idle !== null) {
            return this.handOver(this.makeLease(idle.resource), signal);
        }

        // 2) Create if capacity allows.
        if (this.totalLive() < this.options.max) {
            this.creating++;
            let created: TResource;
            try {
                created = await this.createWithinTimeout();
            } finally {
                this.creating--;
            }
            this.leased++;
            return this.handOver(this.makeLease(created), signal);
        }

        // 3) Wait.
        if (this.destroyed) {
            throw new PoolClosedError();
        }
        const waiter = deferred<PoolLease<TResource>>();
        this.waiters.push(waiter);
        const dequeue = () => {
            const idx = this.waiters.indexOf(waiter);
            if (idx >= 0) this.waiters.splice(idx, 1);
        };

        const timeout = this.options.acquireTimeoutMillis;
        let timer: NodeTimer | null = null;
        if (timeout && timeout > 0) {
            timer = setTimeout(() => {
                dequeue();
                waiter.reject(new PoolExhaustedError(timeout));
            }, timeout) as NodeTimer;
            // Best-effort: avoid keeping the event loop alive.
            timer.unref?.();
        }

        const onAbort = () => {
            dequeue();
            waiter.reject(signal?.reason);
        };
        signal?.addEventListener('abort', onAbort, { once: true });
        // Aborted while we were looking for an idle resource.
        if (signal?.aborted) onAbort();

        try {
            return await this.handOver(await waiter.promise, signal);
        } finally {
            if (timer) clearTimeout(timer);
            signal?.removeEventListener('abort', onAbort);
        }
    }

    /** Destroy pool and all idle resources. Leased resources are destroyed as they come back. */
    async destroy(): Promise<void> {
        if (this.destroyed) return;
        this.destroyed = true;

        if (this.reapTimer) {
            clearInterval(this.reapTimer);
            this.reapTimer = null;
        }

        for (const waiter of this.waiters.splice(0)) {
            waiter.reject(new PoolClosedError('Pool destroyed while waiting for a connection'));
        }

        for (const entry of this.idle.splice(0)) {
            await this.adapter.destroy(entry.resource);
        }
    }

    private totalLive(): number {
        return this.idle.length + this.leased + this.creating;
    }

    /**
     * The lease may have been produced after the caller gave up (aborted, or the
     * pool was destroyed meanwhile); give it straight back instead of leaking it.
     */
    private async handOver(
        lease: PoolLease<TResource>,
        signal: AbortSignal | undefined
    ): Promise<PoolLease<TResource>> {
        if (signal?.aborted) {
            await lease.release();
            throw signal.reason;
        }
        if (this.destroyed) {
            await lease.release();
            throw new PoolClosedError();
        }
        return lease;
    }

    private makeLease(resource: TResource): PoolLease<TResource> {
        let done = false;
        return {
            resource,
            release: async () => {
                if (done) return;
                done = true;
                await this.releaseResource(resource);
            },
            destroy: async () => {
                if (done) return;
                done = true;
                await this.destroyResource(resource);
            },
        };
    }

    private async releaseResource(resource: TResource): Promise<void> {
        this.leased = Math.max(0, this.leased - 1);
        if (this.destroyed) {
            await this.adapter.destroy(resource);
            return;
        }

        // Prefer handing directly to waiters.
        const next = this.waiters.shift();
        if (next) {
            this.leased++;
            next.resolve(this.makeLease(resource));
            return;
        }

        // Overflow resources are not kept.
        if (this.idle.length >= this.maxIdle) {
            await this.adapter.destroy(resource);
            return;
        }

        this.idle.push({ resource, lastUsedAt: Date.now() });
    }

    private async destroyResource(resource: TResource): Promise<void> {
        this.leased = Math.max(0, this.leased - 1);
        await this.adapter.destroy(resource);

        // If there are waiters and we have capacity, create a replacement.
        const waiter = this.waiters[0];
        if (!this.destroyed && waiter && this.totalLive() < this.options.max) {
            this.waiters.shift();
            this.creating++;
            try {
                const created = await this.adapter.create();
                this.leased++;
                waiter.resolve(this.makeLease(created));
            } catch (err) {
                waiter.reject(err);
            } finally {
                this.creating--;
            }
        }
    }

    /**
     * Races `adapter.create()` against acquireTimeoutMillis. A resource that
     * shows up after the deadline is destroyed.
     */
    private async createWithinTimeout(): Promise<TResource> {
        const pending = this.adapter.create();
        const timeout = this.options.acquireTimeoutMillis;
        if (!timeout || timeout <= 0) {
            return pending;
        }

        const expired = deferred<TResource>();
        const timer = setTimeout(() => {
            expired.reject(new PoolExhaustedError(timeout));
        }, timeout) as NodeTimer;
        timer.unref?.();

        try {
            return await Promise.race([pending, expired.promise]);
        } catch (err) {
            if (err instanceof PoolExhaustedError) {
                // Nobody is left to report a late failure to.
                void pending
                    .then(resource => this.adapter.destroy(resource))
                    .then(undefined, () => undefined);
            }
            throw err;
        } finally {
            clearTimeout(timer);
        }
    }

    /**
     * Pops idle entries until one passes validation. The entry under
     * validation counts as leased, so concurrent acquirers cannot create
     * past `max` meanwhile.
     */
    private async takeIdleValidated(): Promise<IdleEntry<TResource> | null> {
        let entry = this.idle.pop();
        while (entry) {
            this.leased++;
            let valid: boolean;
            try {
                valid = !this.adapter.validate || await this.adapter.validate(entry.resource);
            } catch (err) {
                this.leased--;
                await this.adapter.destroy(entry.resource);
                throw err;
            }
            if (valid) {
                return entry;
            }
            this.leased--;
            await this.adapter.destroy(entry.resource);
            entry = this.idle.pop();
        }
        return null;
    }

    private async reapIdle(): Promise<void> {
        if (this.destroyed) return;
        const idleTimeout = this.options.idleTimeoutMillis;
        if (!idleTimeout || idleTimeout <= 0) return;

        const now = Date.now();
        const keep: IdleEntry<TResource>[] = [];
        const kill: IdleEntry<TResource>[] = [];
        for (const entry of this.idle) {
            if (now - entry.lastUsedAt >= idleTimeout) kill.push(entry);
            else keep.push(entry);
        }

        this.idle.length = 0;
        this.idle.push(...keep);

        for (const entry of kill) {
            await this.adapter.destroy(entry.resource);
        }
    }
}
