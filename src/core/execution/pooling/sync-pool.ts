import { PoolClosedError, PoolExhaustedError } from '../../errors.js';
import type { PoolOptions, PoolStats, SyncPoolAdapter, SyncPoolLease } from './pool-types.js';

export type SyncPoolOptions = Pick<PoolOptions, 'max' | 'maxIdle' | 'idleTimeoutMillis'>;

type IdleEntry<T> = {
    resource: T;
    lastUsedAt: number;
};

/**
 * Synchronous counterpart of `Pool`, for drivers whose calls block the
 * calling thread.
 *
 * There is no wait queue: while a caller is blocked nothing else can run to
 * release a lease, so a saturated pool fails at once with PoolExhaustedError.
 */
export class SyncPool<TResource> {
    private readonly adapter: SyncPoolAdapter<TResource>;
    private readonly options: SyncPoolOptions;
    private readonly maxIdle: number;

    private destroyed = false;
    private leased = 0;
    private readonly idle: IdleEntry<TResource>[] = [];

    constructor(adapter: SyncPoolAdapter<TResource>, options: SyncPoolOptions) {
        if (!Number.isFinite(options.max) || options.max <= 0) {
            throw new Error('Pool options.max must be a positive number');
        }

        this.adapter = adapter;
        this.options = options;
        this.maxIdle = Math.min(options.maxIdle ?? options.max, options.max);
    }

    stats(): PoolStats {
        return { leased: this.leased, idle: this.idle.length, waiting: 0, max: this.options.max };
    }

    acquire(): SyncPoolLease<TResource> {
        if (this.destroyed) {
            throw new PoolClosedError();
        }

        // No timer thread here: expired idle resources are reaped on demand.
        this.reapIdle();

        let entry = this.idle.pop();
        while (entry) {
            if (!this.adapter.validate || this.adapter.validate(entry.resource)) {
                this.leased++;
                return this.makeLease(entry.resource);
            }
            this.adapter.destroy(entry.resource);
            entry = this.idle.pop();
        }

        if (this.leased + this.idle.length >= this.options.max) {
            throw new PoolExhaustedError(0);
        }

        const created = this.adapter.create();
        this.leased++;
        return this.makeLease(created);
    }

    destroy(): void {
        if (this.destroyed) return;
        this.destroyed = true;
        for (const entry of this.idle.splice(0)) {
            this.adapter.destroy(entry.resource);
        }
    }

    private reapIdle(): void {
        const idleTimeout = this.options.idleTimeoutMillis;
        if (!idleTimeout || idleTimeout <= 0) return;

        const now = Date.now();
        const expired = this.idle.filter(entry => now - entry.lastUsedAt >= idleTimeout);
        if (expired.length === 0) return;

        const keep = this.idle.filter(entry => now - entry.lastUsedAt < idleTimeout);
        this.idle.length = 0;
        this.idle.push(...keep);
        for (const entry of expired) {
            this.adapter.destroy(entry.resource);
        }
    }

    private makeLease(resource: TResource): SyncPoolLease<TResource> {
        let done = false;
        return {
            resource,
            release: () => {
                if (done) return;
                done = true;
                this.leased = Math.max(0, this.leased - 1);
                if (this.destroyed || this.idle.length >= this.maxIdle) {
                    this.adapter.destroy(resource);
                    return;
                }
                this.idle.push({ resource, lastUsedAt: Date.now() });
            },
            destroy: () => {
                if (done) return;
                done = true;
                this.leased = Math.max(0, this.leased - 1);
                this.adapter.destroy(resource);
            },
        };
    }
}
