export type PoolOptions = {
    /** Maximum number of live resources (idle + leased), i.e. pool size + overflow. */
    max: number;
    /** Upper bound on idle resources kept for reuse; extra ones are destroyed on release. Defaults to max. */
    maxIdle?: number;

    /** How long an idle resource can sit before being destroyed. Reaped every idleTimeoutMillis / 2 (min 1s). */
    idleTimeoutMillis?: number;

    /**
     * How long acquire() may take, waiting in the queue or creating a new
     * resource, before it rejects with PoolExhaustedError.
     */
    acquireTimeoutMillis?: number;
};

export type AcquireOptions = {
    /** Aborting removes the caller from the wait queue; nothing is leaked. */
    signal?: AbortSignal;
};

export type PoolStats = {
    leased: number;
    idle: number;
    waiting: number;
    max: number;
};

export interface PoolAdapter<TResource> {
    create(): Promise<TResource>;
    destroy(resource: TResource): Promise<void>;
    validate?(resource: TResource): Promise<boolean>;
}

export interface SyncPoolAdapter<TResource> {
    create(): TResource;
    destroy(resource: TResource): void;
    validate?(resource: TResource): boolean;
}

export interface PoolLease<TResource> {
    readonly resource: TResource;

    /** Returns the resource to the pool. Idempotent. */
    release(): Promise<void>;
    /** Permanently removes the resource from the pool. Idempotent. */
    destroy(): Promise<void>;
}

export interface SyncPoolLease<TResource> {
    readonly resource: TResource;

    release(): void;
    destroy(): void;
}
