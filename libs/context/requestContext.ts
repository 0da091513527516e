import { AsyncLocalStorage } from 'node:async_hooks';

/**
 * Per-request scope carried across awaits.
 * Only the HTTP ingress (request-id middleware) calls run(); everything downstream reads.
 */
export interface RequestScope {
    readonly requestId: string;
    readonly origin: string;
}

const storage = new AsyncLocalStorage<RequestScope>();

export class RequestContext {
    /**
     * Establish the request scope for the lifetime of fn.
     */
    public static run<T>(scope: RequestScope, fn: () => T): T {
        return storage.run(Object.freeze({ ...scope }), fn);
    }

    /**
     * Active scope, or undefined outside a request (workers, startup).
     */
    public static current(): RequestScope | undefined {
        return storage.getStore();
    }

    /**
     * FAIL-CLOSED: throws if called outside run().
     */
    public static get(): RequestScope {
        const scope = storage.getStore();
        if (!scope) {
            throw new Error("MISSING_REQUEST_CONTEXT: No request scope established");
        }
        return scope;
    }
}
