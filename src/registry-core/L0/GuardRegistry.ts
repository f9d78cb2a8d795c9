import type {
    Guard, GuardResult, CallerContext, CustodyContext, EventCreationContext, EventReadContext
} from './Guards.js';
import { AuthorizationError } from '../Errors.js';

export interface GuardContexts {
    ADMINISTRATOR: CallerContext;
    CUSTODIAN: CustodyContext;
    EVENT_CREATION: EventCreationContext;
    EVENT_READ: EventReadContext;
}

export type GuardType = keyof GuardContexts;

type GuardTable = { [K in GuardType]: Guard<GuardContexts[K]>[] };

/**
 * Holds the authorization guards by phase. Guards are pure; the registry
 * never remembers a decision.
 */
export class GuardRegistry {
    private guards: GuardTable = {
        ADMINISTRATOR: [],
        CUSTODIAN: [],
        EVENT_CREATION: [],
        EVENT_READ: []
    };

    public register<K extends GuardType>(type: K, guard: Guard<GuardContexts[K]>): void {
        this.guards[type].push(guard);
    }

    public evaluate<K extends GuardType>(type: K, context: GuardContexts[K]): GuardResult {
        const registered: Guard<GuardContexts[K]>[] = this.guards[type];
        if (registered.length === 0) {
            // Fail closed
            throw new Error(`GuardRegistry: no guard registered for ${type}`);
        }

        for (const guard of registered) {
            const result = guard(context);
            if (!result.ok) {
                // Return first failure
                return result;
            }
        }
        return { ok: true };
    }

    /**
     * Evaluates and throws an AuthorizationError on the first failure.
     */
    public enforce<K extends GuardType>(type: K, context: GuardContexts[K]): void {
        const result = this.evaluate(type, context);
        if (!result.ok) {
            throw new AuthorizationError(result.code, result.violation, context.caller);
        }
    }
}
