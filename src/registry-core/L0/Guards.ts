// src/registry-core/L0/Guards.ts
import type { AdministratorRegistry } from '../L1/Administrators.js';
import type { Identity } from './Ontology.js';
import { ErrorCode } from '../Errors.js';

// --- Guard Pattern ---
export type GuardResult =
    | { ok: true }
    | { ok: false; code: ErrorCode; violation: string };

export type Guard<T> = (input: T) => GuardResult;

const OK: GuardResult = { ok: true };
const FAIL = (code: ErrorCode, msg: string): GuardResult => ({ ok: false, code, violation: msg });

// --- Guard Contexts ---
export interface CallerContext {
    caller: Identity;
    administrators: AdministratorRegistry;
}

export interface CustodyContext extends CallerContext {
    owner: Identity;
}

export interface EventCreationContext extends CustodyContext {
    requestedAccessList: readonly Identity[];
}

export interface EventReadContext extends CustodyContext {
    accessList: ReadonlySet<Identity>;
}

// --- Concrete Guards ---

// 1. Administrator
export const AdministratorGuard: Guard<CallerContext> = ({ caller, administrators }) => {
    if (!administrators.isAdministrator(caller)) {
        return FAIL(ErrorCode.ADMINISTRATOR_REQUIRED, `Authority Violation: ${caller} is not an administrator`);
    }
    return OK;
};

// 2. Custodian (owner or administrator)
export const CustodianGuard: Guard<CustodyContext> = ({ caller, owner, administrators }) => {
    if (caller === owner || administrators.isAdministrator(caller)) return OK;
    return FAIL(ErrorCode.CUSTODIAN_REQUIRED, `Authority Violation: ${caller} is neither the owner nor an administrator`);
};

// 3a. Event creation, self-grant: the access list supplied with the call counts
export const SelfGrantEventCreationGuard: Guard<EventCreationContext> = (ctx) => {
    if (CustodianGuard(ctx).ok) return OK;
    if (ctx.requestedAccessList.includes(ctx.caller)) return OK;
    return FAIL(ErrorCode.EVENT_ACCESS_DENIED, `Authority Violation: ${ctx.caller} may not record events on this asset`);
};

// 3b. Event creation, custodians only
export const CustodianEventCreationGuard: Guard<EventCreationContext> = (ctx) => {
    if (CustodianGuard(ctx).ok) return OK;
    return FAIL(ErrorCode.CUSTODIAN_REQUIRED, `Authority Violation: ${ctx.caller} may not record events on this asset`);
};

// 4. Event read: custodians or members of the stored access list
export const EventReadGuard: Guard<EventReadContext> = (ctx) => {
    if (CustodianGuard(ctx).ok) return OK;
    if (ctx.accessList.has(ctx.caller)) return OK;
    return FAIL(ErrorCode.EVENT_ACCESS_DENIED, `Authority Violation: ${ctx.caller} is not on the event access list`);
};
