import { describe, test, expect } from '@jest/globals';
import {
    AdministratorGuard, CustodianGuard, CustodianEventCreationGuard, EventReadGuard, SelfGrantEventCreationGuard
} from '../Guards.js';
import { GuardRegistry } from '../GuardRegistry.js';
import { check, enforce, INV_ID_01, INV_IN_01, INV_RES_01 } from '../Invariants.js';
import { AdministratorRegistry } from '../../L1/Administrators.js';
import { AuthorizationError, ErrorCode, ValidationError } from '../../Errors.js';

const administrators = new AdministratorRegistry(['root']);

describe('Authorization Guards', () => {
    test('AdministratorGuard', () => {
        expect(AdministratorGuard({ caller: 'root', administrators })).toEqual({ ok: true });
        expect(AdministratorGuard({ caller: 'alice', administrators })).toEqual({
            ok: false,
            code: ErrorCode.ADMINISTRATOR_REQUIRED,
            violation: 'Authority Violation: alice is not an administrator'
        });
    });

    test('CustodianGuard admits owner and administrators', () => {
        expect(CustodianGuard({ caller: 'alice', owner: 'alice', administrators }).ok).toBe(true);
        expect(CustodianGuard({ caller: 'root', owner: 'alice', administrators }).ok).toBe(true);
        expect(CustodianGuard({ caller: 'bob', owner: 'alice', administrators }).ok).toBe(false);
    });

    test('self-grant creation counts the supplied access list', () => {
        const ctx = { caller: 'bob', owner: 'alice', administrators, requestedAccessList: ['bob'] };
        expect(SelfGrantEventCreationGuard(ctx).ok).toBe(true);
        expect(CustodianEventCreationGuard(ctx)).toEqual({
            ok: false,
            code: ErrorCode.CUSTODIAN_REQUIRED,
            violation: 'Authority Violation: bob may not record events on this asset'
        });
        expect(SelfGrantEventCreationGuard({ ...ctx, requestedAccessList: ['carol'] }).ok).toBe(false);
    });

    test('EventReadGuard checks the stored list', () => {
        const accessList: ReadonlySet<string> = new Set(['carol']);
        expect(EventReadGuard({ caller: 'carol', owner: 'alice', administrators, accessList }).ok).toBe(true);
        expect(EventReadGuard({ caller: 'alice', owner: 'alice', administrators, accessList }).ok).toBe(true);
        expect(EventReadGuard({ caller: 'dave', owner: 'alice', administrators, accessList }).ok).toBe(false);
    });
});

describe('GuardRegistry', () => {
    test('returns the first failure', () => {
        const guards = new GuardRegistry();
        guards.register('ADMINISTRATOR', () => ({ ok: true }));
        guards.register('ADMINISTRATOR', AdministratorGuard);
        guards.register('ADMINISTRATOR', () => ({ ok: false, code: ErrorCode.CUSTODIAN_REQUIRED, violation: 'never reached' }));

        const result = guards.evaluate('ADMINISTRATOR', { caller: 'alice', administrators });
        expect(result.ok).toBe(false);
        expect(result.ok ? undefined : result.code).toBe(ErrorCode.ADMINISTRATOR_REQUIRED);
    });

    test('an empty phase fails closed', () => {
        const guards = new GuardRegistry();
        expect(() => guards.evaluate('CUSTODIAN', { caller: 'root', owner: 'root', administrators }))
            .toThrow('GuardRegistry: no guard registered for CUSTODIAN');
    });

    test('enforce throws AuthorizationError with the caller', () => {
        const guards = new GuardRegistry();
        guards.register('ADMINISTRATOR', AdministratorGuard);
        try {
            guards.enforce('ADMINISTRATOR', { caller: 'mallory', administrators });
            throw new Error('expected rejection');
        } catch (e) {
            expect(e).toBeInstanceOf(AuthorizationError);
            if (e instanceof AuthorizationError) {
                expect(e.metadata).toEqual({ caller: 'mallory' });
                expect(e.message).toBe('[Registry:ADMINISTRATOR_REQUIRED] Authority Violation: mallory is not an administrator');
            }
        }
    });
});

describe('Input Invariants', () => {
    test('check describes the rejection', () => {
        expect(check(INV_IN_01, { keys: ['a'], values: ['1'] })).toBeNull();
        expect(check(INV_IN_01, { keys: ['a'], values: [] })).toEqual({
            code: ErrorCode.LENGTH_MISMATCH,
            invariantId: 'INV-IN-01',
            boundary: 'Input Shape',
            permissible: 'Supply exactly one value per key.',
            message: 'Input Shape: Key and value lists must have equal length'
        });
    });

    test('enforce throws ValidationError naming the subject', () => {
        expect(() => enforce(INV_ID_01, { identity: '' }, 'owner'))
            .toThrow('[Registry:NULL_IDENTITY] Identity Integrity: Identity must not be the null identity (owner)');
        expect(() => enforce(INV_ID_01, { identity: '' })).toThrow(ValidationError);
        expect(() => enforce(INV_RES_01, { count: 3, limit: 4 })).not.toThrow();
        expect(() => enforce(INV_RES_01, { count: 4, limit: 4 })).toThrow(ValidationError);
    });
});
