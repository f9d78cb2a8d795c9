import type { Identity } from '../L0/Ontology.js';
import { enforce, INV_ID_01, INV_ID_02 } from '../L0/Invariants.js';

// Hard cap; a configured maximum can only lower it
export const MAX_ADMINISTRATORS = 10;

/**
 * The privileged identities of a registry. Fixed at construction: there is
 * no add or remove path.
 */
export class AdministratorRegistry {
    private readonly administrators: readonly Identity[];

    constructor(identities: readonly Identity[], maxAdministrators: number = MAX_ADMINISTRATORS) {
        enforce(INV_ID_02, { administrators: identities, max: Math.min(maxAdministrators, MAX_ADMINISTRATORS) }, `got ${identities.length}`);
        for (const identity of identities) {
            enforce(INV_ID_01, { identity }, 'administrator');
        }
        this.administrators = Object.freeze([...identities]);
    }

    // Linear scan; the set never exceeds a handful of entries
    public isAdministrator(identity: Identity): boolean {
        return this.administrators.includes(identity);
    }

    public list(): Identity[] {
        return [...this.administrators];
    }

    public get size(): number {
        return this.administrators.length;
    }
}
