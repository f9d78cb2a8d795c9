import { produce, enableMapSet } from 'immer';
import type { Draft } from 'immer';
import type { RegistryState } from '../L0/Ontology.js';
import type { Journal, JournalRecord } from '../L5/Journal.js';

enableMapSet();

/**
 * Single owner of the registry state. Every mutation goes through
 * `transact`, which either commits the whole recipe or nothing.
 */
export class StateModel {
    private currentState: RegistryState = {
        assets: [],
        ledgers: [],
        version: 0
    };

    private journalSuspended = false;

    constructor(private journal: Journal) { }

    public get current(): RegistryState {
        return this.currentState;
    }

    public get version(): number {
        return this.currentState.version;
    }

    /**
     * Applies `recipe` to a draft of the current state. The journal entry is
     * appended before the new state is swapped in, so a failing recipe or a
     * failing journal write leaves the registry untouched.
     */
    public transact(record: JournalRecord, recipe: (draft: Draft<RegistryState>) => void): void {
        const next = produce(this.currentState, draft => {
            recipe(draft);
            draft.version++;
        });

        if (!this.journalSuspended) {
            this.journal.append(record);
        }

        this.currentState = next;
    }

    /**
     * Runs `fn` with journaling switched off. Used while replaying entries
     * that are already in the journal.
     */
    public withoutJournal<T>(fn: () => T): T {
        const previous = this.journalSuspended;
        this.journalSuspended = true;
        try {
            return fn();
        } finally {
            this.journalSuspended = previous;
        }
    }
}
