import { Person, PersonFields } from '../../types';

/**
 * Persistence boundary for the person registry.
 *
 * Implementations own the id counter: `insert` assigns the next id, ids only
 * grow and a removed id is never handed out again. Every method returns copies,
 * never references to stored records.
 */
export interface PersonStore {
    readonly kind: 'memory' | 'sqlite';

    /** All stored persons, ascending by id. */
    list(): Person[];
    get(id: number): Person | undefined;
    findByEmail(email: string): Person | undefined;
    insert(fields: PersonFields): Person;
    /** Overwrites name, age and email of an existing record. */
    update(person: Person): void;
    /** Returns false when nothing was stored under `id`. */
    remove(id: number): boolean;

    /**
     * Runs `work` so that either all of its writes land or none do.
     * If `work` throws, the store is left as it was before the call.
     */
    transaction<T>(work: () => T): T;

    /** Trivial round trip; throws when the store cannot be reached. */
    ping(): void;
    close(): void;
}
