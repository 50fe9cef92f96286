import { Person, PersonFields } from '../../types';
import { DuplicateEmailError } from './errors';
import { PersonStore } from './person-store';

/**
 * Process-local store. State lives as long as the instance does.
 */
export class MemoryPersonStore implements PersonStore {
    readonly kind = 'memory';

    private records = new Map<number, Person>();
    private nextId = 1;
    private closed = false;

    list(): Person[] {
        this.assertOpen();
        return Array.from(this.records.values())
            .sort((a, b) => a.id - b.id)
            .map((person) => ({ ...person }));
    }

    get(id: number): Person | undefined {
        this.assertOpen();
        const person = this.records.get(id);
        return person ? { ...person } : undefined;
    }

    findByEmail(email: string): Person | undefined {
        this.assertOpen();
        for (const person of this.records.values()) {
            if (person.email === email) {
                return { ...person };
            }
        }
        return undefined;
    }

    insert(fields: PersonFields): Person {
        this.assertOpen();
        this.assertEmailFree(fields.email);

        const person: Person = { id: this.nextId, name: fields.name, age: fields.age, email: fields.email };
        this.records.set(person.id, person);
        this.nextId += 1;
        return { ...person };
    }

    update(person: Person): void {
        this.assertOpen();
        if (!this.records.has(person.id)) {
            return;
        }
        this.assertEmailFree(person.email, person.id);
        this.records.set(person.id, { ...person });
    }

    remove(id: number): boolean {
        this.assertOpen();
        return this.records.delete(id);
    }

    transaction<T>(work: () => T): T {
        this.assertOpen();
        const snapshot = new Map(this.records);
        const snapshotNextId = this.nextId;
        try {
            return work();
        } catch (error) {
            // Stored records are replaced on write, never mutated, so a shallow copy is enough.
            this.records = snapshot;
            this.nextId = snapshotNextId;
            throw error;
        }
    }

    ping(): void {
        this.assertOpen();
    }

    close(): void {
        this.closed = true;
    }

    private assertOpen(): void {
        if (this.closed) {
            throw new Error('Memory store is closed');
        }
    }

    // Mirrors the UNIQUE constraint of the sqlite schema.
    private assertEmailFree(email: string, ownerId?: number): void {
        for (const person of this.records.values()) {
            if (person.email === email && person.id !== ownerId) {
                throw new DuplicateEmailError(email);
            }
        }
    }
}
