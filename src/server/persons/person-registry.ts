/**
 * Person Registry
 * Owns the person collection behind a PersonStore and enforces its rules:
 * registry-assigned ids, unique emails, all-or-nothing partial updates.
 */

import { HealthReport, Person, PersonFields, PersonPatch } from '../../types';
import {
    BackingStoreUnavailableError,
    DuplicateEmailError,
    PersonNotFoundError,
    isPersonRegistryError
} from './errors';
import { PersonStore } from './person-store';

export class PersonRegistry {
    private store: PersonStore;
    // Serializes create/update/delete; reads never wait on it.
    private mutationLock: Promise<void> = Promise.resolve();

    constructor(store: PersonStore) {
        this.store = store;
    }

    async listAll(): Promise<Person[]> {
        return this.guard(() => this.store.list());
    }

    async get(id: number): Promise<Person> {
        const person = this.guard(() => this.store.get(id));
        if (!person) {
            throw new PersonNotFoundError(id);
        }
        return person;
    }

    create(fields: PersonFields): Promise<Person> {
        return this.exclusive(() => {
            if (this.store.findByEmail(fields.email)) {
                throw new DuplicateEmailError(fields.email);
            }
            return this.store.insert({ name: fields.name, age: fields.age, email: fields.email });
        });
    }

    update(id: number, patch: PersonPatch): Promise<Person> {
        return this.exclusive(() => {
            const current = this.store.get(id);
            if (!current) {
                throw new PersonNotFoundError(id);
            }

            // Every check runs before the single write below.
            if (patch.email !== undefined && patch.email !== current.email) {
                const owner = this.store.findByEmail(patch.email);
                if (owner && owner.id !== id) {
                    throw new DuplicateEmailError(patch.email);
                }
            }

            if (patch.name === undefined && patch.age === undefined && patch.email === undefined) {
                return current;
            }

            const updated: Person = {
                id: current.id,
                name: patch.name ?? current.name,
                age: patch.age ?? current.age,
                email: patch.email ?? current.email
            };
            this.store.update(updated);
            return { ...updated };
        });
    }

    delete(id: number): Promise<void> {
        return this.exclusive(() => {
            if (!this.store.remove(id)) {
                throw new PersonNotFoundError(id);
            }
        });
    }

    async healthCheck(): Promise<HealthReport> {
        try {
            this.store.ping();
            return { status: 'healthy', api: 'operational', database: 'connected' };
        } catch (error) {
            console.error(`[Persons] Health check failed for ${this.store.kind} store:`, error);
            return {
                status: 'unhealthy',
                api: 'operational',
                database: 'disconnected',
                error: error instanceof Error ? error.message : String(error)
            };
        }
    }

    /**
     * Queue `work` behind every earlier mutation and run it inside a store
     * transaction, so a failure leaves no partial write behind.
     */
    private exclusive<T>(work: () => T): Promise<T> {
        const result = this.mutationLock.then(() => this.guard(() => this.store.transaction(work)));
        this.mutationLock = result.then(
            () => undefined,
            () => undefined
        );
        return result;
    }

    private guard<T>(work: () => T): T {
        try {
            return work();
        } catch (error) {
            if (isPersonRegistryError(error)) {
                throw error;
            }
            throw new BackingStoreUnavailableError(error);
        }
    }
}
