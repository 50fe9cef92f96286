import { BindParams, Database, ParamsObject } from 'sql.js';
import { Person, PersonFields } from '../../types';
import { PersonsDb, openPersonsDb, persistPersonsDb } from '../database';
import { DuplicateEmailError } from './errors';
import { PersonStore } from './person-store';

const isUniqueViolation = (error: unknown): boolean =>
    error instanceof Error && error.message.startsWith('UNIQUE constraint failed');

const toPerson = (row: ParamsObject): Person => {
    const { id, name, age, email } = row;
    if (typeof id !== 'number' || typeof name !== 'string' || typeof age !== 'number' || typeof email !== 'string') {
        throw new Error(`Malformed persons row: ${JSON.stringify(row)}`);
    }
    return { id, name, age, email };
};

/**
 * sql.js backed store. Calls are synchronous, so a statement never
 * interleaves with another request's statement. Each committed change is
 * written back to the database file.
 */
export class SqlitePersonStore implements PersonStore {
    readonly kind = 'sqlite';

    private handle: PersonsDb;
    private inTransaction = false;
    private closed = false;

    constructor(handle: PersonsDb) {
        this.handle = handle;
    }

    static async open(filePath?: string): Promise<SqlitePersonStore> {
        return new SqlitePersonStore(await openPersonsDb(filePath));
    }

    private get db(): Database {
        if (this.closed) {
            throw new Error('Database is closed');
        }
        return this.handle.db;
    }

    list(): Person[] {
        return this.all(`
            SELECT id, name, age, email
            FROM persons
            ORDER BY id ASC
        `).map(toPerson);
    }

    get(id: number): Person | undefined {
        const [row] = this.all('SELECT id, name, age, email FROM persons WHERE id = ?', [id]);
        return row ? toPerson(row) : undefined;
    }

    findByEmail(email: string): Person | undefined {
        const [row] = this.all('SELECT id, name, age, email FROM persons WHERE email = ?', [email]);
        return row ? toPerson(row) : undefined;
    }

    insert(fields: PersonFields): Person {
        try {
            this.db.run('INSERT INTO persons (name, age, email) VALUES (?, ?, ?)', [
                fields.name,
                fields.age,
                fields.email
            ]);
        } catch (error) {
            if (isUniqueViolation(error)) {
                throw new DuplicateEmailError(fields.email);
            }
            throw error;
        }
        const [row] = this.all('SELECT last_insert_rowid() AS id');
        const id = row?.id;
        if (typeof id !== 'number') {
            throw new Error('Insert did not report a row id');
        }
        this.afterWrite();
        return { id, ...fields };
    }

    update(person: Person): void {
        try {
            this.db.run('UPDATE persons SET name = ?, age = ?, email = ? WHERE id = ?', [
                person.name,
                person.age,
                person.email,
                person.id
            ]);
        } catch (error) {
            if (isUniqueViolation(error)) {
                throw new DuplicateEmailError(person.email);
            }
            throw error;
        }
        this.afterWrite();
    }

    remove(id: number): boolean {
        this.db.run('DELETE FROM persons WHERE id = ?', [id]);
        const removed = this.db.getRowsModified() > 0;
        this.afterWrite();
        return removed;
    }

    transaction<T>(work: () => T): T {
        if (this.inTransaction) {
            return work();
        }
        const result = this.runInTransaction(work);
        persistPersonsDb(this.handle);
        return result;
    }

    ping(): void {
        this.all('SELECT 1 AS ok');
    }

    close(): void {
        if (!this.closed) {
            this.closed = true;
            this.handle.db.close();
        }
    }

    private runInTransaction<T>(work: () => T): T {
        const db = this.db;
        db.run('BEGIN');
        this.inTransaction = true;
        try {
            const result = work();
            db.run('COMMIT');
            return result;
        } catch (error) {
            db.run('ROLLBACK');
            throw error;
        } finally {
            this.inTransaction = false;
        }
    }

    // Writes outside a transaction are their own commit.
    private afterWrite(): void {
        if (!this.inTransaction) {
            persistPersonsDb(this.handle);
        }
    }

    private all(sql: string, params: BindParams = []): ParamsObject[] {
        const stmt = this.db.prepare(sql);
        try {
            stmt.bind(params);
            const rows: ParamsObject[] = [];
            while (stmt.step()) {
                rows.push(stmt.getAsObject());
            }
            return rows;
        } finally {
            stmt.free();
        }
    }
}
