/**
 * Database access for the persons service.
 *
 * SQLite runs in-process through sql.js (WASM). The database lives in memory
 * and is written back to its file after every committed change.
 *
 * One table, `persons`:
 *    - id: INTEGER PRIMARY KEY AUTOINCREMENT (never reused after a delete)
 *    - name, age: plain columns
 *    - email: UNIQUE (sqlite backs the constraint with an index)
 */

import initSqlJs, { Database, SqlJsStatic } from 'sql.js';
import path from 'path';
import fs from 'fs';

// ─── Paths ───────────────────────────────────────────────────────────────────

export const IN_MEMORY_DB_PATH = ':memory:';

export const DEFAULT_PERSONS_DB_PATH = path.join(process.cwd(), 'data', 'persons.db');

function ensureParentDir(filePath: string): void {
    const dir = path.dirname(filePath);
    if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
    }
}

// ─── Connections ─────────────────────────────────────────────────────────────

// The WASM module is loaded once per process; databases are not shared.
let sqlJsModule: Promise<SqlJsStatic> | null = null;

function loadSqlJs(): Promise<SqlJsStatic> {
    if (!sqlJsModule) {
        sqlJsModule = initSqlJs();
    }
    return sqlJsModule;
}

export type PersonsDb = {
    db: Database;
    /** Where `persist` writes to; null for an in-memory database. */
    filePath: string | null;
};

/**
 * Open (or create) the persons database and make sure its schema exists.
 * The caller owns the returned handle and must close it.
 */
export async function openPersonsDb(filePath: string = DEFAULT_PERSONS_DB_PATH): Promise<PersonsDb> {
    const SQL = await loadSqlJs();

    if (filePath === IN_MEMORY_DB_PATH) {
        const db = new SQL.Database();
        initPersonsSchema(db);
        return { db, filePath: null };
    }

    ensureParentDir(filePath);
    const db = fs.existsSync(filePath) ? new SQL.Database(fs.readFileSync(filePath)) : new SQL.Database();
    initPersonsSchema(db);
    const handle = { db, filePath };
    persistPersonsDb(handle);
    return handle;
}

/**
 * Write the whole database image back to its file. Must not be called
 * while a transaction is open.
 */
export function persistPersonsDb(handle: PersonsDb): void {
    if (handle.filePath) {
        fs.writeFileSync(handle.filePath, handle.db.export());
    }
}

// ─── Schema ──────────────────────────────────────────────────────────────────

export function initPersonsSchema(db: Database): void {
    db.run(`
        CREATE TABLE IF NOT EXISTS persons (
            id INTEGER PRIMARY KEY AUTOINCREMENT,
            name TEXT NOT NULL,
            age INTEGER NOT NULL,
            email TEXT NOT NULL UNIQUE
        );
    `);
}
