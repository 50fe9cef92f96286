import { ServerConfig } from '../config';
import { MemoryPersonStore } from './memory-store';
import { PersonStore } from './person-store';
import { SqlitePersonStore } from './sqlite-store';

export { PersonRegistry } from './person-registry';
export { PersonsApiService } from './persons-api';
export type { PersonStore } from './person-store';
export { MemoryPersonStore, SqlitePersonStore };
export * from './errors';

export const openPersonStore = async (config: Pick<ServerConfig, 'store' | 'dbPath'>): Promise<PersonStore> => {
    if (config.store === 'memory') {
        return new MemoryPersonStore();
    }
    return SqlitePersonStore.open(config.dbPath);
};
