import { createServer } from 'http';
import { loadServerConfig } from './config';
import { createApp } from './http-app';
import { PersonRegistry, openPersonStore } from './persons';

const startServer = async () => {
    const config = await loadServerConfig();

    const store = await openPersonStore(config);
    console.log(`[Persons] Using ${store.kind} store${store.kind === 'sqlite' ? ` at ${config.dbPath}` : ''}`);

    const registry = new PersonRegistry(store);
    const server = createServer(createApp(registry));

    const shutdown = (signal: string) => {
        console.log(`[Persons] ${signal} received, shutting down...`);
        server.close((error) => {
            store.close();
            if (error) {
                console.error('[Persons] Error while closing HTTP server:', error);
                process.exit(1);
            }
            process.exit(0);
        });
    };

    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));

    server.listen(config.port, config.host, () => {
        console.log(`[Persons] API listening on ${config.host}:${config.port}`);
    });
};

startServer().catch((err) => {
    console.error('Failed to start server:', err);
    process.exit(1);
});
