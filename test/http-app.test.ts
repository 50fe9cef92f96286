import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import axios, { AxiosInstance } from 'axios';
import { Server, createServer } from 'http';
import { API_ROUTES, createApp, ROOT_MESSAGE } from '../src/server/http-app';
import { MemoryPersonStore, PersonRegistry, PersonStore, SqlitePersonStore } from '../src/server/persons';

const startApp = async (store: PersonStore) => {
  const server = createServer(createApp(new PersonRegistry(store)));
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (!address || typeof address === 'string') {
    throw new Error('Test server did not bind a TCP port');
  }

  const api = axios.create({
    baseURL: `http://127.0.0.1:${address.port}`,
    validateStatus: () => true
  });
  return { server, api };
};

const stopServer = (server: Server) =>
  new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));

describe('Persons HTTP API', () => {
  let store: MemoryPersonStore;
  let server: Server;
  let api: AxiosInstance;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});

    store = new MemoryPersonStore();
    ({ server, api } = await startApp(store));
  });

  afterEach(async () => {
    await stopServer(server);
    store.close();
    vi.restoreAllMocks();
  });

  const createPerson = (name: string, age: number, email: string) => api.post('/persons', { name, age, email });

  it('should answer the root endpoint', async () => {
    const response = await api.get('/');

    expect(response.status).toBe(200);
    expect(response.data).toEqual({ message: ROOT_MESSAGE });
  });

  it('should list the routes under /docs', async () => {
    const response = await api.get('/docs');

    expect(response.status).toBe(200);
    expect(response.data.routes).toEqual(API_ROUTES);
    expect(response.data.routes).toContainEqual({ method: 'PUT', path: '/persons/:id', description: 'Overwrite only the fields present in the body' });
  });

  it('should report health', async () => {
    const response = await api.get('/health');

    expect(response.status).toBe(200);
    expect(response.data).toEqual({ status: 'healthy', api: 'operational', database: 'connected' });
  });

  it('should report 503 when the store is gone', async () => {
    store.close();

    const response = await api.get('/health');

    expect(response.status).toBe(503);
    expect(response.data).toEqual({
      status: 'unhealthy',
      api: 'operational',
      database: 'disconnected',
      error: 'Memory store is closed'
    });
  });

  it('should create a person with status 201', async () => {
    const response = await createPerson('John Doe', 30, 'john@example.com');

    expect(response.status).toBe(201);
    expect(response.data).toEqual({ id: 1, name: 'John Doe', age: 30, email: 'john@example.com' });
  });

  it('should reject a duplicate email with 400', async () => {
    await createPerson('John Doe', 30, 'john@example.com');

    const response = await createPerson('Jane Doe', 28, 'john@example.com');

    expect(response.status).toBe(400);
    expect(response.data).toEqual({ detail: 'Email already registered' });
  });

  it('should reject missing fields with 422', async () => {
    const response = await api.post('/persons', { name: 'John Doe' });

    expect(response.status).toBe(422);
    expect(response.data.detail.map((issue: { loc: string[] }) => issue.loc)).toEqual([
      ['body', 'age'],
      ['body', 'email']
    ]);
  });

  it('should reject a non-integer age with 422', async () => {
    const response = await api.post('/persons', { name: 'John Doe', age: 'thirty', email: 'john@example.com' });

    expect(response.status).toBe(422);
    expect(response.data.detail[0].loc).toEqual(['body', 'age']);
  });

  it('should reject malformed JSON with 422', async () => {
    const response = await api.post('/persons', '{"name": "John', {
      headers: { 'Content-Type': 'application/json' },
      transformRequest: [(data: unknown) => data]
    });

    expect(response.status).toBe(422);
    expect(response.data).toEqual({ detail: [{ loc: ['body'], msg: 'Invalid JSON body' }] });
  });

  it('should reject integers beyond the safe range with 422', async () => {
    const age = await api.post('/persons', { name: 'Big', age: 2 ** 60, email: 'big@example.com' });
    expect(age.status).toBe(422);
    expect(age.data).toEqual({ detail: [{ loc: ['body', 'age'], msg: 'age is out of range' }] });

    const id = await api.get('/persons/9007199254740993');
    expect(id.status).toBe(422);
    expect(id.data).toEqual({ detail: [{ loc: ['path', 'id'], msg: 'id is out of range' }] });
  });

  it('should list persons by ascending id', async () => {
    await createPerson('Alice', 25, 'alice@example.com');
    await createPerson('Bob', 35, 'bob@example.com');
    await createPerson('Charlie', 45, 'charlie@example.com');
    await api.delete('/persons/2');

    const response = await api.get('/persons');

    expect(response.status).toBe(200);
    expect(response.data).toEqual([
      { id: 1, name: 'Alice', age: 25, email: 'alice@example.com' },
      { id: 3, name: 'Charlie', age: 45, email: 'charlie@example.com' }
    ]);
  });

  it('should return 404 for an unknown id and 422 for a non-integer id', async () => {
    const missing = await api.get('/persons/999');
    expect(missing.status).toBe(404);
    expect(missing.data).toEqual({ detail: 'Person not found' });

    const invalid = await api.get('/persons/abc');
    expect(invalid.status).toBe(422);
    expect(invalid.data).toEqual({ detail: [{ loc: ['path', 'id'], msg: 'id must be an integer' }] });
  });

  it('should update only the fields in the body', async () => {
    await createPerson('Alice', 25, 'alice@example.com');

    const response = await api.put('/persons/1', { age: 26 });

    expect(response.status).toBe(200);
    expect(response.data).toEqual({ id: 1, name: 'Alice', age: 26, email: 'alice@example.com' });
  });

  it('should reject null for a field with 422 and leave the record alone', async () => {
    await createPerson('Alice', 25, 'alice@example.com');

    const response = await api.put('/persons/1', { name: null, age: 40 });

    expect(response.status).toBe(422);
    expect(response.data.detail[0].loc).toEqual(['body', 'name']);
    expect((await api.get('/persons/1')).data).toEqual({ id: 1, name: 'Alice', age: 25, email: 'alice@example.com' });
  });

  it('should refuse to take another person\'s email on update', async () => {
    await createPerson('Alice', 25, 'alice@example.com');
    await createPerson('Bob', 35, 'bob@example.com');

    const response = await api.put('/persons/2', { name: 'Robert', email: 'alice@example.com' });

    expect(response.status).toBe(400);
    expect(response.data).toEqual({ detail: 'Email already registered' });
    expect((await api.get('/persons/2')).data).toEqual({ id: 2, name: 'Bob', age: 35, email: 'bob@example.com' });
  });

  it('should return 404 when updating an unknown id', async () => {
    const response = await api.put('/persons/5', { age: 1 });

    expect(response.status).toBe(404);
    expect(response.data).toEqual({ detail: 'Person not found' });
  });

  it('should delete with 204 and then report 404', async () => {
    await createPerson('Alice', 25, 'alice@example.com');

    const deleted = await api.delete('/persons/1');
    expect(deleted.status).toBe(204);
    expect(deleted.data).toBe('');

    expect((await api.get('/persons/1')).status).toBe(404);
    expect((await api.delete('/persons/1')).status).toBe(404);
  });

  it('should map a failing store to 500', async () => {
    store.close();

    const response = await api.get('/persons');

    expect(response.status).toBe(500);
    expect(response.data).toEqual({ detail: 'Internal server error' });
  });
});

describe('Persons HTTP API on the sqlite store', () => {
  let store: SqlitePersonStore;
  let server: Server;
  let api: AxiosInstance;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});

    store = await SqlitePersonStore.open(':memory:');
    ({ server, api } = await startApp(store));
  });

  afterEach(async () => {
    await stopServer(server);
    store.close();
    vi.restoreAllMocks();
  });

  it('should serve create, read and a duplicate rejection', async () => {
    expect((await api.post('/persons', { name: 'Alice', age: 25, email: 'alice@example.com' })).status).toBe(201);

    const duplicate = await api.post('/persons', { name: 'Eve', age: 20, email: 'alice@example.com' });
    expect(duplicate.status).toBe(400);

    const list = await api.get('/persons');
    expect(list.data).toEqual([{ id: 1, name: 'Alice', age: 25, email: 'alice@example.com' }]);
  });

  it('should map a closed database to 500 and report 503 on /health', async () => {
    store.close();

    const persons = await api.get('/persons');
    expect(persons.status).toBe(500);
    expect(persons.data).toEqual({ detail: 'Internal server error' });

    const health = await api.get('/health');
    expect(health.status).toBe(503);
    expect(health.data).toEqual({
      status: 'unhealthy',
      api: 'operational',
      database: 'disconnected',
      error: 'Database is closed'
    });
  });
});
