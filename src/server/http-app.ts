import express from 'express';
import bodyParser from 'body-parser';
import { PersonRegistry, PersonsApiService, isPersonRegistryError } from './persons';
import { RequestValidationError } from './persons/schemas';

export const ROOT_MESSAGE = 'Person API - Use /docs for API documentation';

export const API_ROUTES = [
  { method: 'GET', path: '/', description: 'Service banner' },
  { method: 'GET', path: '/docs', description: 'This route listing' },
  { method: 'GET', path: '/health', description: 'Backing store status; 503 when unreachable' },
  { method: 'GET', path: '/persons', description: 'All persons, ascending by id' },
  { method: 'GET', path: '/persons/:id', description: 'One person; 404 if absent' },
  { method: 'POST', path: '/persons', description: 'Create from { name, age, email }; 400 on a taken email' },
  { method: 'PUT', path: '/persons/:id', description: 'Overwrite only the fields present in the body' },
  { method: 'DELETE', path: '/persons/:id', description: 'Delete; 204 on success' }
] as const;

const isJsonParseFailure = (error: unknown): boolean =>
  error instanceof SyntaxError && 'type' in error && error.type === 'entity.parse.failed';

const logRequests: express.RequestHandler = (req, res, next) => {
  const startedAt = Date.now();
  res.on('finish', () => {
    console.log(`[HTTP] ${req.method} ${req.originalUrl} -> ${res.statusCode} (${Date.now() - startedAt}ms)`);
  });
  next();
};

const handleErrors = (
  error: unknown,
  _req: express.Request,
  res: express.Response,
  _next: express.NextFunction
): void => {
  if (error instanceof RequestValidationError) {
    res.status(422).json({ detail: error.issues });
    return;
  }
  if (isJsonParseFailure(error)) {
    res.status(422).json({ detail: [{ loc: ['body'], msg: 'Invalid JSON body' }] });
    return;
  }
  if (isPersonRegistryError(error)) {
    switch (error.kind) {
      case 'NotFound':
        res.status(404).json({ detail: 'Person not found' });
        return;
      case 'DuplicateEmail':
        res.status(400).json({ detail: 'Email already registered' });
        return;
      case 'BackingStoreUnavailable':
        break;
    }
  }
  console.error('[HTTP] Request failed:', error);
  res.status(500).json({ detail: 'Internal server error' });
};

export const createApp = (registry: PersonRegistry): express.Express => {
  const app = express();

  app.use(logRequests);
  app.use(bodyParser.json());

  app.get('/', (_req, res) => {
    res.json({ message: ROOT_MESSAGE });
  });

  app.get('/docs', (_req, res) => {
    res.json({ title: 'Person API', version: '1.0.0', routes: API_ROUTES });
  });

  app.get('/health', async (_req, res, next) => {
    try {
      const report = await registry.healthCheck();
      res.status(report.status === 'healthy' ? 200 : 503).json(report);
    } catch (error) {
      next(error);
    }
  });

  app.use(new PersonsApiService(registry).getRouter());

  app.use(handleErrors);

  return app;
};
