/**
 * Persons API Service
 * Provides REST endpoints for the person registry
 */

import express from 'express';
import { PersonRegistry } from './person-registry';
import { parsePersonCreate, parsePersonId, parsePersonPatch } from './schemas';

export class PersonsApiService {
    private registry: PersonRegistry;
    private router: express.Router;

    constructor(registry: PersonRegistry) {
        this.registry = registry;
        this.router = express.Router();
        this.setupRoutes();
    }

    private setupRoutes() {
        // GET /persons - List all persons, ascending by id
        this.router.get('/persons', async (_req, res, next) => {
            try {
                res.json(await this.registry.listAll());
            } catch (error) {
                next(error);
            }
        });

        // GET /persons/:id - Get specific person
        this.router.get('/persons/:id', async (req, res, next) => {
            try {
                const person = await this.registry.get(parsePersonId(req.params.id));
                res.json(person);
            } catch (error) {
                next(error);
            }
        });

        // POST /persons - Create new person
        this.router.post('/persons', async (req, res, next) => {
            try {
                const person = await this.registry.create(parsePersonCreate(req.body));
                console.log(`[Persons] Created person ${person.id}`);
                res.status(201).json(person);
            } catch (error) {
                next(error);
            }
        });

        // PUT /persons/:id - Update only the fields present in the body
        this.router.put('/persons/:id', async (req, res, next) => {
            try {
                const id = parsePersonId(req.params.id);
                const person = await this.registry.update(id, parsePersonPatch(req.body));
                res.json(person);
            } catch (error) {
                next(error);
            }
        });

        // DELETE /persons/:id - Delete person
        this.router.delete('/persons/:id', async (req, res, next) => {
            try {
                const id = parsePersonId(req.params.id);
                await this.registry.delete(id);
                console.log(`[Persons] Deleted person ${id}`);
                res.status(204).end();
            } catch (error) {
                next(error);
            }
        });
    }

    getRouter(): express.Router {
        return this.router;
    }
}
