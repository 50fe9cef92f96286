// Person records
export interface Person {
    id: number;
    name: string;
    age: number;
    email: string;
}

export type PersonFields = Omit<Person, 'id'>;

/**
 * Partial update input. A field that is absent is left untouched;
 * a present field overwrites the stored value.
 */
export type PersonPatch = {
    name?: string;
    age?: number;
    email?: string;
};

export type HealthStatus = 'healthy' | 'unhealthy';

export interface HealthReport {
    status: HealthStatus;
    api: 'operational';
    database: 'connected' | 'disconnected';
    error?: string;
}
