import { z } from 'zod';
import { PersonFields, PersonPatch } from '../../types';

export const personCreateSchema = z.object({
    name: z.string().min(1, 'name must not be empty'),
    age: z.number().int('age must be an integer').safe('age is out of range'),
    email: z.string().min(1, 'email must not be empty')
});

// Absent keys stay absent; null is a validation error, not "no change".
export const personPatchSchema = personCreateSchema.partial();

const personIdSchema = z
    .string()
    .regex(/^-?\d+$/, 'id must be an integer')
    .transform((value, ctx) => {
        const id = Number.parseInt(value, 10);
        if (!Number.isSafeInteger(id)) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'id is out of range' });
            return z.NEVER;
        }
        return id;
    });

export type ValidationIssue = {
    loc: Array<string | number>;
    msg: string;
};

export class RequestValidationError extends Error {
    constructor(readonly issues: ValidationIssue[]) {
        super(issues.map((issue) => `${issue.loc.join('.')}: ${issue.msg}`).join('; '));
        this.name = 'RequestValidationError';
    }
}

const parseWith = <S extends z.ZodTypeAny>(schema: S, input: unknown, location: string): z.output<S> => {
    const result = schema.safeParse(input);
    if (!result.success) {
        throw new RequestValidationError(
            result.error.issues.map((issue) => ({ loc: [location, ...issue.path], msg: issue.message }))
        );
    }
    return result.data;
};

export const parsePersonCreate = (body: unknown, location = 'body'): PersonFields =>
    parseWith(personCreateSchema, body, location);

export const parsePersonPatch = (body: unknown, location = 'body'): PersonPatch =>
    parseWith(personPatchSchema, body, location);

export const parsePersonId = (raw: string): number => {
    const { id } = parseWith(z.object({ id: personIdSchema }), { id: raw }, 'path');
    return id;
};
