import { PersonRegistry } from '../../server/persons';
import { parsePersonCreate, parsePersonPatch } from '../../server/persons/schemas';

type AddPersonOptions = {
  name: string;
  age: string;
  email: string;
};

type UpdatePersonOptions = {
  name?: string;
  age?: string;
  email?: string;
};

export class CliInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliInputError';
  }
}

export const parseInteger = (value: string, label: string) => {
  if (!/^-?\d+$/.test(value.trim())) {
    throw new CliInputError(`${label} must be an integer, got "${value}"`);
  }
  const parsed = Number.parseInt(value, 10);
  if (!Number.isSafeInteger(parsed)) {
    throw new CliInputError(`${label} is out of range, got "${value}"`);
  }
  return parsed;
};

const print = (value: unknown) => {
  console.log(JSON.stringify(value, null, 2));
};

export const listPersonsHandler = async (registry: PersonRegistry) => {
  print(await registry.listAll());
};

export const getPersonHandler = async (registry: PersonRegistry, id: string) => {
  print(await registry.get(parseInteger(id, 'id')));
};

export const addPersonHandler = async (registry: PersonRegistry, options: AddPersonOptions) => {
  const fields = parsePersonCreate(
    { name: options.name, age: parseInteger(options.age, 'age'), email: options.email },
    'options'
  );
  print(await registry.create(fields));
};

export const updatePersonHandler = async (registry: PersonRegistry, id: string, options: UpdatePersonOptions) => {
  const personId = parseInteger(id, 'id');
  const patch = parsePersonPatch(
    {
      name: options.name,
      age: options.age === undefined ? undefined : parseInteger(options.age, 'age'),
      email: options.email
    },
    'options'
  );
  print(await registry.update(personId, patch));
};

export const removePersonHandler = async (registry: PersonRegistry, id: string) => {
  const personId = parseInteger(id, 'id');
  await registry.delete(personId);
  console.log(`Person ${personId} deleted.`);
};

export const healthHandler = async (registry: PersonRegistry) => {
  const report = await registry.healthCheck();
  print(report);
  return report.status === 'healthy';
};
