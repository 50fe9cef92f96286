#!/usr/bin/env node
import { Command } from 'commander';
import { loadServerConfig } from '../server/config';
import { PersonRegistry, SqlitePersonStore } from '../server/persons';
import {
  addPersonHandler,
  getPersonHandler,
  healthHandler,
  listPersonsHandler,
  removePersonHandler,
  updatePersonHandler
} from './commands/persons';

// The CLI always works on the sqlite file: a memory store would not outlive the command.
const withRegistry = async (work: (registry: PersonRegistry) => Promise<unknown>) => {
  const config = await loadServerConfig();
  const store = await SqlitePersonStore.open(config.dbPath);
  try {
    await work(new PersonRegistry(store));
  } catch (error) {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = 1;
  } finally {
    store.close();
  }
};

const program = new Command();

program
  .name('persons')
  .description('CLI for managing person records')
  .version('1.0.0');

program
  .command('list')
  .description('List all persons by ascending id')
  .action(() => withRegistry((registry) => listPersonsHandler(registry)));

program
  .command('get <id>')
  .description('Show one person')
  .action((id: string) => withRegistry((registry) => getPersonHandler(registry, id)));

program
  .command('add')
  .description('Create a person')
  .requiredOption('-n, --name <name>', 'Full name')
  .requiredOption('-a, --age <age>', 'Age (any integer)')
  .requiredOption('-e, --email <email>', 'Unique email address')
  .action((options: { name: string; age: string; email: string }) =>
    withRegistry((registry) => addPersonHandler(registry, options))
  );

program
  .command('update <id>')
  .description('Change only the given fields of a person')
  .option('-n, --name <name>', 'New name')
  .option('-a, --age <age>', 'New age')
  .option('-e, --email <email>', 'New email')
  .action((id: string, options: { name?: string; age?: string; email?: string }) =>
    withRegistry((registry) => updatePersonHandler(registry, id, options))
  );

program
  .command('remove <id>')
  .description('Delete a person')
  .action((id: string) => withRegistry((registry) => removePersonHandler(registry, id)));

program
  .command('health')
  .description('Check that the database answers')
  .action(() =>
    withRegistry(async (registry) => {
      if (!(await healthHandler(registry))) {
        process.exitCode = 1;
      }
    })
  );

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
