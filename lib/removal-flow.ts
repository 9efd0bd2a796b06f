import type { LogFn } from './debug.js';
import type { SearchClient } from './search-client.js';
import { selectIds, splitList } from './utils.js';

const INTERACTIVE_TOP = 100;

export interface Prompter {
  ask(message: string): Promise<string>;
}

export type RemovalOutcome = 'deleted' | 'aborted' | 'no-results' | 'nothing-selected' | 'failed';

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function formatResponseBody(body: string): string {
  try {
    return `Response: ${JSON.stringify(JSON.parse(body), null, 2)}`;
  } catch {
    return `Response (non-json): ${body}`;
  }
}

async function pickFromSearch(
  client: SearchClient,
  prompter: Prompter,
  log: LogFn,
): Promise<string[] | RemovalOutcome> {
  const searchText = (await prompter.ask("Enter search text (leave empty for '*'):")).trim();
  const filter = (
    await prompter.ask('Enter filter expression (optional, e.g. \'category eq "books"\'):')
  ).trim();

  const found = await client.searchDocIds({
    searchText: searchText || undefined,
    filter: filter || undefined,
    top: INTERACTIVE_TOP,
  });
  if (!found.ok) {
    log(`Error: ${found.error.message}`);
    return 'failed';
  }

  const ids = found.value;
  if (ids.length === 0) {
    log('No documents found for that query/filter.');
    return 'no-results';
  }

  log(`Found ${ids.length} documents. Showing up to ${INTERACTIVE_TOP} ids:`);
  ids.forEach((id, i) => log(`${i + 1}. ${id}`));

  const selection = await prompter.ask(
    "Enter comma-separated numbers to select ids to delete, or 'all' to delete all listed:",
  );
  return selectIds(ids, selection);
}

async function removeSelected(
  client: SearchClient,
  prompter: Prompter,
  log: LogFn,
): Promise<RemovalOutcome> {
  const direct = (
    await prompter.ask('Enter comma-separated doc IDs to delete, or press Enter to search:')
  ).trim();

  const picked = direct ? splitList(direct) : await pickFromSearch(client, prompter, log);
  if (typeof picked === 'string') return picked;

  if (picked.length === 0) {
    log('No document ids selected, exiting.');
    return 'nothing-selected';
  }

  log('About to delete the following documents:');
  for (const id of picked) log(` - ${id}`);

  const answer = (await prompter.ask('Proceed? (y/N):')).trim().toLowerCase();
  if (answer !== 'y') {
    log('Aborted by user.');
    return 'aborted';
  }

  const deleted = await client.deleteDocuments(picked);
  if (!deleted.ok) {
    log(`Error: ${deleted.error.message}`);
    return 'failed';
  }

  log(`Status: ${deleted.value.status}`);
  log(formatResponseBody(deleted.value.body));
  return 'deleted';
}

/**
 * Walks the operator through picking documents and deleting them after confirmation.
 * Never rejects: any failure is printed as a single "Error:" line.
 */
export async function runRemoval(
  client: SearchClient,
  prompter: Prompter,
  log: LogFn = console.log,
): Promise<RemovalOutcome> {
  try {
    return await removeSelected(client, prompter, log);
  } catch (error) {
    log(`Error: ${errorMessage(error)}`);
    return 'failed';
  }
}
