import { Command } from 'commander';

export interface RemoveDocsOptions {
  index?: string;
}

/**
 * The remove-docs command line: a single optional index override, everything else is prompted.
 */
export function createProgram(run: (options: RemoveDocsOptions) => Promise<void>): Command {
  return new Command()
    .name('remove-docs')
    .description('Search and delete documents from an Azure Search index')
    .option('-i, --index <name>', 'Index name to use (overrides AZURE_SEARCH_INDEX env var)')
    .action(async (options: RemoveDocsOptions) => {
      await run(options);
    });
}
