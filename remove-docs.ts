#!/usr/bin/env node
import 'dotenv/config';
import inquirer from 'inquirer';
import { loadConfig } from './config.js';
import { createProgram, type RemoveDocsOptions } from './lib/cli.js';
import { axiosTransport } from './lib/http-transport.js';
import { runRemoval, type Prompter } from './lib/removal-flow.js';
import { createSearchClient } from './lib/search-client.js';

const inquirerPrompter: Prompter = {
  ask: async (message) => {
    const answers = await inquirer.prompt<{ value: string }>([
      { type: 'input', name: 'value', message },
    ]);
    return answers.value ?? '';
  },
};

async function removeDocs(options: RemoveDocsOptions) {
  const config = loadConfig(process.env, options.index);
  const client = createSearchClient(config, axiosTransport);
  await runRemoval(client, inquirerPrompter);
}

createProgram(removeDocs).parseAsync(process.argv).catch((error) => {
  console.error('❌ An unexpected error occurred during the removal process:', error);
});
