export const SEARCH_API_VERSION = '2023-10-01-Preview';

export interface SearchConfig {
  endpoint?: string;
  apiKey?: string;
  indexName?: string;
  apiVersion: string;
  debug: boolean;
}

// Blank values are treated the same as unset ones.
const read = (value: string | undefined): string | undefined => (value ? value : undefined);

/**
 * Builds the run configuration from an environment snapshot.
 * @param indexOverride Index name given on the command line; wins over AZURE_SEARCH_INDEX.
 */
export function loadConfig(env: NodeJS.ProcessEnv, indexOverride?: string): SearchConfig {
  const debug = env.DEBUG;

  return Object.freeze({
    endpoint: read(env.AZURE_SEARCH_ENDPOINT),
    apiKey: read(env.AZURE_SEARCH_API_KEY),
    indexName: read(indexOverride) ?? read(env.AZURE_SEARCH_INDEX),
    apiVersion: SEARCH_API_VERSION,
    debug: Boolean(debug) && debug !== '0',
  });
}

/**
 * Lists the environment variable names whose values are missing, in declaration order.
 */
export function missingConfig(config: SearchConfig): string[] {
  const required: [string, string | undefined][] = [
    ['AZURE_SEARCH_ENDPOINT', config.endpoint],
    ['AZURE_SEARCH_API_KEY', config.apiKey],
    ['AZURE_SEARCH_INDEX', config.indexName],
  ];
  return required.filter(([, value]) => !value).map(([name]) => name);
}
