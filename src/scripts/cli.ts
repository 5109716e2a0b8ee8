/**
 * Command-line handling for wikibase-rdf-patch
 *
 * Argument parsing and the run loop live here; rdf-patch-cli.ts only wires
 * them to process.argv, stdin and the real API client.
 */

import { getEnv } from '../config/env.js';
import type { MediaWikiApiClient } from '../clients/MediaWikiApiClient.js';
import { processGraph } from '../services/rdf-patch/RdfPatchService.js';
import { submitEdits } from '../services/rdf-patch/EditSubmitter.js';
import { ConfigurationError } from '../types/errors.js';
import type { Logger } from '../utils/logger.js';
import { RateLimiter } from '../utils/RateLimiter.js';

export const VERSION = '1.0.0';

const WIKIDATA_PAGE_PREFIX = 'https://www.wikidata.org/wiki/';

export const USAGE = `Usage: wikibase-rdf-patch [options]

Apply an RDF patch document to Wikidata.

Options:
  --input <file>          Input RDF file, "-" for stdin (default: -)
  -n, --dry-run           Do not make any changes
  --username <name>       Wikidata username (env: WIKIDATA_USERNAME)
  --password <password>   Wikidata bot password (env: WIKIDATA_PASSWORD)
  --blocklist-url <url>   Wikidata page listing items never to edit (env: WIKIDATA_BLOCKLIST_URL)
  -v, --verbose           Debug logging
  --version               Show version
  --help                  Show this help
`;

export interface CliOptions {
  input: string;
  dryRun: boolean;
  username: string;
  password: string;
  blocklistUrl: string;
  verbose: boolean;
  help: boolean;
  version: boolean;
}

const VALUE_OPTIONS = {
  '--input': 'input',
  '--username': 'username',
  '--password': 'password',
  '--blocklist-url': 'blocklistUrl',
} as const;

type ValueOption = keyof typeof VALUE_OPTIONS;

function isValueOption(name: string): name is ValueOption {
  return Object.prototype.hasOwnProperty.call(VALUE_OPTIONS, name);
}

/**
 * Parse command-line arguments (without the node and script entries)
 * @throws {ConfigurationError} On unknown options or a missing option value
 */
export function parseCliArgs(args: string[], env: NodeJS.ProcessEnv = process.env): CliOptions {
  const options: CliOptions = {
    input: '-',
    dryRun: false,
    username: env.WIKIDATA_USERNAME ?? '',
    password: env.WIKIDATA_PASSWORD ?? '',
    blocklistUrl: env.WIKIDATA_BLOCKLIST_URL ?? '',
    verbose: false,
    help: false,
    version: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const separator = arg.indexOf('=');
    const name = arg.startsWith('--') && separator !== -1 ? arg.slice(0, separator) : arg;

    if (isValueOption(name)) {
      let value: string | undefined;
      if (name !== arg) {
        value = arg.slice(separator + 1);
      } else {
        i++;
        value = args[i];
      }
      if (value === undefined) {
        throw new ConfigurationError(`Option ${name} requires a value`);
      }
      options[VALUE_OPTIONS[name]] = value;
      continue;
    }

    switch (arg) {
      case '-n':
      case '--dry-run':
        options.dryRun = true;
        break;
      case '-v':
      case '--verbose':
        options.verbose = true;
        break;
      case '-h':
      case '--help':
        options.help = true;
        break;
      case '--version':
        options.version = true;
        break;
      default:
        throw new ConfigurationError(`Unknown option: ${arg}`);
    }
  }

  return options;
}

/**
 * Page title of a blocklist setting: a Wikidata page URL or a bare title.
 * Other URLs yield null.
 */
export function blocklistTitle(blocklistUrl: string): string | null {
  if (blocklistUrl.startsWith(WIKIDATA_PAGE_PREFIX)) {
    return blocklistUrl.slice(WIKIDATA_PAGE_PREFIX.length);
  }
  if (!blocklistUrl.startsWith('http')) {
    return blocklistUrl;
  }
  return null;
}

export type CliClient = Pick<
  MediaWikiApiClient,
  'login' | 'logout' | 'getEntities' | 'editEntity' | 'fetchPageEntityIds'
>;

export interface CliDependencies {
  client: CliClient;
  readInput: (path: string) => Promise<string>;
  logger: Logger;
  rateLimiter?: RateLimiter;
}

async function loadBlocklist(client: CliClient, blocklistUrl: string, logger: Logger): Promise<Set<string>> {
  const title = blocklistTitle(blocklistUrl);
  if (title === null) {
    logger.warn({ blocklistUrl }, 'Ignoring blocklist URL outside wikidata.org');
    return new Set();
  }
  const blocked = await client.fetchPageEntityIds(title);
  if (title) {
    logger.info({ count: blocked.size }, `Loaded ${blocked.size} QIDs from blocklist`);
  }
  return blocked;
}

/**
 * Run one patch document end to end
 *
 * @returns Process exit code
 */
export async function runCli(options: CliOptions, deps: CliDependencies): Promise<number> {
  const { client, logger } = deps;
  let loggedIn = false;

  try {
    if (!options.dryRun) {
      if (!options.username || !options.password) {
        throw new ConfigurationError('--username and --password are required unless --dry-run is set');
      }
      await client.login(options.username, options.password);
      loggedIn = true;
    }

    const blocklist = await loadBlocklist(client, options.blocklistUrl, logger);
    const input = await deps.readInput(options.input);
    const edits = await processGraph(input, { lookup: client, blocklist, logger });

    const rateLimiter = deps.rateLimiter ?? new RateLimiter(1, getEnv().WIKIBASE_EDITS_PER_SECOND);
    const submitted = await submitEdits(edits, { editor: client, dryRun: options.dryRun, rateLimiter, logger });

    logger.info({ edits: edits.length, submitted }, `Processed ${edits.length} edits, submitted ${submitted}`);
    return 0;
  } catch (error) {
    logger.error(
      { error: error instanceof Error ? error.message : String(error) },
      error instanceof Error ? error.message : 'wikibase-rdf-patch failed'
    );
    return 1;
  } finally {
    if (loggedIn) {
      try {
        await client.logout();
      } catch (error) {
        logger.warn({ error: error instanceof Error ? error.message : String(error) }, 'Logout failed');
      }
    }
  }
}
