#!/usr/bin/env node
/**
 * wikibase-rdf-patch CLI
 *
 * Reads a Turtle patch document and applies it to Wikidata.
 *
 * Usage:
 *   wikibase-rdf-patch --input changes.ttl --dry-run
 *   cat changes.ttl | wikibase-rdf-patch --username Bot@patch --password ...
 */

import { readFile } from 'node:fs/promises';
import { MediaWikiApiClient } from '../clients/MediaWikiApiClient.js';
import { isAppError } from '../types/errors.js';
import { createChildLogger } from '../utils/logger.js';
import { parseCliArgs, runCli, USAGE, VERSION } from './cli.js';

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf8');
}

async function main(): Promise<number> {
  const options = parseCliArgs(process.argv.slice(2));

  if (options.help) {
    process.stdout.write(USAGE);
    return 0;
  }
  if (options.version) {
    process.stdout.write(`wikibase-rdf-patch ${VERSION}\n`);
    return 0;
  }

  const logger = createChildLogger({ component: 'cli' });
  if (options.verbose) {
    logger.level = 'debug';
  }

  return runCli(options, {
    client: new MediaWikiApiClient({ logger: logger.child({ component: 'mediawiki-api' }) }),
    readInput: (path) => (path === '-' ? readStdin() : readFile(path, 'utf8')),
    logger,
  });
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    if (isAppError(error)) {
      console.error(`❌ ${error.code}: ${error.message}`);
    } else {
      console.error('❌ Error:', error instanceof Error ? error.message : error);
    }
    process.exitCode = 1;
  });
