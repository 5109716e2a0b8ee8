import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'node:url';
import { pino } from 'pino';
import { MockEntityLookup } from '../services/mocks/MockEntityLookup.js';
import type { EntityEdit } from '../services/rdf-patch/changeDetector.js';
import { ConfigurationError } from '../types/errors.js';
import type { Entity, MissingEntity } from '../types/wikibase.js';
import { RateLimiter } from '../utils/RateLimiter.js';
import { blocklistTitle, parseCliArgs, runCli, type CliClient, type CliOptions } from './cli.js';

function fixture(name: string): string {
  return fileURLToPath(new URL(`../services/rdf-patch/__fixtures__/${name}`, import.meta.url));
}
const logger = pino({ level: 'silent' });

class FakeClient implements CliClient {
  readonly calls: string[] = [];
  readonly edits: EntityEdit[] = [];
  blocklist = new Set<string>();
  private readonly lookup = MockEntityLookup.fromFixtureFiles(fixture('items.json'), fixture('properties.json'));

  async login(username: string, _password: string): Promise<void> {
    this.calls.push(`login ${username}`);
  }

  async logout(): Promise<void> {
    this.calls.push('logout');
  }

  async getEntities(ids: string[]): Promise<Map<string, Entity | MissingEntity>> {
    return this.lookup.getEntities(ids);
  }

  async editEntity(edit: EntityEdit): Promise<void> {
    this.calls.push(`edit ${edit.entityId}`);
    this.edits.push(edit);
  }

  async fetchPageEntityIds(title: string): Promise<Set<string>> {
    this.calls.push(`blocklist ${title}`);
    return this.blocklist;
  }
}

const RANK_CHANGE = 'wds:Q172241-6B571F20-7732-47E1-86B2-1DFA6D0A15F5 wikibase:rank wikibase:PreferredRank .';

function options(overrides: Partial<CliOptions> = {}): CliOptions {
  return {
    input: '-',
    dryRun: false,
    username: 'PatchBot@rdf-patch',
    password: 'test-secret',
    blocklistUrl: '',
    verbose: false,
    help: false,
    version: false,
    ...overrides,
  };
}

function run(cliOptions: CliOptions, client: FakeClient, document = RANK_CHANGE) {
  const inputs: string[] = [];
  const result = runCli(cliOptions, {
    client,
    readInput: async (path) => {
      inputs.push(path);
      return document;
    },
    logger,
    rateLimiter: new RateLimiter(10, 10, { sleep: async () => undefined }),
  });
  return { result, inputs };
}

describe('parseCliArgs', () => {
  it('defaults to stdin and takes credentials from the environment', () => {
    expect(parseCliArgs([], { WIKIDATA_USERNAME: 'EnvBot', WIKIDATA_PASSWORD: 'test-secret' })).toEqual({
      input: '-',
      dryRun: false,
      username: 'EnvBot',
      password: 'test-secret',
      blocklistUrl: '',
      verbose: false,
      help: false,
      version: false,
    });
  });

  it('accepts separate and inline option values', () => {
    const parsed = parseCliArgs(
      ['--input', 'changes.ttl', '--username=CliBot', '--blocklist-url', 'User:CliBot/Blocklist', '-n', '-v'],
      { WIKIDATA_USERNAME: 'EnvBot' }
    );

    expect(parsed).toMatchObject({
      input: 'changes.ttl',
      username: 'CliBot',
      blocklistUrl: 'User:CliBot/Blocklist',
      dryRun: true,
      verbose: true,
    });
  });

  it('keeps equals signs inside inline values', () => {
    expect(parseCliArgs(['--password=a=b'], {}).password).toBe('a=b');
  });

  it('recognises help and version', () => {
    expect(parseCliArgs(['-h'], {}).help).toBe(true);
    expect(parseCliArgs(['--version'], {}).version).toBe(true);
  });

  it('rejects unknown options and missing values', () => {
    expect(() => parseCliArgs(['--force'], {})).toThrow('Unknown option: --force');
    expect(() => parseCliArgs(['--input'], {})).toThrow(ConfigurationError);
  });
});

describe('blocklistTitle', () => {
  it('strips the wiki page prefix', () => {
    expect(blocklistTitle('https://www.wikidata.org/wiki/User:PatchBot/Blocklist')).toBe('User:PatchBot/Blocklist');
  });

  it('passes bare titles through', () => {
    expect(blocklistTitle('User:PatchBot/Blocklist')).toBe('User:PatchBot/Blocklist');
    expect(blocklistTitle('')).toBe('');
  });

  it('ignores other URLs', () => {
    expect(blocklistTitle('https://example.org/blocklist.txt')).toBeNull();
  });
});

describe('runCli', () => {
  it('logs in, submits the edits and logs out', async () => {
    const client = new FakeClient();
    const { result, inputs } = run(options({ input: 'changes.ttl' }), client);

    expect(await result).toBe(0);
    expect(inputs).toEqual(['changes.ttl']);
    expect(client.calls).toEqual(['login PatchBot@rdf-patch', 'blocklist ', 'edit Q172241', 'logout']);
    expect(client.edits[0].statements[0].rank).toBe('preferred');
  });

  it('neither logs in nor edits in dry-run mode', async () => {
    const client = new FakeClient();
    const { result } = run(options({ dryRun: true, username: '', password: '' }), client);

    expect(await result).toBe(0);
    expect(client.calls).toEqual(['blocklist ']);
  });

  it('requires credentials outside dry-run mode', async () => {
    const client = new FakeClient();
    const { result, inputs } = run(options({ password: '' }), client);

    expect(await result).toBe(1);
    expect(inputs).toEqual([]);
    expect(client.calls).toEqual([]);
  });

  it('skips blocklisted items', async () => {
    const client = new FakeClient();
    client.blocklist = new Set(['Q172241']);
    const { result } = run(
      options({ blocklistUrl: 'https://www.wikidata.org/wiki/User:PatchBot/Blocklist' }),
      client
    );

    expect(await result).toBe(0);
    expect(client.calls).toEqual(['login PatchBot@rdf-patch', 'blocklist User:PatchBot/Blocklist', 'logout']);
  });

  it('ignores blocklist URLs outside wikidata.org', async () => {
    const client = new FakeClient();
    const { result } = run(options({ dryRun: true, blocklistUrl: 'https://example.org/blocklist.txt' }), client);

    expect(await result).toBe(0);
    expect(client.calls).toEqual([]);
  });

  it('exits with 1 when the document is invalid', async () => {
    const client = new FakeClient();
    const { result } = run(options(), client, 'wd:Q172241 wdt:P4947 .');

    expect(await result).toBe(1);
    expect(client.calls).toEqual(['login PatchBot@rdf-patch', 'blocklist ', 'logout']);
  });
});
