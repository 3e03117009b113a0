/**
 * Command line: purge-all, purge-urls, purge-tags, purge-prefixes, verify-token.
 * `--json` prints the raw result instead of the per-request lines.
 * Purges always run inline so the exit code reflects delivery.
 *
 * Exit codes: 0 success, 1 failure, 2 usage error.
 */

import { parseArgs } from 'util';
import { PurgeConfig, loadConfig } from '../config/index.js';
import { PurgeClient } from '../client/cloudflareClient.js';
import { createPurgePipeline } from '../purge/setup.js';
import { PurgeOutcome, PurgeResult } from '../protocol/types.js';
import { describeError, PurgeError } from '../protocol/errors.js';
import type { Logger } from '../audit/logger.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export interface CliIo {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
}

export interface CliDeps {
  config?: PurgeConfig;
  client?: PurgeClient;
  logger?: Logger;
  io?: CliIo;
}

const USAGE = [
  'Usage: edge-purge <command> [args] [--dry-run]',
  '',
  'Commands:',
  '  purge-all                  Purge the entire zone cache',
  '  purge-urls <url...>        Purge specific URLs or site-relative paths',
  '  purge-tags <tag...>        Purge by cache tag',
  '  purge-prefixes <prefix...> Purge by URL prefix',
  '  verify-token               Verify the configured API token',
  '',
  'Options:',
  '  --dry-run   Show what would be purged without calling Cloudflare',
  '  --json      Print the raw result as JSON',
  '  --help      Show this message',
].join('\n');

const defaultIo: CliIo = {
  stdout: (line) => process.stdout.write(`${line}\n`),
  stderr: (line) => process.stderr.write(`${line}\n`),
};

export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const io = deps.io ?? defaultIo;

  let parsed: CommandLine;
  try {
    parsed = parseCommandLine(argv);
  } catch (err) {
    io.stderr(describeError(err));
    io.stderr(USAGE);
    return EXIT_USAGE;
  }

  const { command, args, dryRun, json, help } = parsed;
  if (help || !command) {
    (help ? io.stdout : io.stderr)(USAGE);
    return help ? EXIT_OK : EXIT_USAGE;
  }

  try {
    const config = deps.config ?? loadConfig();
    const pipeline = createPurgePipeline(config, { client: deps.client, logger: deps.logger });
    const { dispatcher, client } = pipeline;
    const options = { dryRun, background: false };
    const output = (result: PurgeResult, noun: string): number =>
      json ? printJson(io, result) : report(io, result, noun);

    switch (command) {
      case 'purge-all':
        if (args.length > 0) return usageError(io, 'purge-all takes no arguments.');
        return output(await dispatcher.purgeEverything(options), 'entire cache');

      case 'purge-urls':
        if (args.length === 0) return usageError(io, 'No URLs provided.');
        return output(await dispatcher.purgeUrls(args, options), 'URL(s)');

      case 'purge-tags':
        if (args.length === 0) return usageError(io, 'No tags provided.');
        return output(await dispatcher.purgeTags(args, options), 'tag(s)');

      case 'purge-prefixes':
        if (args.length === 0) return usageError(io, 'No prefixes provided.');
        return output(await dispatcher.purgePrefixes(args, options), 'prefix(es)');

      case 'verify-token':
        return verifyToken(io, config, client, dryRun, json);

      default:
        return usageError(io, `Unknown command: ${command}`);
    }
  } catch (err) {
    const label = err instanceof PurgeError ? err.kind : 'Error';
    io.stderr(`${label}: ${describeError(err)}`);
    return EXIT_FAILURE;
  }
}

interface CommandLine {
  command?: string;
  args: string[];
  dryRun: boolean;
  json: boolean;
  help: boolean;
}

function parseCommandLine(argv: string[]): CommandLine {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      'dry-run': { type: 'boolean', default: false },
      json: { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });
  const [command, ...args] = positionals;
  return {
    command,
    args,
    dryRun: values['dry-run'] === true,
    json: values.json === true,
    help: values.help === true,
  };
}

function usageError(io: CliIo, message: string): number {
  io.stderr(message);
  io.stderr(USAGE);
  return EXIT_USAGE;
}

function printJson(io: CliIo, result: PurgeResult): number {
  io.stdout(JSON.stringify(result, null, 2));
  return result.success ? EXIT_OK : EXIT_FAILURE;
}

function report(io: CliIo, result: PurgeResult, noun: string): number {
  switch (result.status) {
    case 'skipped':
      io.stdout(result.reason === 'disabled'
        ? 'Purging is disabled (CLOUDFLARE_ENABLED=false); nothing was sent.'
        : 'Nothing to purge.');
      return EXIT_OK;

    case 'dry_run': {
      if (noun === 'entire cache') {
        io.stdout('DRY RUN: Would purge entire cache');
        return EXIT_OK;
      }
      const total = result.batches.reduce((sum, b) => sum + b.length, 0);
      io.stdout(`DRY RUN: Would purge ${total} ${noun} in ${result.batches.length} request(s):`);
      result.batches.forEach((batch, i) => {
        io.stdout(`  Request ${i + 1}:`);
        for (const item of batch) io.stdout(`    - ${item}`);
      });
      return EXIT_OK;
    }

    case 'scheduled':
      io.stdout(`Scheduled purge job ${result.jobId}.`);
      return EXIT_OK;

    case 'completed': {
      result.outcomes.forEach((outcome, i) => io.stdout(formatOutcome(outcome, i + 1)));
      const ok = result.outcomes.filter((o) => o.success).length;
      const summary = `${result.success ? 'Successfully purged' : 'Purge failed for'} ${noun}: ${ok}/${result.outcomes.length} request(s) succeeded.`;
      (result.success ? io.stdout : io.stderr)(summary);
      return result.success ? EXIT_OK : EXIT_FAILURE;
    }
  }
}

export function formatOutcome(outcome: PurgeOutcome, index: number): string {
  const size = outcome.batchUrls.length > 0 ? ` ${outcome.batchUrls.length} URL(s)` : '';
  if (outcome.success) {
    return `[ok] request ${index}:${size}${outcome.purgeId ? ` (id ${outcome.purgeId})` : ''}`;
  }
  const status = outcome.status === null ? 'no response' : `HTTP ${outcome.status}`;
  return `[failed] request ${index}:${size} ${outcome.errorKind ?? 'Error'} (${status}): ${outcome.error ?? 'unknown error'}`;
}

async function verifyToken(
  io: CliIo,
  config: PurgeConfig,
  client: PurgeClient,
  dryRun: boolean,
  json: boolean,
): Promise<number> {
  if (!config.apiToken) {
    io.stderr('CLOUDFLARE_API_TOKEN is not configured');
    return EXIT_FAILURE;
  }
  if (!config.zoneId) {
    io.stderr('CLOUDFLARE_ZONE_ID is not configured');
    return EXIT_FAILURE;
  }
  if (dryRun) {
    io.stdout(`DRY RUN: Would verify API token for zone ${config.zoneId}`);
    return EXIT_OK;
  }

  if (json) {
    const verification = await client.verifyToken();
    io.stdout(JSON.stringify(verification, null, 2));
    return verification.valid ? EXIT_OK : EXIT_FAILURE;
  }

  io.stdout('Verifying Cloudflare API token...');
  const verification = await client.verifyToken();
  if (verification.valid) {
    io.stdout('API token is valid');
    io.stdout(`  Status: ${verification.tokenStatus ?? 'unknown'}`);
    return EXIT_OK;
  }
  io.stderr(`API token verification failed: ${verification.errorKind ?? 'Error'}: ${verification.error ?? 'unknown error'}`);
  return EXIT_FAILURE;
}
