import { Command, InvalidArgumentError } from 'commander';
import { EconopsClient, type EconopsClientOptions, type FetchLike } from '../clients/econops.js';
import { createLogger } from '../utils/logger.js';
import { formatCacheInfo, runCall, runInteractive, type TextSink } from './commands.js';
import type { Environment } from '../config.js';
import type { HttpMethod, SignatureMode } from '../types/index.js';

/** Public account the service accepts when no token is configured. */
export const DEMO_TOKEN = 'demo';

const METHODS: readonly HttpMethod[] = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE'];
const SIGNATURE_MODES: readonly SignatureMode[] = ['prefixed', 'payload', 'strict'];

type GlobalOptions = {
  token?: string;
  baseUrl?: string;
  cache: boolean;
  cacheDir?: string;
  signatureMode?: SignatureMode;
  insecure?: boolean;
  verbose?: boolean;
};

type CallOptions = {
  method?: HttpMethod;
};

export interface ProgramDependencies {
  stdout?: TextSink;
  stdin?: NodeJS.ReadableStream;
  env?: Environment;
  fetch?: FetchLike;
}

export function buildProgram(deps: ProgramDependencies = {}): Command {
  const stdout = deps.stdout ?? process.stdout;
  const withClient = async <T>(command: Command, run: (client: EconopsClient) => Promise<T>): Promise<T> => {
    const client = new EconopsClient(clientOptions(command.optsWithGlobals<GlobalOptions>(), deps));
    try {
      return await run(client);
    } finally {
      await client.close();
    }
  };

  const program = new Command();
  program
    .name('econops')
    .description('Call the EconOps statistical computation API from the command line.')
    .option('--token <token>', 'API token (default: $ECONOPS_TOKEN, then the demo token).')
    .option('--base-url <url>', 'API base URL (default: $ECONOPS_BASE_URL or https://econops.com:8000).')
    .option('--no-cache', 'Disable the local response cache.')
    .option('--cache-dir <path>', 'Directory for cached responses (default: $ECONOPS_CACHE_DIR or the system temp dir).')
    .option('--signature-mode <mode>', 'How request signatures are derived: prefixed, payload or strict.', parseSignatureMode)
    .option('-k, --insecure', 'Skip TLS certificate verification (default: verify unless $ECONOPS_INSECURE is set).')
    .option('-v, --verbose', 'Log requests and cache activity to stderr.');

  program
    .command('call')
    .description('Send one request and print the result.')
    .argument('<route>', 'API route, e.g. /compute/pca')
    .argument('[payload]', 'JSON object sent as the request body')
    .option('-X, --method <method>', 'HTTP method (requests with a payload are always sent as POST).', parseMethod)
    .action(async (route: string, payload: string | undefined, options: CallOptions, command: Command) => {
      await withClient(command, (client) => runCall(client, route, payload, stdout, options.method));
    });

  program
    .command('interactive')
    .alias('repl')
    .description('Read "route [json]" lines from stdin until quit or exit.')
    .action(async (_options: unknown, command: Command) => {
      await withClient(command, (client) =>
        runInteractive(client, { input: deps.stdin ?? process.stdin, output: stdout }),
      );
    });

  const cache = program.command('cache').description('Inspect or clear the local response cache.');

  cache
    .command('info')
    .description('Show the cache directory, entry count and size.')
    .action(async (_options: unknown, command: Command) => {
      stdout.write(formatCacheInfo(await withClient(command, (client) => client.cacheInfo())));
    });

  cache
    .command('clear')
    .description('Remove every cached response.')
    .action(async (_options: unknown, command: Command) => {
      const removed = await withClient(command, (client) => client.clearCache());
      stdout.write(`Removed ${removed} cached response${removed === 1 ? '' : 's'}.\n`);
    });

  return program;
}

function clientOptions(options: GlobalOptions, deps: ProgramDependencies): EconopsClientOptions {
  return {
    token: options.token,
    fallbackToken: DEMO_TOKEN,
    baseUrl: options.baseUrl,
    useCache: options.cache ? undefined : false,
    cacheDir: options.cacheDir,
    signatureMode: options.signatureMode,
    verifyTls: options.insecure ? false : undefined,
    ...(deps.env ? { env: deps.env } : {}),
    ...(deps.fetch ? { fetch: deps.fetch } : {}),
    logger: createLogger('econops', { verbose: options.verbose ?? false }),
  };
}

export function parseMethod(value: string): HttpMethod {
  const method = METHODS.find((candidate) => candidate === value.trim().toUpperCase());
  if (!method) {
    throw new InvalidArgumentError(`Expected one of ${METHODS.join(', ')}.`);
  }
  return method;
}

export function parseSignatureMode(value: string): SignatureMode {
  const mode = SIGNATURE_MODES.find((candidate) => candidate === value.trim().toLowerCase());
  if (!mode) {
    throw new InvalidArgumentError(`Expected one of ${SIGNATURE_MODES.join(', ')}.`);
  }
  return mode;
}
