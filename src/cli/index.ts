#!/usr/bin/env node

import { Command } from 'commander';
import { loadConfig } from '../config';
import { SpotifyClaimEvaluator } from '../core/ClaimEvaluator';
import { FileTokenStore, MemoryTokenStore, TokenStore } from '../core/TokenStore';
import { encodeString } from '../oracle/FieldDecoder';
import { JsonRpcServer } from '../server/JsonRpcServer';
import { OracleConfig } from '../types';
import { errorMessage, formatKey } from '../utils';

const program = new Command();

interface ServeCommandOptions {
  port?: string;
  host?: string;
  apiKey?: string;
  cors: boolean;
  store?: string;
  dataDir?: string;
  strictDecoding?: boolean;
  rateLimit?: string;
  apiBase?: string;
}

interface StoreCommandOptions {
  dataDir?: string;
}

function parseIntOption(name: string, raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new Error(`--${name} must be an integer, got "${raw}"`);
  }
  return value;
}

function toConfigOverrides(options: ServeCommandOptions): Partial<OracleConfig> {
  const store = options.store;
  if (store !== undefined && store !== 'memory' && store !== 'file') {
    throw new Error(`--store must be "memory" or "file", got "${store}"`);
  }
  return {
    port: parseIntOption('port', options.port),
    host: options.host,
    apiKey: options.apiKey,
    cors: options.cors,
    store,
    dataDir: options.dataDir,
    decodePolicy: options.strictDecoding ? 'strict' : undefined,
    rateLimitPerMinute: parseIntOption('rate-limit', options.rateLimit),
    apiBaseUrl: options.apiBase
  };
}

function createTokenStore(config: OracleConfig): TokenStore {
  return config.store === 'memory' ? new MemoryTokenStore() : new FileTokenStore(config.dataDir);
}

function fail(context: string, error: unknown): never {
  console.error(`❌ ${context}:`, errorMessage(error));
  process.exit(1);
}

program
  .name('listening-oracle')
  .description('Foreign-call oracle for listening-history claims')
  .version('1.0.0');

program
  .command('serve')
  .description('Start the JSON-RPC oracle server')
  .option('-p, --port <port>', 'Port to listen on (env ORACLE_PORT)')
  .option('-H, --host <host>', 'Host to bind to (env ORACLE_HOST)')
  .option('-k, --api-key <key>', 'API key for store_key / delete_key (auto-generated if public bind)')
  .option('--no-cors', 'Disable CORS')
  .option('--store <kind>', 'Token store: memory | file (env ORACLE_STORE)')
  .option('--data-dir <dir>', 'Directory for the file token store (env ORACLE_DATA_DIR)')
  .option('--strict-decoding', 'Reject malformed field elements instead of substituting sentinels')
  .option('--rate-limit <n>', 'Max POSTs per minute per client, 0 disables (env ORACLE_RATE_LIMIT)')
  .option('--api-base <url>', 'Listening history API base URL (env SPOTIFY_API_BASE)')
  .action(async (options: ServeCommandOptions) => {
    try {
      const config = loadConfig(toConfigOverrides(options));
      const server = new JsonRpcServer(
        {
          tokenStore: createTokenStore(config),
          evaluator: new SpotifyClaimEvaluator({
            baseUrl: config.apiBaseUrl,
            timeoutMs: config.requestTimeoutMs
          }),
          decodePolicy: config.decodePolicy
        },
        {
          port: config.port,
          host: config.host,
          apiKey: config.apiKey,
          cors: config.cors,
          bodyLimit: config.bodyLimit,
          rateLimitPerMinute: config.rateLimitPerMinute
        }
      );

      console.log(`Starting oracle (${config.store} token store)...`);
      await server.start();

      const shutdown = async () => {
        console.log('\nShutting down...');
        try {
          await server.stop();
          process.exit(0);
        } catch (error) {
          fail('Shutdown failed', error);
        }
      };
      process.on('SIGINT', () => void shutdown());
      process.on('SIGTERM', () => void shutdown());
    } catch (error) {
      fail('Failed to start oracle', error);
    }
  });

program
  .command('store-key <id> <token>')
  .description('Store a token in the file token store')
  .option('--data-dir <dir>', 'Token store directory (env ORACLE_DATA_DIR)')
  .action(async (id: string, token: string, options: StoreCommandOptions) => {
    try {
      if (!id || !token) throw new Error('ID or token cannot be empty');
      const config = loadConfig({ dataDir: options.dataDir });
      const store = new FileTokenStore(config.dataDir);
      await store.put(id, token);
      console.log(`✅ Stored token for ${formatKey(id)} in ${store.getPath()}`);
    } catch (error) {
      fail('Failed to store token', error);
    }
  });

program
  .command('delete-key <id>')
  .description('Remove a token from the file token store')
  .option('--data-dir <dir>', 'Token store directory (env ORACLE_DATA_DIR)')
  .action(async (id: string, options: StoreCommandOptions) => {
    try {
      if (!id) throw new Error('ID or token cannot be empty');
      const config = loadConfig({ dataDir: options.dataDir });
      const store = new FileTokenStore(config.dataDir);
      await store.delete(id);
      console.log(`✅ Deleted token for ${formatKey(id)}`);
    } catch (error) {
      fail('Failed to delete token', error);
    }
  });

program
  .command('encode <text>')
  .description('Print the field-element array for a string (one element per code point)')
  .action((text: string) => {
    console.log(JSON.stringify(encodeString(text)));
  });

// Parse command line arguments
program.parse(process.argv);

// Show help if no arguments
if (!process.argv.slice(2).length) {
  program.outputHelp();
}
