import express from 'express';
import cors from 'cors';
import http from 'http';
import { randomBytes } from 'crypto';
import { JSONRPCErrorCode, JSONRPCErrorException, JSONRPCServer } from 'json-rpc-2.0';
import { ClaimEvaluator } from '../core/ClaimEvaluator';
import { RateLimiter } from '../core/RateLimiter';
import { TokenStore } from '../core/TokenStore';
import { resolveForeignCall } from '../oracle/ClaimDispatcher';
import { FieldDecoder } from '../oracle/FieldDecoder';
import { deleteKey, storeKey } from '../oracle/TokenAdmin';
import {
  ADMIN_METHODS,
  DEFAULT_BODY_LIMIT,
  DEFAULT_HOST,
  DEFAULT_PORT,
  DEFAULT_RATE_LIMIT_PER_MINUTE,
  DELETE_KEY,
  RATE_LIMIT_WINDOW_MS,
  RESOLVE_FOREIGN_CALL,
  RPC_METHODS,
  STORE_KEY
} from '../protocol/constants';
import { DecodePolicy, ServeOptions } from '../types';
import { errorMessage, formatKey, isRecord, log, logError } from '../utils';

const TAG = 'server';

export interface OracleDependencies {
  tokenStore: TokenStore;
  evaluator: ClaimEvaluator;
  decodePolicy?: DecodePolicy;
}

/**
 * Build the JSON-RPC method table. Transport-free: feed it requests with
 * `receive()`.
 */
export function createOracleRpc(deps: OracleDependencies): JSONRPCServer {
  const rpcServer = new JSONRPCServer({
    // Rejections are answers to the caller, not server faults.
    errorListener: (message: string, data: unknown) => {
      if (data instanceof JSONRPCErrorException) return;
      logError(TAG, message, errorMessage(data));
    }
  });
  const ctx = {
    decoder: new FieldDecoder(deps.decodePolicy),
    tokenStore: deps.tokenStore,
    evaluator: deps.evaluator
  };

  rpcServer.addMethod(RESOLVE_FOREIGN_CALL, async (params: unknown) => resolveForeignCall(params, ctx));

  rpcServer.addMethod(STORE_KEY, async (params: unknown) => {
    const id = await storeKey(params, deps.tokenStore);
    log(TAG, `Stored token for ${formatKey(id)}`);
    return id;
  });

  rpcServer.addMethod(DELETE_KEY, async (params: unknown) => {
    const id = await deleteKey(params, deps.tokenStore);
    log(TAG, `Deleted token for ${formatKey(id)}`);
    return id;
  });

  return rpcServer;
}

/**
 * True when a request (or any request of a batch) calls a token admin method.
 */
export function callsAdminMethod(body: unknown): boolean {
  if (Array.isArray(body)) return body.some(callsAdminMethod);
  return isRecord(body) && typeof body.method === 'string' && ADMIN_METHODS.includes(body.method);
}

export class JsonRpcServer {
  private app = express();
  private rpcServer: JSONRPCServer;
  private httpServer: http.Server | null = null;
  private rateLimiter: RateLimiter;
  private cleanupTimer: ReturnType<typeof setInterval> | null = null;
  private decodePolicy: DecodePolicy;
  private port: number;
  private host: string;
  private apiKey?: string;

  constructor(deps: OracleDependencies, options: ServeOptions = {}) {
    this.port = options.port ?? DEFAULT_PORT;
    this.host = options.host || DEFAULT_HOST;
    this.decodePolicy = deps.decodePolicy || 'lenient';
    this.rateLimiter = new RateLimiter(options.rateLimitPerMinute ?? DEFAULT_RATE_LIMIT_PER_MINUTE, RATE_LIMIT_WINDOW_MS);

    // Token admin must not be reachable anonymously on a public interface.
    const isPublic = this.host !== 'localhost' && this.host !== '127.0.0.1';
    if (options.apiKey) {
      this.apiKey = options.apiKey;
    } else if (isPublic) {
      this.apiKey = randomBytes(24).toString('base64url');
      log(TAG, `\n⚠️  PUBLIC BIND DETECTED (${this.host}) — auto-generated API key:`);
      log(TAG, `   ${this.apiKey}`);
      log(TAG, `   Use this key in the Authorization header for ${ADMIN_METHODS.join(' / ')} calls.`);
      log(TAG, `   Or pass --api-key <key> to set your own.\n`);
    }

    this.rpcServer = createOracleRpc(deps);

    this.configureMiddleware(options.cors !== false, options.bodyLimit || DEFAULT_BODY_LIMIT);
    this.setupRoutes();
  }

  async start(): Promise<void> {
    if (this.rateLimiter.isEnabled()) {
      this.cleanupTimer = setInterval(() => this.rateLimiter.cleanup(), RATE_LIMIT_WINDOW_MS);
      this.cleanupTimer.unref();
    }
    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.port, this.host, () => {
        server.off('error', onError);
        const base = `http://${this.host}:${this.getPort()}`;
        log(TAG, `Listening history oracle running on ${base}`);
        log(TAG, `  JSON-RPC: POST ${base}/`);
        log(TAG, `  Health:   ${base}/health`);
        log(TAG, `  Methods:  ${RPC_METHODS.join(', ')}`);
        log(TAG, `  Decoding: ${this.decodePolicy}`);
        resolve();
      });
      const onError = (err: Error): void => {
        this.httpServer = null;
        this.stopCleanup();
        logError(TAG, `Cannot listen on ${this.host}:${this.port}:`, errorMessage(err));
        reject(err);
      };
      server.once('error', onError);
      this.httpServer = server;
    });
  }

  /** Bound port once listening (resolves an ephemeral `0`), else the configured one. */
  getPort(): number {
    const address = this.httpServer?.address();
    return address && typeof address === 'object' ? address.port : this.port;
  }

  async stop(): Promise<void> {
    this.stopCleanup();
    return new Promise((resolve, reject) => {
      if (!this.httpServer) {
        resolve();
        return;
      }
      log(TAG, 'Shutting down...');
      this.httpServer.close((err) => {
        if (err) reject(err);
        else resolve();
      });
      this.httpServer = null;
    });
  }

  private stopCleanup(): void {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = null;
    }
  }

  private configureMiddleware(enableCors: boolean, bodyLimit: string): void {
    if (enableCors) {
      this.app.use(cors());
    }

    this.app.use(express.json({ limit: bodyLimit }));
    this.app.use(this.rateLimitMiddleware.bind(this));
    this.app.use(this.authMiddleware.bind(this));
  }

  private rateLimitMiddleware(req: express.Request, res: express.Response, next: express.NextFunction): void {
    if (req.method !== 'POST') return next();
    const caller = req.ip || req.socket.remoteAddress || 'unknown';
    if (!this.rateLimiter.allow(caller)) {
      res.status(429).json({ error: 'Too many requests' });
      return;
    }
    next();
  }

  private authMiddleware(req: express.Request, res: express.Response, next: express.NextFunction): void {
    // resolve_foreign_call is always open: the prover holds no credentials.
    if (!this.apiKey || !callsAdminMethod(req.body)) {
      return next();
    }

    const authHeader = req.headers.authorization;
    if (!authHeader || !authHeader.startsWith('Bearer ')) {
      res.status(401).json({ error: 'Authentication required. Use Authorization: Bearer <api-key>' });
      return;
    }

    const token = authHeader.substring(7);
    if (token !== this.apiKey) {
      res.status(403).json({ error: 'Invalid API key' });
      return;
    }

    next();
  }

  private setupRoutes(): void {
    // JSON-RPC endpoint
    this.app.post('/', async (req: express.Request, res: express.Response) => {
      try {
        const jsonRPCResponse = await this.rpcServer.receive(req.body);

        if (jsonRPCResponse) {
          res.json(jsonRPCResponse);
        } else {
          // Notification request (no response expected)
          res.status(204).end();
        }
      } catch (error) {
        logError(TAG, 'JSON-RPC error:', error);
        res.status(500).json({
          jsonrpc: '2.0',
          error: {
            code: JSONRPCErrorCode.InternalError,
            message: 'Internal server error',
            data: errorMessage(error)
          },
          id: isRecord(req.body) && req.body.id !== undefined ? req.body.id : null
        });
      }
    });

    this.app.get('/health', (_req: express.Request, res: express.Response) => {
      res.json({
        status: 'ok',
        methods: RPC_METHODS,
        decodePolicy: this.decodePolicy,
        timestamp: new Date().toISOString()
      });
    });
  }
}
