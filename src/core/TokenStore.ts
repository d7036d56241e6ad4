import { existsSync, readFileSync, writeFileSync, mkdirSync } from 'fs';
import { join } from 'path';
import { TOKEN_FILE_NAME } from '../protocol/constants';
import { formatKey, isRecord, log, logWarn, errorMessage } from '../utils';

const TAG = 'tokens';

export class TokenNotFoundError extends Error {
  constructor(readonly id: string) {
    super(`No token stored for key ${id}`);
    this.name = 'TokenNotFoundError';
  }
}

/**
 * Association of caller-chosen identifiers to listening-history API tokens.
 * Concurrent calls on one identifier are not coordinated; last write wins.
 */
export interface TokenStore {
  /** Rejects with TokenNotFoundError when nothing is stored. */
  get(id: string): Promise<string>;
  put(id: string, token: string): Promise<void>;
  /** Deleting an unknown identifier resolves. */
  delete(id: string): Promise<void>;
}

export class MemoryTokenStore implements TokenStore {
  protected tokens: Map<string, string> = new Map();

  async get(id: string): Promise<string> {
    const token = this.tokens.get(id);
    if (token === undefined) throw new TokenNotFoundError(id);
    return token;
  }

  async put(id: string, token: string): Promise<void> {
    this.tokens.set(id, token);
  }

  async delete(id: string): Promise<void> {
    this.tokens.delete(id);
  }

  size(): number {
    return this.tokens.size;
  }
}

/**
 * Memory store mirrored to data/tokens.json.
 * The file is rewritten synchronously on every mutation, so writes land in call order.
 * A mutation whose write fails leaves memory unchanged.
 */
export class FileTokenStore extends MemoryTokenStore {
  private persistPath: string;

  constructor(dataDir: string) {
    super();
    if (!existsSync(dataDir)) {
      mkdirSync(dataDir, { recursive: true });
    }
    this.persistPath = join(dataDir, TOKEN_FILE_NAME);
    this.load();
  }

  getPath(): string {
    return this.persistPath;
  }

  async put(id: string, token: string): Promise<void> {
    const next = new Map(this.tokens);
    next.set(id, token);
    this.saveToDisk(next);
    this.tokens = next;
  }

  async delete(id: string): Promise<void> {
    if (!this.tokens.has(id)) return;
    const next = new Map(this.tokens);
    next.delete(id);
    this.saveToDisk(next);
    this.tokens = next;
  }

  private load(): void {
    if (!existsSync(this.persistPath)) return;
    try {
      const data: unknown = JSON.parse(readFileSync(this.persistPath, 'utf-8'));
      if (!isRecord(data)) {
        logWarn(TAG, `Ignoring ${this.persistPath}: expected an object of tokens`);
        return;
      }
      for (const [id, token] of Object.entries(data)) {
        if (typeof token === 'string') {
          this.tokens.set(id, token);
        } else {
          logWarn(TAG, `Skipping non-string token for ${formatKey(id)}`);
        }
      }
      log(TAG, `Restored ${this.tokens.size} tokens from ${this.persistPath}`);
    } catch (err) {
      logWarn(TAG, `Failed to load tokens from ${this.persistPath}, starting fresh: ${errorMessage(err)}`);
    }
  }

  /** Throws on a failed write; callers commit `tokens` only afterwards. */
  private saveToDisk(tokens: Map<string, string>): void {
    const snapshot = Object.fromEntries(tokens);
    writeFileSync(this.persistPath, JSON.stringify(snapshot, null, 2), { mode: 0o600 });
  }
}
