import { mkdtempSync, mkdirSync, readFileSync, rmSync, writeFileSync, existsSync, statSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { FileTokenStore, MemoryTokenStore, TokenNotFoundError } from '../../src/core/TokenStore';

describe('MemoryTokenStore', () => {
  let store: MemoryTokenStore;

  beforeEach(() => {
    store = new MemoryTokenStore();
  });

  test('put then get returns the token', async () => {
    await store.put('alice', 'test-token-1');
    await expect(store.get('alice')).resolves.toBe('test-token-1');
  });

  test('put overwrites', async () => {
    await store.put('alice', 'test-token-1');
    await store.put('alice', 'test-token-2');
    await expect(store.get('alice')).resolves.toBe('test-token-2');
    expect(store.size()).toBe(1);
  });

  test('get of an unknown key rejects with TokenNotFoundError', async () => {
    await expect(store.get('nobody')).rejects.toThrow(TokenNotFoundError);
    await expect(store.get('nobody')).rejects.toThrow('No token stored for key nobody');
  });

  test('delete removes the token', async () => {
    await store.put('alice', 'test-token-1');
    await store.delete('alice');
    await expect(store.get('alice')).rejects.toThrow(TokenNotFoundError);
  });

  test('delete of an unknown key resolves', async () => {
    await expect(store.delete('nobody')).resolves.toBeUndefined();
  });
});

describe('FileTokenStore', () => {
  let dataDir: string;

  beforeEach(() => {
    dataDir = mkdtempSync(join(tmpdir(), 'oracle-tokens-'));
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
    rmSync(dataDir, { recursive: true, force: true });
  });

  test('creates the data directory on demand', () => {
    const nested = join(dataDir, 'a', 'b');
    const store = new FileTokenStore(nested);
    expect(existsSync(nested)).toBe(true);
    expect(store.getPath()).toBe(join(nested, 'tokens.json'));
  });

  test('writes every mutation to tokens.json', async () => {
    const store = new FileTokenStore(dataDir);
    await store.put('alice', 'test-token-1');
    await store.put('bob', 'test-token-2');
    await store.delete('alice');

    const onDisk = JSON.parse(readFileSync(join(dataDir, 'tokens.json'), 'utf-8'));
    expect(onDisk).toEqual({ bob: 'test-token-2' });
  });

  test('the token file is private to the owner', async () => {
    const store = new FileTokenStore(dataDir);
    await store.put('alice', 'test-token-1');
    expect(statSync(store.getPath()).mode & 0o077).toBe(0);
  });

  test('a new instance restores persisted tokens', async () => {
    const first = new FileTokenStore(dataDir);
    await first.put('alice', 'test-token-1');

    const second = new FileTokenStore(dataDir);
    await expect(second.get('alice')).resolves.toBe('test-token-1');
    expect(second.size()).toBe(1);
  });

  test('deleting an unknown key does not create the file', async () => {
    const store = new FileTokenStore(dataDir);
    await store.delete('nobody');
    expect(existsSync(store.getPath())).toBe(false);
  });

  test('skips non-string entries when loading', async () => {
    writeFileSync(join(dataDir, 'tokens.json'), JSON.stringify({ alice: 'test-token-1', broken: 42 }));
    const store = new FileTokenStore(dataDir);
    expect(store.size()).toBe(1);
    await expect(store.get('broken')).rejects.toThrow(TokenNotFoundError);
  });

  test('starts empty when the file is not valid JSON', () => {
    writeFileSync(join(dataDir, 'tokens.json'), '{not json');
    const store = new FileTokenStore(dataDir);
    expect(store.size()).toBe(0);
    expect(console.warn).toHaveBeenCalled();
  });

  test('a failed write does not make the token live', async () => {
    const store = new FileTokenStore(dataDir);
    mkdirSync(store.getPath());

    await expect(store.put('alice', 'test-token-1')).rejects.toThrow('EISDIR');
    await expect(store.get('alice')).rejects.toThrow(TokenNotFoundError);
    expect(store.size()).toBe(0);
  });

  test('a failed write does not drop the token on delete', async () => {
    const store = new FileTokenStore(dataDir);
    await store.put('alice', 'test-token-1');
    rmSync(store.getPath());
    mkdirSync(store.getPath());

    await expect(store.delete('alice')).rejects.toThrow('EISDIR');
    await expect(store.get('alice')).resolves.toBe('test-token-1');
  });

  test('starts empty when the file holds an array', () => {
    writeFileSync(join(dataDir, 'tokens.json'), '["alice"]');
    expect(new FileTokenStore(dataDir).size()).toBe(0);
  });
});
