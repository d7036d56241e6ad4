import { TokenStore } from '../core/TokenStore';
import { errorMessage } from '../utils';
import { invalidParams } from './errors';

function parseStoreKeyParams(params: unknown): [string, string] {
  if (Array.isArray(params) && params.length === 2) {
    const [id, token]: unknown[] = params;
    if (typeof id === 'string' && typeof token === 'string') return [id, token];
  }
  throw invalidParams('Invalid params: expected [identifier, token]');
}

/** Accepts the bare identifier or a one-item array holding it. */
function parseDeleteKeyParams(params: unknown): string {
  if (typeof params === 'string') return params;
  if (Array.isArray(params) && params.length === 1 && typeof params[0] === 'string') return params[0];
  throw invalidParams('Invalid params: expected identifier');
}

/**
 * `store_key`: associate a token with an identifier. Echoes the identifier.
 */
export async function storeKey(params: unknown, tokenStore: TokenStore): Promise<string> {
  const [id, token] = parseStoreKeyParams(params);
  if (!id || !token) {
    throw invalidParams('ID or token cannot be empty');
  }
  try {
    await tokenStore.put(id, token);
  } catch (err) {
    throw invalidParams(errorMessage(err));
  }
  return id;
}

/**
 * `delete_key`: drop an identifier's token. Unknown identifiers are not an error.
 */
export async function deleteKey(params: unknown, tokenStore: TokenStore): Promise<string> {
  const id = parseDeleteKeyParams(params);
  if (!id) {
    throw invalidParams('ID or token cannot be empty');
  }
  try {
    await tokenStore.delete(id);
  } catch (err) {
    throw invalidParams(errorMessage(err));
  }
  return id;
}
