import { JSONRPCErrorCode, JSONRPCErrorException } from 'json-rpc-2.0';
import { errorMessage } from '../utils';

/**
 * Every failure that reaches the caller is an invalid-params error.
 * Callers tell them apart by message only.
 */
export function invalidParams(message: string): JSONRPCErrorException {
  return new JSONRPCErrorException(message, JSONRPCErrorCode.InvalidParams);
}

/**
 * Wraps a collaborator failure (token store, time range, evaluator).
 * The message is prefixed and `data` is an empty detail string.
 */
export function invalidParamsWithDetails(cause: unknown): JSONRPCErrorException {
  return new JSONRPCErrorException(
    `Invalid parameters: ${errorMessage(cause)}`,
    JSONRPCErrorCode.InvalidParams,
    ''
  );
}
