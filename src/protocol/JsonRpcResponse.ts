import { ValidationError } from '../errors/ValidationError.js';
import { parseProjection } from '../projection/parse.js';
import { JsonRpcResponseSchema } from '../projection/schemas.js';
import type { JsonRpcErrorData } from '../types/errors.js';
import {
  isProjectable,
  JSONRPC_VERSION,
  type JsonRpcId,
  type JsonRpcResponseProjection,
} from '../types/jsonrpc.js';
import { JsonRpcError } from './JsonRpcError.js';

export interface JsonRpcResponseInit {
  id?: JsonRpcId | null;
  result?: unknown;
  error?: JsonRpcError | JsonRpcErrorData;
}

/**
 * Reply to a JSON-RPC call. Carries a result or an error, never both.
 * A null id (the request could not be read) is left off the wire.
 */
export class JsonRpcResponse {
  readonly jsonrpc = JSONRPC_VERSION;
  readonly id?: JsonRpcId;
  readonly result?: unknown;
  readonly error?: JsonRpcError;

  constructor(init: JsonRpcResponseInit) {
    if (init.result !== undefined && init.result !== null && init.error !== undefined) {
      throw new ValidationError('JsonRpcResponse cannot carry both result and error', [
        { path: '', message: 'result and error are mutually exclusive' },
      ]);
    }
    this.id = init.id ?? undefined;
    this.result = init.result ?? undefined;
    if (init.error !== undefined) {
      this.error = init.error instanceof JsonRpcError ? init.error : new JsonRpcError(init.error);
    }
    Object.freeze(this);
  }

  static success(init: { id?: JsonRpcId | null; result: unknown }): JsonRpcResponse {
    return new JsonRpcResponse({ id: init.id, result: init.result });
  }

  static error(init: { id?: JsonRpcId | null; error: JsonRpcError | JsonRpcErrorData }): JsonRpcResponse {
    return new JsonRpcResponse({ id: init.id, error: init.error });
  }

  isSuccess(): boolean {
    return this.error === undefined;
  }

  /**
   * Parse the result with `parse`, or throw the carried error as a `ProtocolError`.
   * @example response.unwrap((raw) => Task.fromProjection(raw))
   */
  unwrap<T>(parse: (raw: unknown) => T): T {
    if (this.error !== undefined) {
      throw this.error.toException();
    }
    return parse(this.result);
  }

  toProjection(): JsonRpcResponseProjection {
    const result = isProjectable(this.result) ? this.result.toProjection() : this.result;
    return {
      jsonrpc: this.jsonrpc,
      ...(this.id !== undefined ? { id: this.id } : {}),
      ...(result !== undefined ? { result } : {}),
      ...(this.error !== undefined ? { error: this.error.toProjection() } : {}),
    };
  }

  static fromProjection(raw: unknown): JsonRpcResponse {
    const projection = parseProjection(JsonRpcResponseSchema, raw, 'JsonRpcResponse');
    return new JsonRpcResponse({
      id: projection.id,
      result: projection.result,
      error: projection.error !== undefined ? JsonRpcError.fromProjection(projection.error) : undefined,
    });
  }
}
