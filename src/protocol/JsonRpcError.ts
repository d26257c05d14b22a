import { ProtocolError } from '../errors/ProtocolError.js';
import { parseProjection } from '../projection/parse.js';
import { JsonRpcErrorSchema } from '../projection/schemas.js';
import { ErrorCodes, type JsonRpcErrorData } from '../types/errors.js';

/** The `error` member of a JSON-RPC response. */
export class JsonRpcError {
  readonly code: number;
  readonly message: string;
  readonly data?: unknown;

  constructor(init: JsonRpcErrorData) {
    this.code = init.code;
    this.message = init.message;
    this.data = init.data ?? undefined;
    Object.freeze(this);
  }

  toProjection(): JsonRpcErrorData {
    return {
      code: this.code,
      message: this.message,
      ...(this.data !== undefined ? { data: this.data } : {}),
    };
  }

  /** Rebuild the thrown form, e.g. on the client side of a failed call. */
  toException(): ProtocolError {
    return new ProtocolError(this.code, this.message, this.data);
  }

  static fromProjection(raw: unknown): JsonRpcError {
    return new JsonRpcError(parseProjection(JsonRpcErrorSchema, raw, 'JsonRpcError'));
  }

  /**
   * Map anything thrown to a wire error. Protocol errors keep their code,
   * message and data; everything else becomes an internal error carrying
   * only its message.
   */
  static fromException(error: unknown): JsonRpcError {
    if (error instanceof ProtocolError) {
      return new JsonRpcError({ code: error.code, message: error.message, data: error.data });
    }
    const message = error instanceof Error ? error.message : String(error);
    return new JsonRpcError({ code: ErrorCodes.INTERNAL_ERROR, message });
  }
}
