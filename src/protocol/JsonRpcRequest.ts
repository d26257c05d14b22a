import { parseProjection } from '../projection/parse.js';
import { JsonRpcRequestSchema } from '../projection/schemas.js';
import {
  isJsonRpcParams,
  isProjectable,
  JSONRPC_VERSION,
  type JsonRpcId,
  type JsonRpcParams,
  type JsonRpcRequestProjection,
  type Projectable,
} from '../types/jsonrpc.js';

export interface JsonRpcRequestInit {
  method: string;
  /** Raw params, or an entity such as `TaskSendParams` that projects itself. */
  params?: JsonRpcParams | Projectable;
  id?: JsonRpcId;
}

/** A JSON-RPC call. Without an `id` it is a notification and gets no response. */
export class JsonRpcRequest {
  readonly jsonrpc = JSONRPC_VERSION;
  readonly method: string;
  readonly params?: JsonRpcParams | Projectable;
  readonly id?: JsonRpcId;

  constructor(init: JsonRpcRequestInit) {
    this.method = init.method;
    this.params = init.params;
    this.id = init.id;
    Object.freeze(this);
  }

  get isNotification(): boolean {
    return this.id === undefined;
  }

  toProjection(): JsonRpcRequestProjection {
    const params = isProjectable(this.params) ? this.params.toProjection() : this.params;
    return {
      jsonrpc: this.jsonrpc,
      ...(this.id !== undefined ? { id: this.id } : {}),
      method: this.method,
      ...(isJsonRpcParams(params) ? { params } : {}),
    };
  }

  static fromProjection(raw: unknown): JsonRpcRequest {
    const projection = parseProjection(JsonRpcRequestSchema, raw, 'JsonRpcRequest');
    return new JsonRpcRequest({
      method: projection.method,
      params: projection.params,
      id: projection.id,
    });
  }
}
