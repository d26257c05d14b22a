/** JSON-RPC standard codes followed by the protocol-specific range. */
export const ErrorCodes = {
  JSON_PARSE: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,
  TASK_NOT_FOUND: -32001,
  TASK_NOT_CANCELABLE: -32002,
  PUSH_NOTIFICATION_NOT_SUPPORTED: -32003,
  UNSUPPORTED_OPERATION: -32004,
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/** Wire shape of a JSON-RPC error object. */
export interface JsonRpcErrorData {
  code: number;
  message: string;
  data?: unknown;
}
