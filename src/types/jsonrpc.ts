import type { JsonRpcErrorData } from './errors.js';

export const JSONRPC_VERSION = '2.0';

export type JsonRpcId = string | number;

export type JsonRpcParams = Record<string, unknown> | unknown[];

/** Structured params: an object or an array, never a scalar. */
export function isJsonRpcParams(value: unknown): value is JsonRpcParams {
  return Array.isArray(value) || (typeof value === 'object' && value !== null);
}

export const METHODS = [
  'tasks/send',
  'tasks/sendSubscribe',
  'tasks/get',
  'tasks/cancel',
  'tasks/resubscribe',
  'tasks/pushNotification/set',
  'tasks/pushNotification/get',
] as const;

export type MethodName = (typeof METHODS)[number];

export interface JsonRpcRequestProjection {
  jsonrpc: typeof JSONRPC_VERSION;
  id?: JsonRpcId;
  method: string;
  params?: JsonRpcParams;
}

export interface JsonRpcResponseProjection {
  jsonrpc: typeof JSONRPC_VERSION;
  id?: JsonRpcId;
  result?: unknown;
  error?: JsonRpcErrorData;
}

/** Anything that can render itself into its wire shape. */
export interface Projectable<T = unknown> {
  toProjection(): T;
}

export function isProjectable(value: unknown): value is Projectable {
  return (
    typeof value === 'object' &&
    value !== null &&
    'toProjection' in value &&
    typeof value.toProjection === 'function'
  );
}
