import { ProtocolError } from '../errors/ProtocolError.js';
import { ValidationError } from '../errors/ValidationError.js';
import type { AgentCard } from '../models/AgentCard.js';
import { type Clock, systemClock } from '../models/clock.js';
import { isPlainObject } from '../projection/keys.js';
import { JsonRpcError } from '../protocol/JsonRpcError.js';
import { JsonRpcRequest } from '../protocol/JsonRpcRequest.js';
import { JsonRpcResponse } from '../protocol/JsonRpcResponse.js';
import {
  TaskIdParams,
  TaskPushNotificationConfig,
  TaskQueryParams,
  TaskSendParams,
} from '../protocol/params.js';
import type { AgentCardProjection } from '../types/agent-card.js';
import type {
  HandlerContext,
  MethodHandler,
  StreamMethod,
  StreamMethodHandler,
  StreamMethodMap,
  UnaryMethod,
  UnaryMethodMap,
} from '../types/handler.js';
import { isProjectable, type JsonRpcId, type Projectable } from '../types/jsonrpc.js';
import type { Logger, TaskStore } from '../types/plugin.js';

export interface RequestDispatcherConfig {
  card: AgentCard;
  taskStore?: TaskStore;
  /** Optional logger for diagnostic events. */
  logger?: Logger;
  /** Clock handed to handlers for stamping statuses (default: system time). */
  clock?: Clock;
}

type ErasedHandler = (params: unknown, context: HandlerContext) => Promise<Projectable>;
type ErasedStreamHandler = (params: unknown, context: HandlerContext) => AsyncIterable<Projectable>;

const UNARY_PARAMS: { [M in UnaryMethod]: (raw: unknown) => UnaryMethodMap[M]['params'] } = {
  'tasks/send': (raw) => TaskSendParams.fromProjection(raw),
  'tasks/get': (raw) => TaskQueryParams.fromProjection(raw),
  'tasks/cancel': (raw) => TaskIdParams.fromProjection(raw),
  'tasks/pushNotification/set': (raw) => TaskPushNotificationConfig.fromProjection(raw),
  'tasks/pushNotification/get': (raw) => TaskIdParams.fromProjection(raw),
};

const STREAM_PARAMS: { [M in StreamMethod]: (raw: unknown) => StreamMethodMap[M]['params'] } = {
  'tasks/sendSubscribe': (raw) => TaskSendParams.fromProjection(raw),
  'tasks/resubscribe': (raw) => TaskQueryParams.fromProjection(raw),
};

const PUSH_NOTIFICATION_METHODS: ReadonlySet<string> = new Set([
  'tasks/pushNotification/set',
  'tasks/pushNotification/get',
]);

/** Params that fail validation are the caller's fault: report them as invalid params. */
function parseParams<T>(parse: (raw: unknown) => T, raw: unknown): T {
  try {
    return parse(raw);
  } catch (err) {
    if (err instanceof ValidationError) {
      throw ProtocolError.invalidParams({ message: err.message, issues: err.issues });
    }
    throw err;
  }
}

function salvageId(payload: unknown): JsonRpcId | undefined {
  if (!isPlainObject(payload)) return undefined;
  const { id } = payload;
  return typeof id === 'string' || typeof id === 'number' ? id : undefined;
}

/**
 * Routes JSON-RPC payloads to registered handlers and turns every outcome
 * into a response. This is the one place where thrown errors become wire
 * errors; the transport in front of it only moves bytes.
 */
export class RequestDispatcher {
  readonly card: AgentCard;

  private readonly taskStore?: TaskStore;
  private readonly logger?: Logger;
  private readonly clock: Clock;
  private readonly handlers = new Map<string, ErasedHandler>();
  private readonly streamHandlers = new Map<string, ErasedStreamHandler>();

  constructor(config: RequestDispatcherConfig) {
    this.card = config.card;
    this.taskStore = config.taskStore;
    this.logger = config.logger;
    this.clock = config.clock ?? systemClock;
  }

  /** Register a request-response handler for a method. */
  handle<M extends UnaryMethod>(method: M, handler: MethodHandler<M>): this {
    const parse = UNARY_PARAMS[method];
    this.handlers.set(method, async (raw, context) => handler(parseParams(parse, raw), context));
    return this;
  }

  /** Register a streaming handler for a method. */
  handleStream<M extends StreamMethod>(method: M, handler: StreamMethodHandler<M>): this {
    const parse = STREAM_PARAMS[method];
    this.streamHandlers.set(method, (raw, context) => handler(parseParams(parse, raw), context));
    return this;
  }

  /** The discovery document, served at `AGENT_CARD_PATH` (`/.well-known/agent.json`). */
  agentCard(): AgentCardProjection {
    return this.card.toProjection();
  }

  /**
   * Handle one decoded request object.
   * Resolves to `undefined` for notifications, which get no response.
   */
  async dispatch(payload: unknown): Promise<JsonRpcResponse | undefined> {
    const request = this.readRequest(payload);
    if (request instanceof JsonRpcResponse) return request;

    try {
      const handler = this.resolveHandler(request.method);
      const result = await handler(this.paramsOf(request), this.context(request));
      if (request.isNotification) return undefined;
      return JsonRpcResponse.success({ id: request.id, result });
    } catch (err) {
      return this.fail(request, err);
    }
  }

  /**
   * Handle a raw request body, single or batch, and return the body to send
   * back (`undefined` when there is nothing to send).
   */
  async dispatchBody(body: string): Promise<string | undefined> {
    let payload: unknown;
    try {
      payload = JSON.parse(body);
    } catch (err) {
      this.logger?.('warn', 'Rejected unparseable payload', {
        error: err instanceof Error ? err.message : String(err),
      });
      const response = JsonRpcResponse.error({
        error: JsonRpcError.fromException(ProtocolError.parseError()),
      });
      return JSON.stringify(response.toProjection());
    }

    if (!Array.isArray(payload)) {
      const response = await this.dispatch(payload);
      return response !== undefined ? JSON.stringify(response.toProjection()) : undefined;
    }

    if (payload.length === 0) {
      const response = JsonRpcResponse.error({
        error: JsonRpcError.fromException(ProtocolError.invalidRequest({ reason: 'Empty batch' })),
      });
      return JSON.stringify(response.toProjection());
    }

    const responses = await Promise.all(payload.map((entry) => this.dispatch(entry)));
    const replies = responses
      .filter((response): response is JsonRpcResponse => response !== undefined)
      .map((response) => response.toProjection());
    return replies.length > 0 ? JSON.stringify(replies) : undefined;
  }

  /**
   * Handle a streaming request: one success response per event, sharing the
   * request id. A failure ends the stream with a single error response.
   */
  async *dispatchStream(payload: unknown): AsyncGenerator<JsonRpcResponse, void, undefined> {
    const request = this.readRequest(payload);
    if (request instanceof JsonRpcResponse) {
      yield request;
      return;
    }

    try {
      const handler = this.resolveStreamHandler(request.method);
      const events = handler(this.paramsOf(request), this.context(request));
      for await (const event of events) {
        if (!request.isNotification) {
          yield JsonRpcResponse.success({ id: request.id, result: event });
        }
      }
    } catch (err) {
      const failure = this.fail(request, err);
      if (failure !== undefined) yield failure;
    }
  }

  // --- Private helpers ---

  private readRequest(payload: unknown): JsonRpcRequest | JsonRpcResponse {
    try {
      const request = JsonRpcRequest.fromProjection(payload);
      this.logger?.('debug', 'Dispatching request', { method: request.method, id: request.id });
      return request;
    } catch (err) {
      if (!(err instanceof ValidationError)) throw err;
      this.logger?.('warn', 'Rejected malformed request', { issues: err.issues });
      return JsonRpcResponse.error({
        id: salvageId(payload),
        error: JsonRpcError.fromException(ProtocolError.invalidRequest({ issues: err.issues })),
      });
    }
  }

  private resolveHandler(method: string): ErasedHandler {
    const handler = this.handlers.get(method);
    if (handler) {
      if (PUSH_NOTIFICATION_METHODS.has(method) && !this.card.capabilities.pushNotifications) {
        throw ProtocolError.pushNotificationNotSupported();
      }
      return handler;
    }
    if (this.streamHandlers.has(method)) {
      throw ProtocolError.unsupportedOperation();
    }
    throw ProtocolError.methodNotFound(method);
  }

  private resolveStreamHandler(method: string): ErasedStreamHandler {
    const handler = this.streamHandlers.get(method);
    if (handler) {
      if (!this.card.capabilities.streaming) {
        throw ProtocolError.unsupportedOperation();
      }
      return handler;
    }
    if (this.handlers.has(method)) {
      throw ProtocolError.unsupportedOperation();
    }
    throw ProtocolError.methodNotFound(method);
  }

  /** Params built in-process may still be entities; handlers always parse the wire shape. */
  private paramsOf(request: JsonRpcRequest): unknown {
    return isProjectable(request.params) ? request.params.toProjection() : request.params;
  }

  private context(request: JsonRpcRequest): HandlerContext {
    return { request, card: this.card, taskStore: this.taskStore, clock: this.clock };
  }

  private fail(request: JsonRpcRequest, err: unknown): JsonRpcResponse | undefined {
    if (err instanceof ProtocolError) {
      this.logger?.('warn', `Request failed: ${err.message}`, {
        method: request.method,
        code: err.code,
      });
    } else {
      this.logger?.('error', 'Request handler error', { method: request.method, error: err });
    }
    if (request.isNotification) return undefined;
    return JsonRpcResponse.error({ id: request.id, error: JsonRpcError.fromException(err) });
  }
}
