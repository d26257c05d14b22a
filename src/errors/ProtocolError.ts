import { ErrorCodes, type JsonRpcErrorData } from '../types/errors.js';

/**
 * Error with a stable numeric code that may cross the wire.
 * `JsonRpcError.fromException` copies code, message and data from these verbatim.
 */
export class ProtocolError extends Error {
  readonly code: number;
  readonly data?: unknown;

  constructor(code: number, message: string, data?: unknown) {
    super(message);
    this.name = 'ProtocolError';
    this.code = code;
    this.data = data;
  }

  toJSON(): JsonRpcErrorData {
    return {
      code: this.code,
      message: this.message,
      ...(this.data !== undefined && this.data !== null ? { data: this.data } : {}),
    };
  }

  static parseError(data?: unknown): JsonParseError {
    return new JsonParseError(data);
  }

  static invalidRequest(data?: unknown): InvalidRequestError {
    return new InvalidRequestError(data);
  }

  static methodNotFound(method: string): MethodNotFoundError {
    return new MethodNotFoundError({ method });
  }

  static invalidParams(data?: unknown): InvalidParamsError {
    return new InvalidParamsError(data);
  }

  static internal(data?: unknown): InternalError {
    return new InternalError(data);
  }

  static taskNotFound(): TaskNotFoundError {
    return new TaskNotFoundError();
  }

  static taskNotCancelable(): TaskNotCancelableError {
    return new TaskNotCancelableError();
  }

  static pushNotificationNotSupported(): PushNotificationNotSupportedError {
    return new PushNotificationNotSupportedError();
  }

  static unsupportedOperation(): UnsupportedOperationError {
    return new UnsupportedOperationError();
  }
}

// ---------- JSON-RPC standard errors ----------

export class JsonParseError extends ProtocolError {
  constructor(data?: unknown) {
    super(ErrorCodes.JSON_PARSE, 'Invalid JSON payload', data);
    this.name = 'JsonParseError';
  }
}

export class InvalidRequestError extends ProtocolError {
  constructor(data?: unknown) {
    super(ErrorCodes.INVALID_REQUEST, 'Request payload validation error', data);
    this.name = 'InvalidRequestError';
  }
}

export class MethodNotFoundError extends ProtocolError {
  constructor(data?: unknown) {
    super(ErrorCodes.METHOD_NOT_FOUND, 'Method not found', data);
    this.name = 'MethodNotFoundError';
  }
}

export class InvalidParamsError extends ProtocolError {
  constructor(data?: unknown) {
    super(ErrorCodes.INVALID_PARAMS, 'Invalid parameters', data);
    this.name = 'InvalidParamsError';
  }
}

export class InternalError extends ProtocolError {
  constructor(data?: unknown) {
    super(ErrorCodes.INTERNAL_ERROR, 'Internal error', data);
    this.name = 'InternalError';
  }
}

// ---------- A2A errors ----------

export class TaskNotFoundError extends ProtocolError {
  constructor() {
    super(ErrorCodes.TASK_NOT_FOUND, 'Task not found');
    this.name = 'TaskNotFoundError';
  }
}

export class TaskNotCancelableError extends ProtocolError {
  constructor() {
    super(ErrorCodes.TASK_NOT_CANCELABLE, 'Task cannot be canceled');
    this.name = 'TaskNotCancelableError';
  }
}

export class PushNotificationNotSupportedError extends ProtocolError {
  constructor() {
    super(ErrorCodes.PUSH_NOTIFICATION_NOT_SUPPORTED, 'Push Notification is not supported');
    this.name = 'PushNotificationNotSupportedError';
  }
}

export class UnsupportedOperationError extends ProtocolError {
  constructor() {
    super(ErrorCodes.UNSUPPORTED_OPERATION, 'This operation is not supported');
    this.name = 'UnsupportedOperationError';
  }
}
