/**
 * @fileoverview Defines the error codes and the McpError class shared by every layer.
 * @module src/types-global/errors
 */

/**
 * JSON-RPC 2.0 error codes, plus implementation-defined codes in the
 * server error range (-32000 to -32099).
 */
export enum JsonRpcErrorCode {
  ParseError = -32700,
  InvalidRequest = -32600,
  MethodNotFound = -32601,
  InvalidParams = -32602,
  InternalError = -32603,
  ServiceUnavailable = -32000,
  NotFound = -32001,
  Conflict = -32002,
  Timeout = -32004,
  ValidationError = -32007,
  ConfigurationError = -32008,
  UnknownError = -32099,
}

/**
 * Error carrying a JSON-RPC code and optional structured data.
 * Thrown by services and mapped to tool results or CLI exit codes at the edges.
 */
export class McpError extends Error {
  public readonly code: JsonRpcErrorCode;
  public readonly data?: Record<string, unknown>;

  constructor(
    code: JsonRpcErrorCode,
    message: string,
    data?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'McpError';
    this.code = code;
    this.data = data;
    Object.setPrototypeOf(this, McpError.prototype);
  }
}
