import type { ServiceName } from './types.js';

/**
 * Why a service operation was skipped. None of these abort a dispatch;
 * they turn into a no-op or a descriptive status.
 */
export type SkipReason =
  | { code: 'tool-missing'; tool: string }
  | { code: 'not-configured'; detail: string }
  | { code: 'not-initialized'; path: string }
  | { code: 'disabled' };

export type ServiceOperation = 'start' | 'stop' | 'status';

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export class ServiceOperationError extends Error {
  public readonly service: ServiceName;
  public readonly operation: ServiceOperation;

  constructor(service: ServiceName, operation: ServiceOperation, cause: unknown) {
    super(`${service} ${operation} failed: ${getErrorMessage(cause)}`, { cause });
    this.name = 'ServiceOperationError';
    this.service = service;
    this.operation = operation;
  }
}
