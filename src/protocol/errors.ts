import type { ZodIssue } from 'zod';

export class EngineLinkError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EngineLinkError';
  }
}

/** Bad constructor or call arguments; raised before any I/O. */
export class ValidationError extends EngineLinkError {
  readonly issues: ZodIssue[];

  constructor(message: string, issues: ZodIssue[] = []) {
    super(message);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/** Transport open, authentication or send failure, or a lost connection. */
export class ConnectionError extends EngineLinkError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConnectionError';
  }
}

export class RequestTimeoutError extends EngineLinkError {
  readonly requestId: string;
  readonly timeoutMs: number;

  constructor(requestId: string, timeoutMs: number) {
    super(`Request ${requestId} timed out after ${timeoutMs} ms`);
    this.name = 'RequestTimeoutError';
    this.requestId = requestId;
    this.timeoutMs = timeoutMs;
  }
}

/** The peer answered with a non-success status. */
export class RemoteError extends EngineLinkError {
  readonly remoteMessage: string;
  readonly requestId?: string;

  constructor(message: string, remoteMessage: string, requestId?: string) {
    super(message);
    this.name = 'RemoteError';
    this.remoteMessage = remoteMessage;
    this.requestId = requestId;
  }
}

/** Malformed or unclassifiable inbound frame. Logged by the receive loop, never thrown to callers. */
export class ProtocolError extends EngineLinkError {
  readonly frame: string;

  constructor(message: string, frame: string) {
    super(message);
    this.name = 'ProtocolError';
    this.frame = frame;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
