export type ErrorCode =
  | "TRANSPORT"
  | "NOT_CONNECTED"
  | "SESSION"
  | "VALIDATION"
  | "TIMEOUT";

export class CrawlBridgeError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.code = code;
    this.name = "CrawlBridgeError";
  }
}

/** The socket was refused or closed. The caller has to reconnect explicitly. */
export class TransportError extends CrawlBridgeError {
  constructor(message: string) {
    super("TRANSPORT", message);
    this.name = "TransportError";
  }
}

export class NotConnectedError extends CrawlBridgeError {
  constructor(message = "Not connected to server") {
    super("NOT_CONNECTED", message);
    this.name = "NotConnectedError";
  }
}

export class SessionError extends CrawlBridgeError {
  constructor(message: string) {
    super("SESSION", message);
    this.name = "SessionError";
  }
}

export class ValidationError extends CrawlBridgeError {
  readonly errors: string[];

  constructor(label: string, errors: string[]) {
    super("VALIDATION", `Invalid ${label}: ${errors.join("; ")}`);
    this.errors = errors;
    this.name = "ValidationError";
  }
}

export class TimeoutError extends CrawlBridgeError {
  constructor(message: string) {
    super("TIMEOUT", message);
    this.name = "TimeoutError";
  }
}
