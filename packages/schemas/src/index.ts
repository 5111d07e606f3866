export * from "./types.js";
export {
  CrawlBridgeError, TransportError, NotConnectedError, SessionError, ValidationError, TimeoutError,
} from "./errors.js";
export type { ErrorCode } from "./errors.js";
export { systemClock, withTimeout, remainingMs } from "./timeout.js";
export type { Clock } from "./timeout.js";
export { ClientConfigSchema, AutoPlayOptionsSchema } from "./config.schema.js";
export { validateClientConfigData, validateAutoPlayOptionsData, parseClientConfig } from "./validator.js";
export type { ValidationResult } from "./validator.js";
