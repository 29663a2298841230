// src/errors.ts

/**
 * Base class for all RAMSES codec errors
 */
export class RamsesError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RamsesError';
  }
}

// --- Errors for Frame Structure ---

/**
 * Error class for a frame that is not legal for its code, verb or devices
 */
export class CorruptFrameError extends RamsesError {
  constructor(message: string = 'Corrupt frame') {
    super(message);
    this.name = 'CorruptFrameError';
  }
}

/**
 * Error class for an address set that no device would send
 */
export class CorruptAddressError extends CorruptFrameError {
  constructor(addrs: string) {
    super(`Invalid address set: ${addrs}`);
    this.name = 'CorruptAddressError';
  }
}

/**
 * Error class for a payload that fails its pattern or a structural check
 */
export class CorruptPayloadError extends RamsesError {
  constructor(message: string = 'Corrupt payload') {
    super(message);
    this.name = 'CorruptPayloadError';
  }
}

/**
 * Throws a CorruptPayloadError unless the condition holds
 * @param condition - the check
 * @param message - what failed, usually the offending part of the payload
 */
export function assertPayload(condition: boolean, message: string): asserts condition {
  if (!condition) {
    throw new CorruptPayloadError(message);
  }
}

// --- Errors for Decoding ---

/**
 * Error class for a code that has no parser
 */
export class NotImplementedCodeError extends RamsesError {
  code: string;

  constructor(code: string) {
    super(`Unknown packet code (cannot parse): ${code}`);
    this.name = 'NotImplementedCodeError';
    this.code = code;
  }
}

/**
 * Error class for a fault inside a parser that malformed input does not
 * explain (a lookup, type or range failure)
 */
export class CodingError extends RamsesError {
  constructor(cause: unknown) {
    const detail = cause instanceof Error ? `${cause.name}(${cause.message})` : String(cause);
    super(`Coding error: ${detail}`, { cause });
    this.name = 'CodingError';
  }
}

// --- Errors for Commands ---

/**
 * Error class for command arguments that cannot be encoded
 */
export class CommandInvalidError extends RamsesError {
  constructor(message: string = 'Invalid command') {
    super(message);
    this.name = 'CommandInvalidError';
  }
}

/**
 * Throws a CommandInvalidError unless the condition holds
 */
export function assertCommand(condition: boolean, message: string): asserts condition {
  if (!condition) {
    throw new CommandInvalidError(message);
  }
}

// --- Errors for Fault Log Retrieval ---

/**
 * Error class for a response that did not arrive in time
 */
export class ExpiredCallbackError extends RamsesError {
  constructor(message: string = 'Callback expired before a response arrived') {
    super(message);
    this.name = 'ExpiredCallbackError';
  }
}

/**
 * Error class for a retrieval cancelled by its caller
 */
export class FaultLogAbortedError extends RamsesError {
  constructor(message: string = 'Fault log retrieval was aborted') {
    super(message);
    this.name = 'FaultLogAbortedError';
  }
}
