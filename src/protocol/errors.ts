/**
 * Base class for conditions that abort decoding of the current stream.
 */
export class ProtocolError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ProtocolError";
  }
}

/**
 * A record's command byte has no registered length, so there is no way to
 * find where the record ends.
 */
export class UnknownCommandError extends ProtocolError {
  constructor(readonly command: number) {
    super(`No event size registered for command 0x${command.toString(16).padStart(2, "0")}`);
    this.name = "UnknownCommandError";
  }
}

/**
 * The stream predates the minimum supported protocol version and the caller
 * did not opt into legacy streams.
 */
export class UnsupportedVersionError extends ProtocolError {
  constructor(readonly version: string, readonly minimum: string) {
    super(`Stream version ${version} is older than ${minimum}; enable allowOldVersion to decode it`);
    this.name = "UnsupportedVersionError";
  }
}
