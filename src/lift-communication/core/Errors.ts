// Error taxonomy shared by every layer of the lift client.

export class HexLiftError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The session could not be established or re-established. */
export class ConnectionError extends HexLiftError {}

/** A send on an otherwise established session failed, or the session is not connected. */
export class TransportError extends HexLiftError {}

/** A command could not be turned into a wire message. */
export class EncodingError extends HexLiftError {}

/** An inbound frame was malformed or does not match the schema this client was built against. */
export class DecodingError extends HexLiftError {}

/** A caller supplied an out-of-range or malformed value. */
export class ValidationError extends HexLiftError {}

/** An operation was requested in a state that does not allow it. */
export class InvalidStateError extends HexLiftError {}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
