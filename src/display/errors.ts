/**
 * Base class for every failure raised by a display backend
 */
export class DisplayError extends Error {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = new.target.name;
	}
}

/**
 * The control socket does not exist or refused the connection
 */
export class ConnectionError extends DisplayError {}

/**
 * The connection broke while writing the command or reading the response
 */
export class IoError extends DisplayError {}

/**
 * A compositor response could not be parsed
 */
export class FormatError extends DisplayError {}

/**
 * No monitor with ID 0 was reported
 */
export class NotFoundError extends DisplayError {}

/**
 * More than one monitor claims ID 0
 */
export class AmbiguousError extends DisplayError {}

/**
 * No backend exists for this platform or session
 */
export class UnsupportedError extends DisplayError {}
