import DidCoreError from './DidCoreError';

/**
 * Raised when a value given to the library is malformed, e.g. an identifier with illegal characters.
 */
export default class InvalidInputError extends DidCoreError { }
