import ErrorCode from '../common/ErrorCode';
import InputValidator from './InputValidator';
import InvalidInputError from '../common/InvalidInputError';
import Logger from '../common/Logger';

/**
 * Parsers turning the string and object forms of a list element into its in-memory form.
 * A missing parser means that form is not accepted.
 */
export interface FlexibleListParsers<T> {
  fromString?: (input: string) => T;
  fromObject?: (input: Record<string, unknown>) => T;
}

/**
 * Codec for JSON properties that hold either a single element or a list of elements.
 * Output is compact: a single element is written bare. Input is permissive, see `deserialize()`.
 */
export default class FlexibleList {
  /**
   * Writes a one element list as the bare element, and any other list as an array.
   */
  public static serialize<T> (values: T[]): T | T[] {
    return values.length === 1 ? values[0] : [...values];
  }

  /**
   * Reads a bare string, a bare object, an array mixing strings and objects,
   * or a string holding a JSON encoded array, into an ordered list.
   * @param inputContextForErrorLogging This string is used for error logging purposes only. e.g. 'controller'.
   * @throws InvalidInputError if the input or one of its elements is of an unsupported type.
   */
  public static deserialize<T> (input: unknown, parsers: FlexibleListParsers<T>, inputContextForErrorLogging: string): T[] {
    if (typeof input === 'string' && input.startsWith('[')) {
      return FlexibleList.deserializeEncodedArray(input, parsers, inputContextForErrorLogging);
    }

    if (Array.isArray(input)) {
      return input.map(element => FlexibleList.deserializeElement(element, parsers, inputContextForErrorLogging));
    }

    if (typeof input === 'string' || InputValidator.isNonArrayObject(input)) {
      return [FlexibleList.deserializeElement(input, parsers, inputContextForErrorLogging)];
    }

    throw new InvalidInputError(
      ErrorCode.FlexibleListInputIncorrectType,
      `Input ${inputContextForErrorLogging} must be a string, an object or an array, but is of type '${typeof input}'.`
    );
  }

  /**
   * An encoded array that is not valid JSON, or not an array, reads as an empty list.
   */
  private static deserializeEncodedArray<T> (input: string, parsers: FlexibleListParsers<T>, inputContextForErrorLogging: string): T[] {
    let decoded: unknown;
    try {
      decoded = JSON.parse(input);
    } catch (error) {
      Logger.warn(`Input ${inputContextForErrorLogging} holds a malformed JSON array, reading it as empty: ${error}`);
      return [];
    }

    if (!Array.isArray(decoded)) {
      Logger.warn(`Input ${inputContextForErrorLogging} does not hold a JSON array, reading it as empty.`);
      return [];
    }

    return decoded.map(element => FlexibleList.deserializeElement(element, parsers, inputContextForErrorLogging));
  }

  private static deserializeElement<T> (element: unknown, parsers: FlexibleListParsers<T>, inputContextForErrorLogging: string): T {
    if (typeof element === 'string') {
      if (parsers.fromString === undefined) {
        throw new InvalidInputError(ErrorCode.FlexibleListStringNotAccepted, `Input ${inputContextForErrorLogging} cannot contain a string.`);
      }
      return parsers.fromString(element);
    }

    if (InputValidator.isNonArrayObject(element)) {
      if (parsers.fromObject === undefined) {
        throw new InvalidInputError(ErrorCode.FlexibleListElementIncorrectType, `Input ${inputContextForErrorLogging} cannot contain an object.`);
      }
      return parsers.fromObject(element);
    }

    throw new InvalidInputError(
      ErrorCode.FlexibleListElementIncorrectType,
      `Input ${inputContextForErrorLogging} contains an element of type '${typeof element}', only strings and objects are allowed.`
    );
  }
}
