import ErrorCode from '../common/ErrorCode';
import InvalidInputError from '../common/InvalidInputError';

/**
 * Class containing generic input validation methods.
 */
export default class InputValidator {
  /**
   * Characters allowed in a key or service ID: base64url characters plus the DID URL delimiters,
   * since an ID can be a full DID URL or just a path fragment.
   */
  private static readonly idRegex = /^[a-zA-Z0-9_\-?#:/=&+%]*$/;

  /**
   * Checks if the given ID only uses characters allowed in a key or service ID.
   */
  public static isValidId (id: string): boolean {
    return InputValidator.idRegex.test(id);
  }

  /**
   * Validates the characters of the given key or service ID.
   * @throws InvalidInputError if the ID contains characters outside of the allowed set.
   */
  public static validateId (id: string) {
    if (!InputValidator.isValidId(id)) {
      throw new InvalidInputError(
        ErrorCode.PatchBuilderIdNotUsingAllowedCharacterSet,
        `ID '${id}' contains invalid characters. Must be a DID URL or path fragment.`
      );
    }
  }

  /**
   * Checks if the given input is a non-array object.
   */
  public static isNonArrayObject (input: unknown): input is Record<string, unknown> {
    return typeof input === 'object' && input !== null && !Array.isArray(input);
  }

  /**
   * Validates that the given input is of a non-array object type.
   * @param inputContextForErrorLogging This string is used for error logging purposes only. e.g. 'document', or 'service'.
   */
  public static validateNonArrayObject (
    input: unknown,
    errorCode: string,
    inputContextForErrorLogging: string
  ): asserts input is Record<string, unknown> {
    if (!InputValidator.isNonArrayObject(input)) {
      throw new InvalidInputError(errorCode, `Input ${inputContextForErrorLogging} is not a non-array object.`);
    }
  }

  /**
   * Validates that the given input is a string.
   * @param inputContextForErrorLogging This string is used for error logging purposes only. e.g. 'id'.
   */
  public static validateString (input: unknown, errorCode: string, inputContextForErrorLogging: string): asserts input is string {
    if (typeof input !== 'string') {
      throw new InvalidInputError(errorCode, `Input ${inputContextForErrorLogging} is of type '${typeof input}', but needs to be a string.`);
    }
  }

  /**
   * Validates that the given input is an array.
   * @param inputContextForErrorLogging This string is used for error logging purposes only. e.g. 'ids'.
   */
  public static validateArray (input: unknown, errorCode: string, inputContextForErrorLogging: string): asserts input is unknown[] {
    if (!Array.isArray(input)) {
      throw new InvalidInputError(errorCode, `Input ${inputContextForErrorLogging} is not an array.`);
    }
  }
}
