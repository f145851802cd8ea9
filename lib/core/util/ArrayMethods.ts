/**
 * Class containing methods that operates against an array.
 */
export default class ArrayMethods {
  /**
   * Checks to see if there are duplicates in the given array.
   */
  public static hasDuplicates<T> (array: readonly T[]): boolean {
    const uniqueValues = new Set<T>();

    for (const value of array) {
      if (uniqueValues.has(value)) {
        return true;
      }
      uniqueValues.add(value);
    }

    return false;
  }
}
