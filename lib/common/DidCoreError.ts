/**
 * Standardized error class for throwing errors internal to this project.
 */
export default class DidCoreError extends Error {
  constructor (public code: string, message?: string) {
    super(message ? message : code);

    // NOTE: Extending 'Error' breaks prototype chain since TypeScript 2.1.
    // The following line restores prototype chain.
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
