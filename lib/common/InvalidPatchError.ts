import DidCoreError from './DidCoreError';

/**
 * Raised when a patch has the wrong shape for its action:
 * a setter used against the wrong action, a missing payload, or a duplicate entry within one patch.
 */
export default class InvalidPatchError extends DidCoreError { }
