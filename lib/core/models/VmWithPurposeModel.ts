import KeyPurpose from '../enums/KeyPurpose';
import VerificationMethodModel from './VerificationMethodModel';

/**
 * Data model representing a public key in the `publicKeys` array in patches.
 */
export default interface VmWithPurposeModel extends VerificationMethodModel {
  purposes?: KeyPurpose[];
}
