import ServiceModel from './ServiceModel';
import VmWithPurposeModel from './VmWithPurposeModel';

/**
 * The replacement document carried by a `replace` patch.
 */
export default interface PatchDocumentModel {
  publicKeys?: VmWithPurposeModel[];
  services?: ServiceModel[];
}
