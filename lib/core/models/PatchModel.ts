import PatchAction from '../enums/PatchAction';
import PatchDocumentModel from './PatchDocumentModel';
import ServiceModel from './ServiceModel';
import VmWithPurposeModel from './VmWithPurposeModel';

/**
 * A single patch to a DID Document.
 * Only the property matching `action` is meaningful:
 * `document` for replace, `publicKeys` for add-public-keys, `services` for add-services,
 * and `ids` for remove-public-keys and remove-services.
 */
export default interface PatchModel {
  action: PatchAction;
  document?: PatchDocumentModel;
  services?: ServiceModel[];
  ids?: string[];
  publicKeys?: VmWithPurposeModel[];
}
