import VerificationMethodModel from './VerificationMethodModel';

/**
 * A verification relationship entry that refers to a verification method by ID.
 */
export interface VmReferenceModel {
  keyId: string;
}

/**
 * A verification relationship entry that embeds the full verification method.
 * NOTE: Embedded entries are carried for wire compatibility only, patches never modify them.
 */
export interface VmEmbeddedModel {
  verificationMethod: VerificationMethodModel;
}

/**
 * An entry of one of the five verification relationship arrays of a DID Document.
 */
type VmRelationshipModel = VmReferenceModel | VmEmbeddedModel;

export default VmRelationshipModel;
