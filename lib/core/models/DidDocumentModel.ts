import ServiceModel from './ServiceModel';
import VerificationMethodModel from './VerificationMethodModel';
import VmRelationshipModel from './VmRelationshipModel';

/**
 * An entry of the JSON-LD `@context` of a DID Document.
 */
export type ContextEntry = string | Record<string, unknown>;

/**
 * In-memory DID Document.
 * Every list is held in normalized form; the compact wire form is handled by `DidDocumentSerializer`.
 * NOTE: The relationship arrays are either absent or non-empty, never empty.
 */
export default interface DidDocumentModel {
  id: string;
  context: ContextEntry[];
  controller?: string[];
  alsoKnownAs?: string[];
  verificationMethod?: VerificationMethodModel[];
  authentication?: VmRelationshipModel[];
  assertionMethod?: VmRelationshipModel[];
  keyAgreement?: VmRelationshipModel[];
  capabilityDelegation?: VmRelationshipModel[];
  capabilityInvocation?: VmRelationshipModel[];
  service?: ServiceModel[];
}
