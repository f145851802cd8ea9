import JwkModel from './JwkModel';

/**
 * Interface representing an entry of the `verificationMethod` array of a DID Document.
 * Key material is carried either as a JWK or as a multibase string; the encoding is up to the DID method.
 */
export default interface VerificationMethodModel {
  id: string;
  controller: string;
  type: string;
  publicKeyJwk?: JwkModel;
  publicKeyMultibase?: string;
}
