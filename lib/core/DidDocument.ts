import DidDocumentModel, { ContextEntry } from './models/DidDocumentModel';
import KeyPurpose from './enums/KeyPurpose';
import PatchDocumentModel from './models/PatchDocumentModel';
import VerificationMethodModel from './models/VerificationMethodModel';
import VmRelationship from './VmRelationship';
import VmWithPurposeModel from './models/VmWithPurposeModel';

/**
 * Base JSON-LD context of every DID Document.
 */
export const DID_CONTEXT = 'https://www.w3.org/ns/did/v1';

/**
 * Class containing reusable DID Document related operations.
 */
export default class DidDocument {
  /**
   * Creates a DID Document without keys or services.
   */
  public static create (id: string, context: ContextEntry[] = [DID_CONTEXT]): DidDocumentModel {
    return {
      id,
      context: [...context]
    };
  }

  /**
   * Gets the verification method with the given ID from the given DID Document.
   * A relative ID such as `#key1` or `key1` matches on the fragment of the method ID.
   * Returns undefined if not found.
   */
  public static getVerificationMethod (didDocument: DidDocumentModel, keyId: string): VerificationMethodModel | undefined {
    const verificationMethods = didDocument.verificationMethod || [];

    const exactMatch = verificationMethods.find(verificationMethod => verificationMethod.id === keyId);
    if (exactMatch !== undefined) {
      return exactMatch;
    }

    const fragment = DidDocument.getFragment(keyId);
    return verificationMethods.find(verificationMethod => DidDocument.getFragment(verificationMethod.id) === fragment);
  }

  /**
   * Gets the verification methods usable for the given purpose.
   * Referenced methods are looked up in the document, embedded ones are returned as they are.
   * References to methods missing from the document are skipped.
   */
  public static getVerificationMethodsForPurpose (didDocument: DidDocumentModel, purpose: KeyPurpose): VerificationMethodModel[] {
    const verificationMethods: VerificationMethodModel[] = [];
    for (const entry of didDocument[purpose] || []) {
      const verificationMethod = VmRelationship.isReference(entry)
        ? DidDocument.getVerificationMethod(didDocument, entry.keyId)
        : entry.verificationMethod;

      if (verificationMethod !== undefined) {
        verificationMethods.push(verificationMethod);
      }
    }

    return verificationMethods;
  }

  /**
   * Creates the replacement document of a `replace` patch that recreates the keys and services of the given DID Document.
   * The purposes of each key are taken from the relationships referencing it.
   */
  public static toPatchDocument (didDocument: DidDocumentModel): PatchDocumentModel {
    const patchDocument: PatchDocumentModel = {};

    if (didDocument.verificationMethod !== undefined) {
      patchDocument.publicKeys = didDocument.verificationMethod.map(verificationMethod => {
        const reference = VmRelationship.reference(verificationMethod.id);
        const purposes = Object.values(KeyPurpose).filter(purpose =>
          (didDocument[purpose] || []).some(entry => VmRelationship.equals(entry, reference))
        );

        const publicKey: VmWithPurposeModel = { ...verificationMethod };
        if (purposes.length > 0) {
          publicKey.purposes = purposes;
        }
        return publicKey;
      });
    }

    if (didDocument.service !== undefined) {
      patchDocument.services = [...didDocument.service];
    }

    return patchDocument;
  }

  /**
   * Gets the fragment of the given ID including the leading `#`, treating an ID without `#` as a bare fragment.
   */
  private static getFragment (id: string): string {
    const index = id.indexOf('#');
    return index < 0 ? `#${id}` : id.substring(index);
  }
}
