import VerificationMethodModel from './models/VerificationMethodModel';
import VmRelationshipModel, { VmEmbeddedModel, VmReferenceModel } from './models/VmRelationshipModel';

/**
 * Class containing operations on verification relationship entries.
 */
export default class VmRelationship {
  /**
   * Creates an entry that refers to the verification method with the given ID.
   */
  public static reference (keyId: string): VmReferenceModel {
    return { keyId };
  }

  /**
   * Creates an entry that embeds the given verification method.
   */
  public static embedded (verificationMethod: VerificationMethodModel): VmEmbeddedModel {
    return { verificationMethod };
  }

  public static isReference (entry: VmRelationshipModel): entry is VmReferenceModel {
    return 'keyId' in entry;
  }

  /**
   * Gets the referenced key ID, or `undefined` for an embedded entry.
   */
  public static keyIdOf (entry: VmRelationshipModel): string | undefined {
    return VmRelationship.isReference(entry) ? entry.keyId : undefined;
  }

  /**
   * Two entries are equal when both refer to the same key ID.
   * An embedded entry is never equal to anything, so patches cannot touch it.
   */
  public static equals (entry1: VmRelationshipModel, entry2: VmRelationshipModel): boolean {
    const keyId = VmRelationship.keyIdOf(entry1);
    return keyId !== undefined && keyId === VmRelationship.keyIdOf(entry2);
  }
}
