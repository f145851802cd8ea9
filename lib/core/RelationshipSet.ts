import DidDocumentModel from './models/DidDocumentModel';
import KeyPurpose from './enums/KeyPurpose';
import VmRelationship from './VmRelationship';
import VmRelationshipModel from './models/VmRelationshipModel';

/**
 * Scratch copy of the five verification relationship arrays of a DID Document,
 * used while applying a single patch and written back right after.
 */
export default class RelationshipSet {
  private readonly relationships: Record<KeyPurpose, VmRelationshipModel[]>;

  /**
   * Creates a set with all five relationships empty.
   */
  public constructor () {
    this.relationships = {
      [KeyPurpose.Authentication]: [],
      [KeyPurpose.AssertionMethod]: [],
      [KeyPurpose.KeyAgreement]: [],
      [KeyPurpose.CapabilityDelegation]: [],
      [KeyPurpose.CapabilityInvocation]: []
    };
  }

  /**
   * Creates a set holding copies of the relationship arrays of the given document.
   * An absent relationship becomes an empty array.
   */
  public static fromDocument (document: DidDocumentModel): RelationshipSet {
    const relationshipSet = new RelationshipSet();
    for (const purpose of Object.values(KeyPurpose)) {
      const entries = document[purpose];
      if (entries !== undefined) {
        relationshipSet.relationships[purpose].push(...entries);
      }
    }

    return relationshipSet;
  }

  /**
   * Appends the entry to the relationship of the given purpose.
   * NOTE: No de-duplication is done.
   */
  public push (purpose: KeyPurpose, entry: VmRelationshipModel) {
    this.relationships[purpose].push(entry);
  }

  /**
   * Removes every occurrence of the entry from all relationships.
   */
  public remove (entry: VmRelationshipModel) {
    for (const purpose of Object.values(KeyPurpose)) {
      this.relationships[purpose] = this.relationships[purpose].filter(existing => !VmRelationship.equals(existing, entry));
    }
  }

  /**
   * Gets the entries currently held for the given purpose.
   */
  public get (purpose: KeyPurpose): readonly VmRelationshipModel[] {
    return this.relationships[purpose];
  }

  /**
   * Writes the relationships back into the given document.
   * An empty relationship is removed from the document instead of being written as an empty array.
   */
  public flushInto (document: DidDocumentModel) {
    for (const purpose of Object.values(KeyPurpose)) {
      const entries = this.relationships[purpose];
      if (entries.length > 0) {
        document[purpose] = [...entries];
      } else {
        delete document[purpose];
      }
    }
  }
}
