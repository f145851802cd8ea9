import Config, { DefaultConfig } from './models/Config';
import DidDocumentModel from './models/DidDocumentModel';
import ErrorCode from '../common/ErrorCode';
import InvalidPatchError from '../common/InvalidPatchError';
import Logger from '../common/Logger';
import PatchAction from './enums/PatchAction';
import PatchDocumentModel from './models/PatchDocumentModel';
import PatchModel from './models/PatchModel';
import RelationshipSet from './RelationshipSet';
import ServiceModel from './models/ServiceModel';
import VmRelationship from './VmRelationship';
import VmWithPurposeModel from './models/VmWithPurposeModel';

/**
 * Class that applies patches to a DID Document.
 *
 * Only verification relationships that reference a key by ID are maintained.
 * Entries that embed a verification method are kept as they are and never modified by a patch.
 */
export default class DocumentPatcher {

  /**
   * Applies the given patches in order to the given document, modifying it in place.
   * Each patch sees the document as left by the patches before it.
   * A `replace` patch ends the batch: patches after it are not applied.
   *
   * A patch without the payload its action needs is skipped with a warning,
   * unless `strictPatching` is set in which case an `InvalidPatchError` is thrown.
   */
  public static applyPatches (document: DidDocumentModel, patches: PatchModel[], config?: Partial<Config>): void {
    const strictPatching = { ...DefaultConfig, ...config }.strictPatching;

    for (let i = 0; i < patches.length; i++) {
      const patch = patches[i];
      DocumentPatcher.applyPatch(document, patch, strictPatching);

      if (patch.action === PatchAction.Replace) {
        const ignoredPatchCount = patches.length - i - 1;
        if (ignoredPatchCount > 0) {
          Logger.warn(`Ignoring ${ignoredPatchCount} patch(es) following a replace patch.`);
        }
        break;
      }
    }
  }

  private static applyPatch (document: DidDocumentModel, patch: PatchModel, strictPatching: boolean) {
    const action = patch.action;
    switch (action) {
      case PatchAction.Replace:
        if (patch.document === undefined) {
          return DocumentPatcher.skipPatch(action, 'document', strictPatching);
        }
        return DocumentPatcher.replace(document, patch.document);
      case PatchAction.AddPublicKeys:
        if (patch.publicKeys === undefined) {
          return DocumentPatcher.skipPatch(action, 'publicKeys', strictPatching);
        }
        return DocumentPatcher.addPublicKeys(document, patch.publicKeys);
      case PatchAction.RemovePublicKeys:
        if (patch.ids === undefined) {
          return DocumentPatcher.skipPatch(action, 'ids', strictPatching);
        }
        return DocumentPatcher.removePublicKeys(document, patch.ids);
      case PatchAction.AddServices:
        if (patch.services === undefined) {
          return DocumentPatcher.skipPatch(action, 'services', strictPatching);
        }
        return DocumentPatcher.addServices(document, patch.services);
      case PatchAction.RemoveServices:
        if (patch.ids === undefined) {
          return DocumentPatcher.skipPatch(action, 'ids', strictPatching);
        }
        return DocumentPatcher.removeServices(document, patch.ids);
      default:
        return DocumentPatcher.skipUnknownAction(action, strictPatching);
    }
  }

  private static skipPatch (action: PatchAction, missingProperty: keyof PatchModel, strictPatching: boolean) {
    const message = `Patch with action '${action}' has no '${missingProperty}' property.`;
    if (strictPatching) {
      throw new InvalidPatchError(ErrorCode.DocumentPatcherPatchPayloadMissing, message);
    }

    Logger.warn(`${message} Skipping patch.`);
  }

  private static skipUnknownAction (action: never, strictPatching: boolean) {
    const message = `Cannot apply unknown patch action '${action}'.`;
    if (strictPatching) {
      throw new InvalidPatchError(ErrorCode.DocumentPatcherUnknownAction, message);
    }

    Logger.warn(`${message} Skipping patch.`);
  }

  /**
   * Rebuilds the keys and relationships of the document from the replacement document,
   * then replaces the services.
   */
  private static replace (document: DidDocumentModel, replacement: PatchDocumentModel) {
    if (replacement.publicKeys !== undefined) {
      delete document.verificationMethod;
      const relationships = new RelationshipSet();
      DocumentPatcher.addPublicKeysTo(document, relationships, replacement.publicKeys);
      relationships.flushInto(document);
    }

    if (replacement.services !== undefined) {
      DocumentPatcher.setServices(document, [...replacement.services]);
    }
  }

  private static addPublicKeys (document: DidDocumentModel, publicKeys: VmWithPurposeModel[]) {
    const relationships = RelationshipSet.fromDocument(document);
    DocumentPatcher.addPublicKeysTo(document, relationships, publicKeys);
    relationships.flushInto(document);
  }

  /**
   * Appends the keys to the verification methods of the document,
   * and a reference to each key to the relationships of its purposes.
   */
  private static addPublicKeysTo (document: DidDocumentModel, relationships: RelationshipSet, publicKeys: VmWithPurposeModel[]) {
    const verificationMethods = [...(document.verificationMethod || [])];

    for (const publicKey of publicKeys) {
      const { purposes, ...verificationMethod } = publicKey;
      verificationMethods.push(verificationMethod);

      for (const purpose of purposes || []) {
        relationships.push(purpose, VmRelationship.reference(verificationMethod.id));
      }
    }

    if (verificationMethods.length > 0) {
      document.verificationMethod = verificationMethods;
    } else {
      delete document.verificationMethod;
    }
  }

  private static removePublicKeys (document: DidDocumentModel, ids: string[]) {
    const idsOfKeysToRemove = new Set(ids);

    if (document.verificationMethod !== undefined) {
      const remainingMethods = document.verificationMethod.filter(verificationMethod => !idsOfKeysToRemove.has(verificationMethod.id));
      if (remainingMethods.length > 0) {
        document.verificationMethod = remainingMethods;
      } else {
        delete document.verificationMethod;
      }
    }

    const relationships = RelationshipSet.fromDocument(document);
    for (const id of idsOfKeysToRemove) {
      relationships.remove(VmRelationship.reference(id));
    }
    relationships.flushInto(document);
  }

  private static addServices (document: DidDocumentModel, services: ServiceModel[]) {
    DocumentPatcher.setServices(document, [...(document.service || []), ...services]);
  }

  private static removeServices (document: DidDocumentModel, ids: string[]) {
    if (document.service === undefined) {
      return;
    }

    const idsToRemove = new Set(ids);
    DocumentPatcher.setServices(document, document.service.filter(service => !idsToRemove.has(service.id)));
  }

  private static setServices (document: DidDocumentModel, services: ServiceModel[]) {
    if (services.length > 0) {
      document.service = services;
    } else {
      delete document.service;
    }
  }
}
