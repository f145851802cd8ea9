import PatchAction from './enums/PatchAction';
import PatchBuilder from './PatchBuilder';
import PatchDocumentModel from './models/PatchDocumentModel';
import PatchModel from './models/PatchModel';
import ServiceModel from './models/ServiceModel';
import VmWithPurposeModel from './models/VmWithPurposeModel';

/**
 * Entry point for constructing validated patches.
 */
export default class Patch {
  /**
   * Starts building a patch with the given action.
   */
  public static builder (action: PatchAction): PatchBuilder {
    return new PatchBuilder(action);
  }

  public static replace (document: PatchDocumentModel): PatchModel {
    return Patch.builder(PatchAction.Replace).document(document).build();
  }

  public static addPublicKeys (publicKeys: VmWithPurposeModel[]): PatchModel {
    const builder = Patch.builder(PatchAction.AddPublicKeys);
    for (const publicKey of publicKeys) {
      builder.publicKey(publicKey);
    }

    return builder.build();
  }

  public static removePublicKeys (ids: string[]): PatchModel {
    return Patch.buildRemovalPatch(PatchAction.RemovePublicKeys, ids);
  }

  public static addServices (services: ServiceModel[]): PatchModel {
    const builder = Patch.builder(PatchAction.AddServices);
    for (const service of services) {
      builder.service(service);
    }

    return builder.build();
  }

  public static removeServices (ids: string[]): PatchModel {
    return Patch.buildRemovalPatch(PatchAction.RemoveServices, ids);
  }

  private static buildRemovalPatch (action: PatchAction, ids: string[]): PatchModel {
    const builder = Patch.builder(action);
    for (const id of ids) {
      builder.id(id);
    }

    return builder.build();
  }
}
