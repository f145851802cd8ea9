import DidDocumentSerializer from './DidDocumentSerializer';
import ErrorCode from '../common/ErrorCode';
import InputValidator from './InputValidator';
import InvalidInputError from '../common/InvalidInputError';
import KeyPurpose from './enums/KeyPurpose';
import PatchAction from './enums/PatchAction';
import PatchDocumentModel from './models/PatchDocumentModel';
import PatchModel from './models/PatchModel';
import ServiceModel from './models/ServiceModel';
import VmWithPurposeModel from './models/VmWithPurposeModel';

/**
 * Converts patches between their in-memory form and their JSON wire form.
 * On the wire the purposes of a public key sit next to the verification method properties.
 */
export default class PatchSerializer {
  /**
   * Converts the given patch into its JSON wire form. Absent properties are omitted.
   */
  public static serialize (patch: PatchModel): Record<string, unknown> {
    const json: Record<string, unknown> = { action: patch.action };

    if (patch.document !== undefined) {
      json.document = PatchSerializer.serializePatchDocument(patch.document);
    }

    if (patch.services !== undefined) {
      json.services = patch.services.map(DidDocumentSerializer.serializeService);
    }

    if (patch.ids !== undefined) {
      json.ids = [...patch.ids];
    }

    if (patch.publicKeys !== undefined) {
      json.publicKeys = patch.publicKeys.map(PatchSerializer.serializePublicKey);
    }

    return json;
  }

  /**
   * Parses the given JSON wire form of a patch.
   * NOTE: A patch missing the payload of its action is accepted here, what to do with it is up to `DocumentPatcher`.
   * @throws InvalidInputError if the action is unknown or a payload is malformed.
   */
  public static deserialize (json: unknown): PatchModel {
    InputValidator.validateNonArrayObject(json, ErrorCode.PatchSerializerPatchNotObject, 'patch');

    const actionValue = json.action;
    const action = Object.values(PatchAction).find(value => value === actionValue);
    if (action === undefined) {
      throw new InvalidInputError(ErrorCode.PatchSerializerActionUnknown, `Unknown patch action: ${JSON.stringify(actionValue)}`);
    }

    const patch: PatchModel = { action };

    if (json.document !== undefined) {
      patch.document = PatchSerializer.deserializePatchDocument(json.document);
    }

    if (json.services !== undefined) {
      patch.services = PatchSerializer.deserializeServices(json.services);
    }

    if (json.ids !== undefined) {
      InputValidator.validateArray(json.ids, ErrorCode.PatchSerializerIdsNotArray, 'ids');
      patch.ids = json.ids.map(id => {
        InputValidator.validateString(id, ErrorCode.PatchSerializerIdsNotArray, 'ids element');
        return id;
      });
    }

    if (json.publicKeys !== undefined) {
      patch.publicKeys = PatchSerializer.deserializePublicKeys(json.publicKeys);
    }

    return patch;
  }

  private static serializePatchDocument (document: PatchDocumentModel): Record<string, unknown> {
    const json: Record<string, unknown> = {};

    if (document.publicKeys !== undefined) {
      json.publicKeys = document.publicKeys.map(PatchSerializer.serializePublicKey);
    }

    if (document.services !== undefined) {
      json.services = document.services.map(DidDocumentSerializer.serializeService);
    }

    return json;
  }

  private static deserializePatchDocument (json: unknown): PatchDocumentModel {
    InputValidator.validateNonArrayObject(json, ErrorCode.PatchSerializerPatchNotObject, 'patch document');

    const document: PatchDocumentModel = {};

    if (json.publicKeys !== undefined) {
      document.publicKeys = PatchSerializer.deserializePublicKeys(json.publicKeys);
    }

    if (json.services !== undefined) {
      document.services = PatchSerializer.deserializeServices(json.services);
    }

    return document;
  }

  private static serializePublicKey (publicKey: VmWithPurposeModel): Record<string, unknown> {
    const json = DidDocumentSerializer.serializeVerificationMethod(publicKey);

    if (publicKey.purposes !== undefined) {
      json.purposes = [...publicKey.purposes];
    }

    return json;
  }

  private static deserializePublicKeys (json: unknown): VmWithPurposeModel[] {
    InputValidator.validateArray(json, ErrorCode.PatchSerializerPublicKeysNotArray, 'publicKeys');

    return json.map(element => {
      const publicKey: VmWithPurposeModel = DidDocumentSerializer.deserializeVerificationMethod(element);

      if (InputValidator.isNonArrayObject(element) && element.purposes !== undefined) {
        publicKey.purposes = PatchSerializer.deserializePurposes(element.purposes);
      }

      return publicKey;
    });
  }

  private static deserializePurposes (json: unknown): KeyPurpose[] {
    InputValidator.validateArray(json, ErrorCode.PatchSerializerPurposesNotArray, 'purposes');

    return json.map(value => {
      const purpose = Object.values(KeyPurpose).find(knownPurpose => knownPurpose === value);
      if (purpose === undefined) {
        throw new InvalidInputError(ErrorCode.PatchSerializerPurposeUnknown, `Unknown key purpose: ${JSON.stringify(value)}`);
      }

      return purpose;
    });
  }

  private static deserializeServices (json: unknown): ServiceModel[] {
    InputValidator.validateArray(json, ErrorCode.PatchSerializerServicesNotArray, 'services');

    return json.map(DidDocumentSerializer.deserializeService);
  }
}
