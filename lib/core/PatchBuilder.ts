import * as URI from 'uri-js';
import ArrayMethods from './util/ArrayMethods';
import ErrorCode from '../common/ErrorCode';
import InputValidator from './InputValidator';
import InvalidInputError from '../common/InvalidInputError';
import InvalidPatchError from '../common/InvalidPatchError';
import KeyPurpose from './enums/KeyPurpose';
import PatchAction from './enums/PatchAction';
import PatchDocumentModel from './models/PatchDocumentModel';
import PatchModel from './models/PatchModel';
import ServiceModel from './models/ServiceModel';
import VmWithPurposeModel from './models/VmWithPurposeModel';

/**
 * Builds and validates a single patch.
 * The action given at construction decides which of the setters may be called;
 * calling any other setter throws straight away.
 */
export default class PatchBuilder {
  private replacementDocument?: PatchDocumentModel;
  private readonly servicesToAdd: ServiceModel[] = [];
  private readonly publicKeysToAdd: VmWithPurposeModel[] = [];
  private readonly ids: string[] = [];

  public constructor (public readonly action: PatchAction) { }

  /**
   * Sets the replacement document. Only valid for a `replace` patch.
   */
  public document (document: PatchDocumentModel): PatchBuilder {
    if (this.action !== PatchAction.Replace) {
      throw new InvalidPatchError(ErrorCode.PatchBuilderDocumentNotAllowed, `A document can only be added to a replace patch, not ${this.action}.`);
    }

    this.replacementDocument = structuredClone(document);
    return this;
  }

  /**
   * Adds a service. Only valid for an `add-services` patch.
   */
  public service (service: ServiceModel): PatchBuilder {
    if (this.action !== PatchAction.AddServices) {
      throw new InvalidPatchError(ErrorCode.PatchBuilderServiceNotAllowed, `A service can only be added to an add-services patch, not ${this.action}.`);
    }

    const serviceCopy = structuredClone(service);
    PatchBuilder.validateService(serviceCopy);

    if (this.servicesToAdd.some(existing => existing.id === serviceCopy.id)) {
      throw new InvalidPatchError(ErrorCode.PatchBuilderServiceIdDuplicated, `Duplicate service ID: ${serviceCopy.id}`);
    }

    this.servicesToAdd.push(serviceCopy);
    return this;
  }

  /**
   * Adds a public key. Only valid for an `add-public-keys` patch.
   */
  public publicKey (publicKey: VmWithPurposeModel): PatchBuilder {
    if (this.action !== PatchAction.AddPublicKeys) {
      throw new InvalidPatchError(
        ErrorCode.PatchBuilderPublicKeyNotAllowed,
        `A public key can only be added to an add-public-keys patch, not ${this.action}.`
      );
    }

    // The copy is what gets validated and kept.
    const publicKeyCopy = structuredClone(publicKey);
    InputValidator.validateId(publicKeyCopy.id);

    if (publicKeyCopy.purposes !== undefined) {
      PatchBuilder.validatePurposes(publicKeyCopy.purposes);
    }

    // Duplicate method IDs across patches are left to the caller, only this patch is checked.
    if (this.publicKeysToAdd.some(existing => existing.id === publicKeyCopy.id)) {
      throw new InvalidPatchError(ErrorCode.PatchBuilderPublicKeyIdDuplicated, `Duplicate key ID: ${publicKeyCopy.id}`);
    }

    this.publicKeysToAdd.push(publicKeyCopy);
    return this;
  }

  /**
   * Adds the ID of a key or service to remove. Only valid for a `remove-public-keys` or `remove-services` patch.
   */
  public id (id: string): PatchBuilder {
    if (this.action !== PatchAction.RemovePublicKeys && this.action !== PatchAction.RemoveServices) {
      throw new InvalidPatchError(
        ErrorCode.PatchBuilderIdNotAllowed,
        `An ID can only be added to a remove-public-keys or remove-services patch, not ${this.action}.`
      );
    }

    InputValidator.validateId(id);

    if (this.ids.includes(id)) {
      throw new InvalidPatchError(ErrorCode.PatchBuilderIdDuplicated, `Duplicate ID: ${id}`);
    }

    this.ids.push(id);
    return this;
  }

  /**
   * Builds the patch. Only the property matching the action is set on the result.
   * The payload is copied, so the patch and the builder can be changed independently.
   * @throws InvalidPatchError if the payload required by the action has not been given.
   */
  public build (): PatchModel {
    const action = this.action;
    switch (action) {
      case PatchAction.Replace:
        if (this.replacementDocument === undefined) {
          throw new InvalidPatchError(ErrorCode.PatchBuilderDocumentMissing, 'A replace patch must contain a patch document.');
        }
        return { action, document: structuredClone(this.replacementDocument) };
      case PatchAction.AddPublicKeys:
        if (this.publicKeysToAdd.length === 0) {
          throw new InvalidPatchError(ErrorCode.PatchBuilderPublicKeysMissing, 'An add-public-keys patch must contain at least one key.');
        }
        return { action, publicKeys: structuredClone(this.publicKeysToAdd) };
      case PatchAction.AddServices:
        if (this.servicesToAdd.length === 0) {
          throw new InvalidPatchError(ErrorCode.PatchBuilderServicesMissing, 'An add-services patch must contain at least one service.');
        }
        return { action, services: structuredClone(this.servicesToAdd) };
      case PatchAction.RemovePublicKeys:
      case PatchAction.RemoveServices:
        if (this.ids.length === 0) {
          throw new InvalidPatchError(ErrorCode.PatchBuilderIdsMissing, `A ${action} patch must contain at least one ID.`);
        }
        return { action, ids: [...this.ids] };
    }
  }

  private static validatePurposes (purposes: KeyPurpose[]) {
    if (ArrayMethods.hasDuplicates(purposes)) {
      throw new InvalidInputError(ErrorCode.PatchBuilderPublicKeyPurposesDuplicated, `Duplicate key purpose in: ${purposes.join(', ')}`);
    }

    const validPurposes = new Set<string>(Object.values(KeyPurpose));
    for (const purpose of purposes) {
      if (!validPurposes.has(purpose)) {
        throw new InvalidInputError(ErrorCode.PatchBuilderPublicKeyInvalidPurpose, `Unknown key purpose: ${purpose}`);
      }
    }
  }

  private static validateService (service: ServiceModel) {
    InputValidator.validateId(service.id);

    if (service.type.length === 0) {
      throw new InvalidInputError(ErrorCode.PatchBuilderServiceTypeMissing, `Service ${service.id} must have at least one type.`);
    }

    if (service.serviceEndpoint.length === 0) {
      throw new InvalidInputError(ErrorCode.PatchBuilderServiceEndpointMissing, `Service ${service.id} must have at least one endpoint.`);
    }

    for (const serviceEndpoint of service.serviceEndpoint) {
      if (typeof serviceEndpoint === 'string' && URI.parse(serviceEndpoint).error !== undefined) {
        throw new InvalidInputError(
          ErrorCode.PatchBuilderServiceEndpointStringNotValidUri,
          `Service endpoint string '${serviceEndpoint}' is not a valid URI.`
        );
      }
    }
  }
}
