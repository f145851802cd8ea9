import * as crypto from 'crypto';
import Config, { DefaultConfig } from '../core/models/Config';
import DidCoreError from '../common/DidCoreError';
import DidDocument from '../core/DidDocument';
import DidDocumentModel from '../core/models/DidDocumentModel';
import DocumentPatcher from '../core/DocumentPatcher';
import ErrorCode from '../common/ErrorCode';
import IKeyProvider from './interfaces/IKeyProvider';
import KeyPurpose from '../core/enums/KeyPurpose';
import Logger from '../common/Logger';
import Patch from '../core/Patch';
import PatchModel from '../core/models/PatchModel';
import ServiceModel from '../core/models/ServiceModel';

/**
 * Creates and updates DID Documents by building patches and handing them to the `DocumentPatcher`.
 * DID method specific concerns such as deriving the DID itself are left to the caller.
 */
export default class Registrar {
  private config: Config;

  public constructor (private keyProvider: IKeyProvider, config?: Partial<Config>) {
    this.config = { ...DefaultConfig, ...config };
  }

  /**
   * Creates a DID Document holding one signing key, usable for authentication and assertion, and the given services.
   * @param id The DID of the document, left empty when the DID method derives it from the document afterwards.
   */
  public async create (services?: ServiceModel[], id: string = ''): Promise<DidDocumentModel> {
    const signingKey = await this.keyProvider.nextSigningKey();

    const patches: PatchModel[] = [
      Patch.addPublicKeys([{
        id: crypto.randomBytes(this.config.keyIdLength).toString('hex'),
        controller: this.config.controller || id,
        type: signingKey.type,
        publicKeyJwk: signingKey.publicKeyJwk,
        purposes: [KeyPurpose.Authentication, KeyPurpose.AssertionMethod]
      }])
    ];

    if (services !== undefined && services.length > 0) {
      patches.push(Patch.addServices(services));
    }

    const document = DidDocument.create(id);
    DocumentPatcher.applyPatches(document, patches, this.config);

    Logger.info(`Created DID Document with ${patches.length} patch(es).`);
    return document;
  }

  /**
   * Applies the given patches to a copy of the given DID Document.
   * @returns The updated copy, the given document is left unchanged.
   */
  public async update (document: DidDocumentModel, patches: PatchModel[]): Promise<DidDocumentModel> {
    const updatedDocument = structuredClone(document);
    DocumentPatcher.applyPatches(updatedDocument, patches, this.config);

    Logger.info(`Applied ${patches.length} patch(es) to DID Document '${document.id}'.`);
    return updatedDocument;
  }

  public async deactivate (did: string): Promise<void> {
    throw new DidCoreError(ErrorCode.RegistrarOperationNotSupported, `Deactivating '${did}' is not supported.`);
  }

  public async recover (document: DidDocumentModel): Promise<void> {
    throw new DidCoreError(ErrorCode.RegistrarOperationNotSupported, `Recovering '${document.id}' is not supported.`);
  }
}
