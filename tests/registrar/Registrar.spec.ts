import { DID_CONTEXT } from '../../lib/core/DidDocument';
import DocumentGenerator from '../generators/DocumentGenerator';
import ErrorCode from '../../lib/common/ErrorCode';
import InvalidPatchError from '../../lib/common/InvalidPatchError';
import JasmineDidCoreErrorValidator from '../JasmineDidCoreErrorValidator';
import KeyPurpose from '../../lib/core/enums/KeyPurpose';
import Logger from '../../lib/common/Logger';
import MockKeyProvider from '../mocks/MockKeyProvider';
import Patch from '../../lib/core/Patch';
import PatchAction from '../../lib/core/enums/PatchAction';
import Registrar from '../../lib/registrar/Registrar';

describe('Registrar', () => {
  let registrar: Registrar;

  beforeEach(() => {
    spyOn(Logger, 'info');
    spyOn(Logger, 'warn');
    registrar = new Registrar(new MockKeyProvider());
  });

  describe('create()', () => {
    it('should create a document with one signing key used for authentication and assertion.', async () => {
      const document = await registrar.create(undefined, DocumentGenerator.did);

      expect(document.id).toEqual(DocumentGenerator.did);
      expect(document.context).toEqual([DID_CONTEXT]);
      expect(document.verificationMethod?.length).toEqual(1);

      const verificationMethod = document.verificationMethod?.[0];
      expect(verificationMethod?.id).toMatch(/^[0-9a-f]{16}$/);
      expect(verificationMethod?.controller).toEqual(DocumentGenerator.did);
      expect(verificationMethod?.type).toEqual(MockKeyProvider.signingKey.type);
      expect(verificationMethod?.publicKeyJwk).toEqual(MockKeyProvider.signingKey.publicKeyJwk);

      const keyId = verificationMethod?.id || '';
      expect(document.authentication).toEqual([{ keyId }]);
      expect(document.assertionMethod).toEqual([{ keyId }]);
      expect('keyAgreement' in document).toBeFalse();
      expect('service' in document).toBeFalse();
      expect(Logger.info).toHaveBeenCalledWith('Created DID Document with 1 patch(es).');
    });

    it('should add the given services.', async () => {
      const services = [DocumentGenerator.generateService('s1'), DocumentGenerator.generateService('s2')];

      const document = await registrar.create(services, DocumentGenerator.did);

      expect(document.service).toEqual(services);
      expect(Logger.info).toHaveBeenCalledWith('Created DID Document with 2 patch(es).');
    });

    it('should leave the id empty if none is given.', async () => {
      const document = await registrar.create([]);

      expect(document.id).toEqual('');
      expect(document.verificationMethod?.[0].controller).toEqual('');
      expect('service' in document).toBeFalse();
    });

    it('should use the configured controller and key ID length.', async () => {
      const configuredRegistrar = new Registrar(new MockKeyProvider(), { controller: 'did:example:controller', keyIdLength: 4 });

      const document = await configuredRegistrar.create(undefined, DocumentGenerator.did);

      expect(document.verificationMethod?.[0].controller).toEqual('did:example:controller');
      expect(document.verificationMethod?.[0].id).toMatch(/^[0-9a-f]{8}$/);
    });

    it('should reject invalid services.', async () => {
      const service = { ...DocumentGenerator.generateService('s1'), serviceEndpoint: [] };

      await JasmineDidCoreErrorValidator.expectDidCoreErrorToBeThrownAsync(
        () => registrar.create([service]),
        ErrorCode.PatchBuilderServiceEndpointMissing
      );
    });
  });

  describe('update()', () => {
    it('should apply the patches to a copy of the document.', async () => {
      const document = DocumentGenerator.generateDocument();
      const patches = [
        Patch.addPublicKeys([DocumentGenerator.generatePublicKey('k2', [KeyPurpose.KeyAgreement])]),
        Patch.removeServices(['s1'])
      ];

      const updatedDocument = await registrar.update(document, patches);

      expect(updatedDocument.verificationMethod?.map(verificationMethod => verificationMethod.id)).toEqual(['k1', 'k2']);
      expect(updatedDocument.keyAgreement).toEqual([{ keyId: 'k2' }]);
      expect('service' in updatedDocument).toBeFalse();
      expect(document).toEqual(DocumentGenerator.generateDocument());
      expect(Logger.info).toHaveBeenCalledWith(`Applied 2 patch(es) to DID Document '${DocumentGenerator.did}'.`);
    });

    it('should reject a patch without payload in strict mode.', async () => {
      const strictRegistrar = new Registrar(new MockKeyProvider(), { strictPatching: true });

      await expectAsync(strictRegistrar.update(DocumentGenerator.generateDocument(), [{ action: PatchAction.AddServices }]))
        .toBeRejectedWithError(InvalidPatchError);
      await JasmineDidCoreErrorValidator.expectDidCoreErrorToBeThrownAsync(
        () => strictRegistrar.update(DocumentGenerator.generateDocument(), [{ action: PatchAction.RemovePublicKeys }]),
        ErrorCode.DocumentPatcherPatchPayloadMissing,
        `'ids'`
      );
    });

    it('should skip a patch without payload otherwise.', async () => {
      const updatedDocument = await registrar.update(DocumentGenerator.generateDocument(), [{ action: PatchAction.AddServices }]);

      expect(updatedDocument).toEqual(DocumentGenerator.generateDocument());
      expect(Logger.warn).toHaveBeenCalledWith(`Patch with action 'add-services' has no 'services' property. Skipping patch.`);
    });
  });

  describe('deactivate()', () => {
    it('should not be supported.', async () => {
      await JasmineDidCoreErrorValidator.expectDidCoreErrorToBeThrownAsync(
        () => registrar.deactivate(DocumentGenerator.did),
        ErrorCode.RegistrarOperationNotSupported,
        DocumentGenerator.did
      );
    });
  });

  describe('recover()', () => {
    it('should not be supported.', async () => {
      await JasmineDidCoreErrorValidator.expectDidCoreErrorToBeThrownAsync(
        () => registrar.recover(DocumentGenerator.generateDocument()),
        ErrorCode.RegistrarOperationNotSupported
      );
    });
  });
});
