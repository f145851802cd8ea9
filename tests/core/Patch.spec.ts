import DocumentGenerator from '../generators/DocumentGenerator';
import ErrorCode from '../../lib/common/ErrorCode';
import JasmineDidCoreErrorValidator from '../JasmineDidCoreErrorValidator';
import KeyPurpose from '../../lib/core/enums/KeyPurpose';
import Patch from '../../lib/core/Patch';
import PatchAction from '../../lib/core/enums/PatchAction';

describe('Patch', () => {

  describe('builder()', () => {
    it('should create a builder for the given action.', () => {
      expect(Patch.builder(PatchAction.AddServices).action).toEqual(PatchAction.AddServices);
    });
  });

  describe('replace()', () => {
    it('should build a replace patch.', () => {
      const replacement = { publicKeys: [DocumentGenerator.generatePublicKey('k1', [KeyPurpose.Authentication])] };

      expect(Patch.replace(replacement)).toEqual({ action: PatchAction.Replace, document: replacement });
    });
  });

  describe('addPublicKeys()', () => {
    it('should build an add-public-keys patch.', () => {
      const publicKeys = [DocumentGenerator.generatePublicKey('k1'), DocumentGenerator.generatePublicKey('k2', [KeyPurpose.KeyAgreement])];

      expect(Patch.addPublicKeys(publicKeys)).toEqual({ action: PatchAction.AddPublicKeys, publicKeys });
    });

    it('should validate every key.', () => {
      JasmineDidCoreErrorValidator.expectDidCoreErrorToBeThrown(
        () => Patch.addPublicKeys([DocumentGenerator.generatePublicKey('k1'), DocumentGenerator.generatePublicKey('k1')]),
        ErrorCode.PatchBuilderPublicKeyIdDuplicated
      );
    });

    it('should throw if no key is given.', () => {
      JasmineDidCoreErrorValidator.expectDidCoreErrorToBeThrown(
        () => Patch.addPublicKeys([]),
        ErrorCode.PatchBuilderPublicKeysMissing
      );
    });
  });

  describe('removePublicKeys()', () => {
    it('should build a remove-public-keys patch.', () => {
      expect(Patch.removePublicKeys(['k1', 'k2'])).toEqual({ action: PatchAction.RemovePublicKeys, ids: ['k1', 'k2'] });
    });
  });

  describe('addServices()', () => {
    it('should build an add-services patch.', () => {
      const services = [DocumentGenerator.generateService('s1')];

      expect(Patch.addServices(services)).toEqual({ action: PatchAction.AddServices, services });
    });
  });

  describe('removeServices()', () => {
    it('should build a remove-services patch.', () => {
      expect(Patch.removeServices(['s1'])).toEqual({ action: PatchAction.RemoveServices, ids: ['s1'] });
    });

    it('should throw on duplicate IDs.', () => {
      JasmineDidCoreErrorValidator.expectDidCoreErrorToBeThrown(
        () => Patch.removeServices(['s1', 's1']),
        ErrorCode.PatchBuilderIdDuplicated
      );
    });
  });
});
