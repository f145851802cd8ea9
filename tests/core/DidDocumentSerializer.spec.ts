import { DID_CONTEXT } from '../../lib/core/DidDocument';
import DidDocumentSerializer from '../../lib/core/DidDocumentSerializer';
import DocumentGenerator from '../generators/DocumentGenerator';
import ErrorCode from '../../lib/common/ErrorCode';
import InvalidInputError from '../../lib/common/InvalidInputError';
import JasmineDidCoreErrorValidator from '../JasmineDidCoreErrorValidator';
import VmRelationship from '../../lib/core/VmRelationship';

describe('DidDocumentSerializer', () => {
  const did = DocumentGenerator.did;
  const serializedVerificationMethod = {
    id: 'k1',
    controller: did,
    type: 'JsonWebKey2020',
    publicKeyJwk: { kty: 'OKP', crv: 'Ed25519', x: 'x-k1' }
  };

  describe('serialize()', () => {
    it('should write single element lists bare.', () => {
      const json = DidDocumentSerializer.serialize(DocumentGenerator.generateDocument());

      expect(json).toEqual({
        '@context': DID_CONTEXT,
        id: did,
        controller: did,
        verificationMethod: [serializedVerificationMethod],
        authentication: 'k1',
        assertionMethod: 'k1',
        service: [{ id: 's1', type: 's1Type', serviceEndpoint: 'https://s1.example.com/' }]
      });
    });

    it('should write embedded verification methods as objects next to references.', () => {
      const document = DocumentGenerator.generateDocument();
      document.keyAgreement = [
        VmRelationship.embedded(DocumentGenerator.generateVerificationMethod('k1')),
        VmRelationship.reference('k2')
      ];

      const json = DidDocumentSerializer.serialize(document);

      expect(json.keyAgreement).toEqual([serializedVerificationMethod, 'k2']);
    });

    it('should omit absent properties.', () => {
      const json = DidDocumentSerializer.serialize({ id: did, context: [DID_CONTEXT, 'https://w3id.org/security/suites/jws-2020/v1'] });

      expect(json).toEqual({ '@context': [DID_CONTEXT, 'https://w3id.org/security/suites/jws-2020/v1'], id: did });
    });

    it('should write alsoKnownAs and publicKeyMultibase.', () => {
      const json = DidDocumentSerializer.serialize({
        id: did,
        context: [DID_CONTEXT],
        alsoKnownAs: ['https://example.com/alice'],
        verificationMethod: [{ id: 'k2', controller: did, type: 'Ed25519VerificationKey2020', publicKeyMultibase: 'z6MktestKey' }]
      });

      expect(json.alsoKnownAs).toEqual(['https://example.com/alice']);
      expect(json.verificationMethod).toEqual([{ id: 'k2', controller: did, type: 'Ed25519VerificationKey2020', publicKeyMultibase: 'z6MktestKey' }]);
    });
  });

  describe('deserialize()', () => {
    it('should read back a serialized document.', () => {
      const document = DocumentGenerator.generateDocument();

      expect(DidDocumentSerializer.deserialize(DidDocumentSerializer.serialize(document))).toEqual(document);
    });

    it('should read a one element array and a bare value the same way.', () => {
      const fromArray = DidDocumentSerializer.deserialize({ id: did, authentication: [serializedVerificationMethod] });
      const fromBareValue = DidDocumentSerializer.deserialize({ id: did, authentication: serializedVerificationMethod });

      expect(fromArray).toEqual(fromBareValue);
      expect(fromArray.authentication).toEqual([VmRelationship.embedded(DocumentGenerator.generateVerificationMethod('k1'))]);
      expect(DidDocumentSerializer.serialize(fromArray).authentication).toEqual(serializedVerificationMethod);
    });

    it('should read a missing @context as an empty context and an empty relationship as absent.', () => {
      const document = DidDocumentSerializer.deserialize({ id: did, keyAgreement: [] });

      expect(document).toEqual({ id: did, context: [] });
      expect('keyAgreement' in document).toBeFalse();
    });

    it('should read a controller given as an encoded JSON array.', () => {
      const document = DidDocumentSerializer.deserialize({ id: did, controller: '["did:example:a","did:example:b"]' });

      expect(document.controller).toEqual(['did:example:a', 'did:example:b']);
    });

    it('should read structured service endpoints.', () => {
      const document = DidDocumentSerializer.deserialize({
        id: did,
        service: [{ id: 'hub', type: ['IdentityHub', 'LinkedDomains'], serviceEndpoint: { origins: ['https://hub.example.com/'] } }]
      });

      expect(document.service).toEqual([{
        id: 'hub',
        type: ['IdentityHub', 'LinkedDomains'],
        serviceEndpoint: [{ origins: ['https://hub.example.com/'] }]
      }]);
    });

    it('should throw if the input is not an object.', () => {
      expect(() => DidDocumentSerializer.deserialize([])).toThrowError(InvalidInputError);
      JasmineDidCoreErrorValidator.expectDidCoreErrorToBeThrown(
        () => DidDocumentSerializer.deserialize('did:example:123'),
        ErrorCode.DidDocumentSerializerDocumentNotObject
      );
    });

    it('should throw if the id is not a string.', () => {
      JasmineDidCoreErrorValidator.expectDidCoreErrorToBeThrown(
        () => DidDocumentSerializer.deserialize({ id: 123 }),
        ErrorCode.DidDocumentSerializerIdNotString
      );
    });

    it('should throw if verificationMethod is not an array.', () => {
      JasmineDidCoreErrorValidator.expectDidCoreErrorToBeThrown(
        () => DidDocumentSerializer.deserialize({ id: did, verificationMethod: serializedVerificationMethod }),
        ErrorCode.DidDocumentSerializerVerificationMethodsNotArray
      );
    });

    it('should throw if a verification method is missing its type.', () => {
      const { type, ...verificationMethodWithoutType } = serializedVerificationMethod;

      JasmineDidCoreErrorValidator.expectDidCoreErrorToBeThrown(
        () => DidDocumentSerializer.deserialize({ id: did, verificationMethod: [verificationMethodWithoutType] }),
        ErrorCode.DidDocumentSerializerPropertyNotString,
        'verification method type'
      );
      expect(type).toEqual('JsonWebKey2020');
    });

    it('should throw if a JWK has no kty.', () => {
      const verificationMethod = { ...serializedVerificationMethod, publicKeyJwk: { crv: 'Ed25519', x: 'x-k1' } };

      JasmineDidCoreErrorValidator.expectDidCoreErrorToBeThrown(
        () => DidDocumentSerializer.deserialize({ id: did, verificationMethod: [verificationMethod] }),
        ErrorCode.DidDocumentSerializerPropertyNotString,
        'kty'
      );
    });

    it('should throw if alsoKnownAs holds a non-string.', () => {
      JasmineDidCoreErrorValidator.expectDidCoreErrorToBeThrown(
        () => DidDocumentSerializer.deserialize({ id: did, alsoKnownAs: ['https://example.com/alice', 7] }),
        ErrorCode.DidDocumentSerializerStringArrayElementNotString
      );
    });

    it('should throw if service is not an array.', () => {
      JasmineDidCoreErrorValidator.expectDidCoreErrorToBeThrown(
        () => DidDocumentSerializer.deserialize({ id: did, service: { id: 's1', type: 't', serviceEndpoint: 'https://s1.example.com/' } }),
        ErrorCode.DidDocumentSerializerServicesNotArray
      );
    });

    it('should throw if a service is not an object.', () => {
      JasmineDidCoreErrorValidator.expectDidCoreErrorToBeThrown(
        () => DidDocumentSerializer.deserialize({ id: did, service: ['s1'] }),
        ErrorCode.DidDocumentSerializerServiceNotObject
      );
    });
  });
});
