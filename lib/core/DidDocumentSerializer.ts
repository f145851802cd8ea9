import DidDocumentModel, { ContextEntry } from './models/DidDocumentModel';
import ServiceModel, { ServiceEndpoint } from './models/ServiceModel';
import ErrorCode from '../common/ErrorCode';
import FlexibleList from './FlexibleList';
import InputValidator from './InputValidator';
import JwkModel from './models/JwkModel';
import KeyPurpose from './enums/KeyPurpose';
import VerificationMethodModel from './models/VerificationMethodModel';
import VmRelationship from './VmRelationship';
import VmRelationshipModel from './models/VmRelationshipModel';

/**
 * Converts DID Documents between their in-memory form and their JSON wire form.
 *
 * On the wire `@context`, `controller`, the verification relationships and the service `type` and `serviceEndpoint`
 * are written as a bare value when they hold a single element. Absent properties are omitted.
 */
export default class DidDocumentSerializer {
  /**
   * Converts the given DID Document into its JSON wire form.
   */
  public static serialize (document: DidDocumentModel): Record<string, unknown> {
    const json: Record<string, unknown> = {
      '@context': FlexibleList.serialize(document.context),
      id: document.id
    };

    if (document.controller !== undefined) {
      json.controller = FlexibleList.serialize(document.controller);
    }

    if (document.alsoKnownAs !== undefined) {
      json.alsoKnownAs = [...document.alsoKnownAs];
    }

    if (document.verificationMethod !== undefined) {
      json.verificationMethod = document.verificationMethod.map(DidDocumentSerializer.serializeVerificationMethod);
    }

    for (const purpose of Object.values(KeyPurpose)) {
      const entries = document[purpose];
      if (entries !== undefined) {
        json[purpose] = FlexibleList.serialize(entries.map(DidDocumentSerializer.serializeRelationship));
      }
    }

    if (document.service !== undefined) {
      json.service = document.service.map(DidDocumentSerializer.serializeService);
    }

    return json;
  }

  /**
   * Parses the given JSON wire form of a DID Document.
   * An empty verification relationship is read as absent.
   * @throws InvalidInputError if the input is not a well-formed DID Document.
   */
  public static deserialize (json: unknown): DidDocumentModel {
    InputValidator.validateNonArrayObject(json, ErrorCode.DidDocumentSerializerDocumentNotObject, 'DID Document');
    InputValidator.validateString(json.id, ErrorCode.DidDocumentSerializerIdNotString, 'DID Document id');

    const context = json['@context'] === undefined
      ? []
      : FlexibleList.deserialize<ContextEntry>(json['@context'], { fromString: entry => entry, fromObject: entry => entry }, '@context');
    const document: DidDocumentModel = { id: json.id, context };

    if (json.controller !== undefined) {
      document.controller = FlexibleList.deserialize(json.controller, { fromString: controller => controller }, 'controller');
    }

    if (json.alsoKnownAs !== undefined) {
      document.alsoKnownAs = DidDocumentSerializer.deserializeStringArray(json.alsoKnownAs, 'alsoKnownAs');
    }

    if (json.verificationMethod !== undefined) {
      InputValidator.validateArray(json.verificationMethod, ErrorCode.DidDocumentSerializerVerificationMethodsNotArray, 'verificationMethod');
      document.verificationMethod = json.verificationMethod.map(DidDocumentSerializer.deserializeVerificationMethod);
    }

    for (const purpose of Object.values(KeyPurpose)) {
      if (json[purpose] === undefined) {
        continue;
      }

      const entries = FlexibleList.deserialize<VmRelationshipModel>(
        json[purpose],
        {
          fromString: VmRelationship.reference,
          fromObject: entry => VmRelationship.embedded(DidDocumentSerializer.deserializeVerificationMethod(entry))
        },
        purpose
      );
      if (entries.length > 0) {
        document[purpose] = entries;
      }
    }

    if (json.service !== undefined) {
      InputValidator.validateArray(json.service, ErrorCode.DidDocumentSerializerServicesNotArray, 'service');
      document.service = json.service.map(DidDocumentSerializer.deserializeService);
    }

    return document;
  }

  public static serializeVerificationMethod (verificationMethod: VerificationMethodModel): Record<string, unknown> {
    const json: Record<string, unknown> = {
      id: verificationMethod.id,
      controller: verificationMethod.controller,
      type: verificationMethod.type
    };

    if (verificationMethod.publicKeyJwk !== undefined) {
      json.publicKeyJwk = { ...verificationMethod.publicKeyJwk };
    }

    if (verificationMethod.publicKeyMultibase !== undefined) {
      json.publicKeyMultibase = verificationMethod.publicKeyMultibase;
    }

    return json;
  }

  public static deserializeVerificationMethod (json: unknown): VerificationMethodModel {
    InputValidator.validateNonArrayObject(json, ErrorCode.DidDocumentSerializerVerificationMethodNotObject, 'verification method');
    InputValidator.validateString(json.id, ErrorCode.DidDocumentSerializerIdNotString, 'verification method id');
    InputValidator.validateString(json.controller, ErrorCode.DidDocumentSerializerPropertyNotString, 'verification method controller');
    InputValidator.validateString(json.type, ErrorCode.DidDocumentSerializerPropertyNotString, 'verification method type');

    const verificationMethod: VerificationMethodModel = {
      id: json.id,
      controller: json.controller,
      type: json.type
    };

    if (json.publicKeyJwk !== undefined) {
      verificationMethod.publicKeyJwk = DidDocumentSerializer.deserializeJwk(json.publicKeyJwk);
    }

    if (json.publicKeyMultibase !== undefined) {
      InputValidator.validateString(json.publicKeyMultibase, ErrorCode.DidDocumentSerializerPropertyNotString, 'publicKeyMultibase');
      verificationMethod.publicKeyMultibase = json.publicKeyMultibase;
    }

    return verificationMethod;
  }

  public static serializeService (service: ServiceModel): Record<string, unknown> {
    return {
      id: service.id,
      type: FlexibleList.serialize(service.type),
      serviceEndpoint: FlexibleList.serialize(service.serviceEndpoint)
    };
  }

  public static deserializeService (json: unknown): ServiceModel {
    InputValidator.validateNonArrayObject(json, ErrorCode.DidDocumentSerializerServiceNotObject, 'service');
    InputValidator.validateString(json.id, ErrorCode.DidDocumentSerializerIdNotString, 'service id');

    return {
      id: json.id,
      type: FlexibleList.deserialize(json.type, { fromString: type => type }, 'service type'),
      serviceEndpoint: FlexibleList.deserialize<ServiceEndpoint>(
        json.serviceEndpoint,
        { fromString: url => url, fromObject: urlMap => urlMap },
        'serviceEndpoint'
      )
    };
  }

  private static serializeRelationship (entry: VmRelationshipModel): string | Record<string, unknown> {
    return VmRelationship.isReference(entry)
      ? entry.keyId
      : DidDocumentSerializer.serializeVerificationMethod(entry.verificationMethod);
  }

  private static deserializeJwk (json: unknown): JwkModel {
    InputValidator.validateNonArrayObject(json, ErrorCode.DidDocumentSerializerJwkNotObject, 'publicKeyJwk');
    InputValidator.validateString(json.kty, ErrorCode.DidDocumentSerializerPropertyNotString, 'publicKeyJwk kty');

    return { ...json, kty: json.kty };
  }

  private static deserializeStringArray (json: unknown, inputContextForErrorLogging: string): string[] {
    InputValidator.validateArray(json, ErrorCode.DidDocumentSerializerStringArrayElementNotString, inputContextForErrorLogging);

    return json.map(element => {
      InputValidator.validateString(element, ErrorCode.DidDocumentSerializerStringArrayElementNotString, `${inputContextForErrorLogging} element`);
      return element;
    });
  }
}
