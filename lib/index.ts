// NOTE: Aliases to classes and interfaces are used for external consumption.

import Config, { DefaultConfig } from './core/models/Config';
import DidDocument, { DID_CONTEXT } from './core/DidDocument';
import DidDocumentModel, { ContextEntry } from './core/models/DidDocumentModel';
import ServiceModel, { ServiceEndpoint } from './core/models/ServiceModel';
import VmRelationshipModel, { VmEmbeddedModel, VmReferenceModel } from './core/models/VmRelationshipModel';
import DidCoreError from './common/DidCoreError';
import DidDocumentSerializer from './core/DidDocumentSerializer';
import DocumentPatcher from './core/DocumentPatcher';
import ErrorCode from './common/ErrorCode';
import FlexibleList from './core/FlexibleList';
import IKeyProvider from './registrar/interfaces/IKeyProvider';
import ILogger from './common/interfaces/ILogger';
import InvalidInputError from './common/InvalidInputError';
import InvalidPatchError from './common/InvalidPatchError';
import JwkModel from './core/models/JwkModel';
import KeyPurpose from './core/enums/KeyPurpose';
import Logger from './common/Logger';
import Patch from './core/Patch';
import PatchAction from './core/enums/PatchAction';
import PatchBuilder from './core/PatchBuilder';
import PatchDocumentModel from './core/models/PatchDocumentModel';
import PatchModel from './core/models/PatchModel';
import PatchSerializer from './core/PatchSerializer';
import Registrar from './registrar/Registrar';
import SigningKeyModel from './registrar/models/SigningKeyModel';
import VerificationMethodModel from './core/models/VerificationMethodModel';
import VmRelationship from './core/VmRelationship';
import VmWithPurposeModel from './core/models/VmWithPurposeModel';

// Document and patch model exports.
export {
  DID_CONTEXT,
  DidDocument,
  KeyPurpose,
  PatchAction,
  VmRelationship
};
export type {
  ContextEntry,
  DidDocumentModel,
  JwkModel,
  PatchDocumentModel,
  PatchModel,
  ServiceEndpoint,
  ServiceModel,
  VerificationMethodModel,
  VmEmbeddedModel,
  VmReferenceModel,
  VmRelationshipModel,
  VmWithPurposeModel
};

// Patching exports.
export type { Config };
export {
  DefaultConfig,
  DocumentPatcher,
  Patch,
  PatchBuilder
};

// Serialization exports.
export {
  DidDocumentSerializer,
  FlexibleList,
  PatchSerializer
};

// Registrar exports.
export { Registrar };
export type { IKeyProvider, SigningKeyModel };

// Common exports.
export type { ILogger };
export {
  DidCoreError,
  ErrorCode,
  InvalidInputError,
  InvalidPatchError,
  Logger
};
