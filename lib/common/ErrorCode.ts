/**
 * Error codes.
 */
export default {
  DidDocumentSerializerDocumentNotObject: 'did_document_serializer_document_not_object',
  DidDocumentSerializerIdNotString: 'did_document_serializer_id_not_string',
  DidDocumentSerializerJwkNotObject: 'did_document_serializer_jwk_not_object',
  DidDocumentSerializerPropertyNotString: 'did_document_serializer_property_not_string',
  DidDocumentSerializerServiceNotObject: 'did_document_serializer_service_not_object',
  DidDocumentSerializerServicesNotArray: 'did_document_serializer_services_not_array',
  DidDocumentSerializerStringArrayElementNotString: 'did_document_serializer_string_array_element_not_string',
  DidDocumentSerializerVerificationMethodNotObject: 'did_document_serializer_verification_method_not_object',
  DidDocumentSerializerVerificationMethodsNotArray: 'did_document_serializer_verification_methods_not_array',
  DocumentPatcherPatchPayloadMissing: 'document_patcher_patch_payload_missing',
  DocumentPatcherUnknownAction: 'document_patcher_unknown_action',
  FlexibleListElementIncorrectType: 'flexible_list_element_incorrect_type',
  FlexibleListInputIncorrectType: 'flexible_list_input_incorrect_type',
  FlexibleListStringNotAccepted: 'flexible_list_string_not_accepted',
  PatchBuilderDocumentNotAllowed: 'patch_builder_document_not_allowed',
  PatchBuilderDocumentMissing: 'patch_builder_document_missing',
  PatchBuilderIdDuplicated: 'patch_builder_id_duplicated',
  PatchBuilderIdNotAllowed: 'patch_builder_id_not_allowed',
  PatchBuilderIdNotUsingAllowedCharacterSet: 'patch_builder_id_not_using_allowed_character_set',
  PatchBuilderIdsMissing: 'patch_builder_ids_missing',
  PatchBuilderPublicKeyIdDuplicated: 'patch_builder_public_key_id_duplicated',
  PatchBuilderPublicKeyInvalidPurpose: 'patch_builder_public_key_invalid_purpose',
  PatchBuilderPublicKeyNotAllowed: 'patch_builder_public_key_not_allowed',
  PatchBuilderPublicKeyPurposesDuplicated: 'patch_builder_public_key_purposes_duplicated',
  PatchBuilderPublicKeysMissing: 'patch_builder_public_keys_missing',
  PatchBuilderServiceEndpointMissing: 'patch_builder_service_endpoint_missing',
  PatchBuilderServiceEndpointStringNotValidUri: 'patch_builder_service_endpoint_string_not_valid_uri',
  PatchBuilderServiceIdDuplicated: 'patch_builder_service_id_duplicated',
  PatchBuilderServiceNotAllowed: 'patch_builder_service_not_allowed',
  PatchBuilderServiceTypeMissing: 'patch_builder_service_type_missing',
  PatchBuilderServicesMissing: 'patch_builder_services_missing',
  PatchSerializerActionUnknown: 'patch_serializer_action_unknown',
  PatchSerializerIdsNotArray: 'patch_serializer_ids_not_array',
  PatchSerializerPatchNotObject: 'patch_serializer_patch_not_object',
  PatchSerializerPublicKeysNotArray: 'patch_serializer_public_keys_not_array',
  PatchSerializerPurposeUnknown: 'patch_serializer_purpose_unknown',
  PatchSerializerPurposesNotArray: 'patch_serializer_purposes_not_array',
  PatchSerializerServicesNotArray: 'patch_serializer_services_not_array',
  RegistrarOperationNotSupported: 'registrar_operation_not_supported'
};
