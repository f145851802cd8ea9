/**
 * DID Document verification relationships a public key can be used for.
 */
enum KeyPurpose {
  Authentication = 'authentication',
  AssertionMethod = 'assertionMethod',
  KeyAgreement = 'keyAgreement',
  CapabilityDelegation = 'capabilityDelegation',
  CapabilityInvocation = 'capabilityInvocation'
}

export default KeyPurpose;
