/**
 * Model for representing a public key in JWK format.
 * Only `kty` is required; the remaining members depend on the key type (RFC 7517).
 */
export default interface JwkModel {
  kty: string;
  [parameter: string]: unknown;
}
