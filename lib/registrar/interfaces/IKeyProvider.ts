import SigningKeyModel from '../models/SigningKeyModel';

/**
 * Source of key material for the registrar.
 * Key generation and storage stay with the implementer, only public keys cross this boundary.
 */
export default interface IKeyProvider {
  /**
   * Gets the public key to sign with next.
   */
  nextSigningKey (): Promise<SigningKeyModel>;
}
