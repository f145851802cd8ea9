import JwkModel from '../../core/models/JwkModel';

/**
 * A public signing key handed out by an `IKeyProvider`.
 */
export default interface SigningKeyModel {
  publicKeyJwk: JwkModel;
  /** Verification method type of the key, e.g. `JsonWebKey2020`. */
  type: string;
}
