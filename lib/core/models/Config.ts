/**
 * Defines all the configuration parameters of the library.
 */
export default interface Config {
  /** Raise an error instead of skipping a patch that is missing its payload. */
  strictPatching: boolean;
  /** Controller assigned to verification methods created by the registrar. */
  controller?: string;
  /** Number of random bytes in a generated key ID. */
  keyIdLength: number;
}

export const DefaultConfig: Config = {
  strictPatching: false,
  keyIdLength: 8
};
