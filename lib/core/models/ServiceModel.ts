/**
 * A service endpoint is either a URL or a structured map.
 */
export type ServiceEndpoint = string | Record<string, unknown>;

/**
 * Defines the data structure of an element of the `service` array within the DID Document.
 */
export default interface ServiceModel {
  id: string;
  type: string[];
  serviceEndpoint: ServiceEndpoint[];
}
