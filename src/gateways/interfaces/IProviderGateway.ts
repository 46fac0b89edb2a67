import { FetchRequest, Observation } from '@/models';

/**
 * Provider Gateway Interface
 * Defines the contract for fetching historical observations from a data provider
 */
export interface IProviderGateway {
  /**
   * Short provider name used in logs and reports (e.g. "polygon")
   */
  readonly name: string;

  /**
   * Execute one fetch request
   *
   * Resolves to:
   * - an array of observations (possibly empty, in any order)
   * - null when the provider has no data for the request (Absent)
   *
   * @throws ProviderUnavailableError when the provider could not be asked
   */
  fetch(request: FetchRequest): Promise<Observation[] | null>;
}
