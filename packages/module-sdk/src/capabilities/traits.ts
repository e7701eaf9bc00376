import { CapabilityRequestError } from '../errors';
import { httpRequest, buildUrl, type FetchLike, type HttpResponse } from '../internal/http';
import { noopLogger, type ModuleLogger } from '../logger';

export type TraitsFileType = 'csv' | 'json' | 'xml';

export interface TraitsCapabilityConfig {
  /** BETYdb root, e.g. `https://bety.example.org/bety`. */
  baseUrl: string;
  key?: string | null;
  timeoutMs?: number | null;
  fetchImpl?: FetchLike;
  logger?: ModuleLogger;
}

export interface SubmitTraitsInput {
  content: string | Uint8Array;
  fileType: string;
}

export interface TraitsCapability {
  /**
   * Uploads a traits file in one request. Resolves to the ids of the created
   * traits, or `null` when the file type is not one BETYdb accepts.
   */
  submitTraits(input: SubmitTraitsInput): Promise<string[] | null>;
}

const CONTENT_TYPES: Record<TraitsFileType, string> = {
  csv: 'text/csv',
  json: 'application/json',
  xml: 'application/xml'
};

const TRAITS_PATH = '/api/v1/traits';

export function isTraitsFileType(value: string): value is TraitsFileType {
  return Object.prototype.hasOwnProperty.call(CONTENT_TYPES, value);
}

function extractTraitIds(payload: unknown): string[] | null {
  if (!payload || typeof payload !== 'object' || !('data' in payload)) {
    return null;
  }
  const data = payload.data;
  if (!data || typeof data !== 'object' || !('ids_of_new_traits' in data)) {
    return null;
  }
  const ids = data.ids_of_new_traits;
  if (!Array.isArray(ids)) {
    return null;
  }
  return ids.map((id) => String(id));
}

export function createTraitsCapability(config: TraitsCapabilityConfig): TraitsCapability {
  const logger = config.logger ?? noopLogger;

  return {
    async submitTraits(input: SubmitTraitsInput): Promise<string[] | null> {
      const fileType = input.fileType.trim().toLowerCase();
      if (!isTraitsFileType(fileType)) {
        logger.error('Unsupported file type.', { fileType: input.fileType });
        return null;
      }

      const path = `${TRAITS_PATH}.${fileType}`;
      let response: HttpResponse<unknown>;
      try {
        response = await httpRequest<unknown>({
          baseUrl: config.baseUrl,
          path,
          method: 'POST',
          body: input.content,
          headers: { 'content-type': CONTENT_TYPES[fileType] },
          apiKey: config.key,
          timeoutMs: config.timeoutMs,
          fetchImpl: config.fetchImpl,
          expectJson: true
        });
      } catch (error) {
        if (error instanceof CapabilityRequestError) {
          logger.error('Error submitting data to BETYdb', { status: error.status, url: error.url });
        }
        throw error;
      }

      // BETYdb answers 200 or 201; anything else in the 2xx range is not a completed upload
      if (response.status !== 200 && response.status !== 201) {
        logger.error('Error submitting data to BETYdb', { status: response.status });
        throw new CapabilityRequestError({
          method: 'POST',
          url: buildUrl(config.baseUrl, path),
          status: response.status,
          metadata: { capability: 'traits' }
        });
      }

      const ids = extractTraitIds(response.data);
      if (!ids) {
        throw CapabilityRequestError.unexpectedResponse({
          method: 'POST',
          url: buildUrl(config.baseUrl, path),
          status: response.status,
          message: 'BETYdb response is missing data.ids_of_new_traits',
          metadata: { capability: 'traits' }
        });
      }

      logger.info('Data successfully submitted to BETYdb.', { traits: ids.length });
      return ids;
    }
  } satisfies TraitsCapability;
}
