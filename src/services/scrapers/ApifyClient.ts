import axios, { AxiosInstance } from 'axios';
import { logger } from '../../config/logger';
import { ConfigurationError, ExternalServiceError } from '../../utils/errors';
import { UnknownRecord, isRecord } from '../../utils/records';

export const APIFY_API_URL = 'https://api.apify.com/v2';

// Synchronous actor runs can take minutes
const RUN_TIMEOUT_MS = 300000;

export interface ActorRunner {
  runActor(actorId: string, input: Record<string, unknown>): Promise<UnknownRecord[]>;
}

/**
 * Runs an Apify actor to completion and returns its dataset items.
 */
export class ApifyClient implements ActorRunner {
  private http: AxiosInstance;

  constructor(
    private readonly token: string,
    http?: AxiosInstance
  ) {
    this.http = http ?? axios.create({ baseURL: APIFY_API_URL, timeout: RUN_TIMEOUT_MS });
  }

  async runActor(actorId: string, input: Record<string, unknown>): Promise<UnknownRecord[]> {
    if (!this.token) {
      throw new ConfigurationError('APIFY_API_TOKEN not configured');
    }

    // The REST API addresses "user/actor" as "user~actor"
    const actorPath = actorId.replace('/', '~');
    logger.info(`🕷️ Running Apify actor ${actorId}`);

    try {
      const response = await this.http.post<unknown>(`/acts/${actorPath}/run-sync-get-dataset-items`, input, {
        params: { token: this.token },
      });

      if (!Array.isArray(response.data)) {
        throw new ExternalServiceError('Apify', `actor ${actorId} returned no dataset items`);
      }

      const items = response.data.filter(isRecord);
      logger.info(`✅ Apify actor ${actorId} returned ${items.length} items`);
      return items;
    } catch (error) {
      if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        throw new ExternalServiceError('Apify', `actor ${actorId} failed: ${error.message}`, status);
      }
      throw error;
    }
  }
}
