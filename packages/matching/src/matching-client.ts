import { ClientConfig, HttpClient, Logger, isApiError, scopedLogger } from '@circles/core';
import { CircleMatch, UserMatch, decodeCircleMatches, decodeUserMatches } from './models';

export const MATCHING_PATHS = {
  userMatches: '/interests/matching/find_user_matches/',
  circleMatches: '/matching/circles/',
} as const;

/**
 * Search-side matching. Results are always real server data: a 404 is an
 * empty list, any other failure propagates to the caller.
 */
export class MatchingClient {
  private log: Logger;

  constructor(
    private http: HttpClient,
    config: Pick<ClientConfig, 'logger'>,
  ) {
    this.log = scopedLogger(config.logger, 'Matching');
  }

  async findUserMatches(limit = 20): Promise<UserMatch[]> {
    const raw = await this.getOrEmpty(MATCHING_PATHS.userMatches, limit);
    const matches = raw === null ? [] : decodeUserMatches(raw, this.log);
    this.log.info(`${matches.length} user matches`);
    return matches;
  }

  async findCircleMatches(limit = 20): Promise<CircleMatch[]> {
    const raw = await this.getOrEmpty(MATCHING_PATHS.circleMatches, limit);
    const matches = raw === null ? [] : decodeCircleMatches(raw, this.log);
    this.log.info(`${matches.length} circle matches`);
    return matches;
  }

  private async getOrEmpty(path: string, limit: number): Promise<unknown> {
    try {
      return await this.http.get(path, { params: { limit } });
    } catch (error) {
      if (isApiError(error) && error.isNotFound) return null;
      throw error;
    }
  }
}
