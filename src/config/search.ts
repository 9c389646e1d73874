/**
 * Search API credentials from environment variables
 */

import * as dotenv from 'dotenv';
import { ConfigurationError } from '../utils/errors';

dotenv.config();

export interface SearchConfig {
  apiKey: string;
  engineId: string;
}

/**
 * Read Google Custom Search credentials
 *
 * @throws ConfigurationError when either variable is missing
 */
export function loadSearchConfig(env: NodeJS.ProcessEnv = process.env): SearchConfig {
  const apiKey = env.GOOGLE_SEARCH_API_KEY;
  const engineId = env.GOOGLE_SEARCH_ENGINE_ID;

  if (!apiKey || !engineId) {
    throw new ConfigurationError(
      'GOOGLE_SEARCH_API_KEY and GOOGLE_SEARCH_ENGINE_ID must be set to resolve seed URLs'
    );
  }

  return { apiKey, engineId };
}
