import type { LogLevel } from './utils/logger';
import { LOG_LEVELS } from './utils/logger';
import { validateLiteral, validateString } from './utils/validation';

/**
 * Runtime settings for the catalog queries, read from the environment.
 */
export type CatalogConfig = {
  logLevel: LogLevel;
  authorPrefix: string;
  titleFragment: string;
};

export const DEFAULT_CONFIG: CatalogConfig = {
  logLevel: 'info',
  authorPrefix: 'Gosling',
  titleFragment: 'Program',
};

/**
 * Builds the config from environment variables, falling back to {@link DEFAULT_CONFIG}.
 *
 * - `CATALOG_LOG_LEVEL`: `silent`, `info` or `debug`
 * - `CATALOG_AUTHOR_PREFIX`: prefix matched against author names
 * - `CATALOG_TITLE_FRAGMENT`: substring matched against titles
 *
 * @throws ValidationError if a variable is set to an empty or unknown value
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CatalogConfig {
  const { CATALOG_LOG_LEVEL, CATALOG_AUTHOR_PREFIX, CATALOG_TITLE_FRAGMENT } = env;

  return {
    logLevel:
      CATALOG_LOG_LEVEL === undefined
        ? DEFAULT_CONFIG.logLevel
        : validateLiteral(CATALOG_LOG_LEVEL, 'CATALOG_LOG_LEVEL', LOG_LEVELS),
    authorPrefix:
      CATALOG_AUTHOR_PREFIX === undefined
        ? DEFAULT_CONFIG.authorPrefix
        : validateString(CATALOG_AUTHOR_PREFIX, 'CATALOG_AUTHOR_PREFIX'),
    titleFragment:
      CATALOG_TITLE_FRAGMENT === undefined
        ? DEFAULT_CONFIG.titleFragment
        : validateString(CATALOG_TITLE_FRAGMENT, 'CATALOG_TITLE_FRAGMENT'),
  };
}
