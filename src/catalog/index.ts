export { CatalogQueryService } from './catalog-query.service';
export { CatalogError } from './catalog-error';
export { motherChildPairs } from './family';
export { titlesByAuthorPrefix, titlesContaining, authorsWithMultipleBooks } from './books';
export { removeDuplicates, removeRepeatsOf, distinct } from './dedupe';
export { loadFixtures } from './fixtures';
export { loadConfig, DEFAULT_CONFIG } from '../config';
export type { CatalogConfig } from '../config';
export { Logger } from '../utils/logger';
export type { LogLevel } from '../utils/logger';
export { ValidationError, validateCatalogInput, parseCatalogInput } from '../utils/validation';
export type {
  Doc,
  PersonDoc,
  MotherAndChildName,
  BookDoc,
  CatalogInput,
  CatalogQueryOptions,
  CatalogReport,
} from '../types';
