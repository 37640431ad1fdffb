import type { CatalogInput, CatalogQueryOptions, CatalogReport } from '../types';
import type { CatalogConfig } from '../config';
import { DEFAULT_CONFIG } from '../config';
import { Logger } from '../utils/logger';
import { validateCatalogInput } from '../utils/validation';
import { motherChildPairs } from './family';
import { authorsWithMultipleBooks, titlesByAuthorPrefix, titlesContaining } from './books';
import { removeDuplicates } from './dedupe';

type QueryDefaults = Pick<CatalogConfig, 'authorPrefix' | 'titleFragment'>;

/**
 * Runs the family and book queries over a validated catalog.
 *
 * @example
 * ```typescript
 * const service = new CatalogQueryService(new Logger('info'));
 * const report = service.report({ people, books });
 * console.log(report.uniqueRepeatAuthors);
 * ```
 */
export class CatalogQueryService {
  /**
   * @param logger - Optional logger for debugging
   * @param defaults - Author prefix and title fragment used when `report` is given none
   */
  constructor(
    private readonly logger: Logger = new Logger('info'),
    private readonly defaults: QueryDefaults = DEFAULT_CONFIG,
  ) {}

  /**
   * Validate the catalog and answer every query once.
   *
   * @throws ValidationError if the input is malformed
   */
  report(input: CatalogInput, options: CatalogQueryOptions = {}): CatalogReport {
    const authorPrefix = options.authorPrefix ?? this.defaults.authorPrefix;
    const titleFragment = options.titleFragment ?? this.defaults.titleFragment;

    validateCatalogInput(input);

    this.logger.info('Catalog report started', {
      people: input.people.length,
      books: input.books.length,
    });
    this.logger.debug('Input validation passed');

    const explanation: string[] = [];

    const pairs = motherChildPairs(input.people);
    this.logger.debug('Mother/child pairs collected', { count: pairs.length });
    explanation.push(`Found ${pairs.length} mother/child pair(s)`);

    const titlesByAuthor = titlesByAuthorPrefix(input.books, authorPrefix);
    this.logger.debug('Author prefix query done', { authorPrefix, count: titlesByAuthor.length });
    explanation.push(`Found ${titlesByAuthor.length} title(s) with an author starting with "${authorPrefix}"`);

    const titlesMatching = titlesContaining(input.books, titleFragment);
    this.logger.debug('Title fragment query done', { titleFragment, count: titlesMatching.length });
    explanation.push(`Found ${titlesMatching.length} title(s) containing "${titleFragment}"`);

    const repeatAuthors = authorsWithMultipleBooks(input.books);
    const uniqueRepeatAuthors = removeDuplicates(repeatAuthors);
    this.logger.debug('Repeat authors collapsed', {
      before: repeatAuthors.length,
      after: uniqueRepeatAuthors.length,
    });
    explanation.push(
      `Found ${repeatAuthors.length} shared-author match(es), ${uniqueRepeatAuthors.length} after removing repeats`,
    );

    this.logger.info('Catalog report completed');

    return {
      motherChildPairs: pairs,
      titlesByAuthor,
      titlesMatching,
      repeatAuthors,
      uniqueRepeatAuthors,
      explanation,
    };
  }
}
