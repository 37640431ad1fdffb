import { CatalogQueryService } from './catalog/catalog-query.service';
import { loadFixtures } from './catalog/fixtures';
import { loadConfig } from './config';
import { Logger } from './utils/logger';

const config = loadConfig();
const logger = new Logger(config.logLevel);

const svc = new CatalogQueryService(logger, config);
const report = svc.report(loadFixtures());

logger.info(`Explanation: ${report.explanation.join(' | ')}`);

logger.table(
  report.motherChildPairs.map(([mother, child]) => ({ mother, child })),
  'Mothers and children',
);
logger.table(report.titlesByAuthor, `Titles by authors starting with "${config.authorPrefix}"`);
logger.table(report.titlesMatching, `Titles containing "${config.titleFragment}"`);
logger.table(
  { raw: report.repeatAuthors.join('; '), collapsed: report.uniqueRepeatAuthors.join('; ') },
  'Authors with two or more books',
);
