import { Logger } from '../src/utils/logger';

describe('Logger', () => {
  let log: jest.SpyInstance;
  let table: jest.SpyInstance;

  beforeEach(() => {
    log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    table = jest.spyOn(console, 'table').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('silent prints nothing', () => {
    const logger = new Logger('silent');
    logger.info('hello');
    logger.debug('hello');
    logger.table([1, 2]);
    expect(log).not.toHaveBeenCalled();
    expect(table).not.toHaveBeenCalled();
  });

  test('info skips debug lines', () => {
    const logger = new Logger('info');
    logger.info('started', { books: 5 });
    logger.debug('details');
    expect(log).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledWith('[INFO] started', { books: 5 });
  });

  test('debug prints both levels', () => {
    const logger = new Logger('debug');
    logger.info('a');
    logger.debug('b');
    expect(log.mock.calls).toEqual([
      ['[INFO] a', ''],
      ['[DEBUG] b', ''],
    ]);
  });

  test('table prints a prefixed title then the data', () => {
    new Logger('info').table(['x'], 'Titles');
    expect(log).toHaveBeenCalledWith('[INFO] Titles');
    expect(table).toHaveBeenCalledWith(['x']);
  });
});
