import { parseArgv } from './argv';

describe('parseArgv', () => {
  it('defaults to help', () => {
    expect(parseArgv([])).toEqual({ command: 'help', options: {}, extra: [] });
  });

  it('reads flags, spaced values and inline values in camelCase', () => {
    expect(
      parseArgv(['load-csv', '--yes', '--batch-size', '500', '--chunk-size=20']),
    ).toEqual({
      command: 'load-csv',
      options: { yes: true, batchSize: '500', chunkSize: '20' },
      extra: [],
    });
  });

  it('keeps stray tokens apart', () => {
    expect(parseArgv(['validate', 'now', '--artifacts', 'bulk'])).toEqual({
      command: 'validate',
      options: { artifacts: 'bulk' },
      extra: ['now'],
    });
  });
});
