import { silentLogger } from '../testing/fakes';
import { parseRetryCount } from './retry-count';

const cases: Array<[Record<string, string>, number]> = [
  [{}, 0],
  [{ retry_count: '' }, 0],
  [{ retry_count: '0' }, 0],
  [{ retry_count: '2' }, 2],
  [{ retry_count: ' 3 ' }, 3],
  [{ retry_count: '+4' }, 4],
];

describe('parseRetryCount', () => {
  it.each(cases)('parses %j as %i', (attributes, expected) => {
    expect(parseRetryCount(attributes, silentLogger)).toBe(expected);
  });

  it.each(['two', '1.5', '2x', 'NaN'])('treats %s as 0 with a warning', (raw) => {
    const warn = jest.spyOn(silentLogger, 'warn');
    expect(parseRetryCount({ retry_count: raw }, silentLogger)).toBe(0);
    expect(warn).toHaveBeenCalledWith({ retry_count: raw }, 'invalid retry_count attribute');
    warn.mockRestore();
  });
});
