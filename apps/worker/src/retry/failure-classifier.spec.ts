import { classifyExitStatus } from './failure-classifier';

describe('classifyExitStatus', () => {
  it.each([
    [41, 'proxy_block'],
    [42, 'chrome_version'],
    [43, 'other_process_exist'],
    [44, 'unknown'],
  ])('maps exit status %i to %s', (exitStatus, genre) => {
    expect(classifyExitStatus(exitStatus)).toBe(genre);
  });

  it.each([0, 1, 2, 40, 45, 127, 255, -1])(
    'leaves exit status %i unclassified',
    (exitStatus) => {
      expect(classifyExitStatus(exitStatus)).toBeNull();
    },
  );

  it('leaves a run without exit status unclassified', () => {
    expect(classifyExitStatus(null)).toBeNull();
  });
});
