import { InvalidArgumentError } from 'commander';
import { logLevels } from './bootstrap';
import { parseStackAction } from './stack';

describe('parseStackAction', () => {
  it.each(['preview', 'up', 'destroy', 'outputs'])('accepts %s', (action) => {
    expect(parseStackAction(action)).toBe(action);
  });

  it('rejects anything else', () => {
    expect(() => parseStackAction('refresh')).toThrow(InvalidArgumentError);
    expect(() => parseStackAction('refresh')).toThrow(
      'Expected one of: preview, up, destroy, outputs',
    );
  });
});

describe('logLevels', () => {
  it('adds debug output only when verbose', () => {
    expect(logLevels({})).toEqual(['log', 'warn', 'error']);
    expect(logLevels({ verbose: true })).toEqual(['log', 'warn', 'error', 'debug', 'verbose']);
  });
});
