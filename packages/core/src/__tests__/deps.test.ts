import { describe, it, expect } from 'vitest';
import { DependencyChecker } from '../setup/deps.js';
import { MissingDependencyError } from '../errors.js';

const withFetch = { fetch: () => undefined };

describe('DependencyChecker', () => {
  it('reports rich parsing when fetch exists and the parser is not forced to text', () => {
    const report = new DependencyChecker('auto', withFetch).detect();
    expect(report.richParsing).toBe(true);
    expect(report.dependencies.map(d => [d.name, d.installed])).toEqual([['fetch', true], ['json', true]]);
  });

  it('degrades to text parsing without failing', () => {
    const report = new DependencyChecker('text', withFetch).detect();
    expect(report.richParsing).toBe(false);
  });

  it('fails when no HTTP client is available', () => {
    const checker = new DependencyChecker('auto', {});
    expect(() => checker.detect()).toThrow(MissingDependencyError);

    const err = (() => {
      try {
        checker.detect();
      } catch (e) {
        return e;
      }
    })();
    expect(err).toBeInstanceOf(MissingDependencyError);
    expect((err as MissingDependencyError).remediation[0]).toBe('macOS: brew install node@20');
  });

  it('checks the real runtime by default', () => {
    expect(new DependencyChecker().checkHttpClient().installed).toBe(true);
  });
});
