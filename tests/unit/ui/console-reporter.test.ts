import { describe, it, expect, vi, afterEach } from 'vitest';
import { createConsoleReporter } from '../../../src/ui/console-reporter.js';

describe('createConsoleReporter', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('hides debug lines unless verbose', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    createConsoleReporter().debug('git: status --porcelain');
    expect(log).not.toHaveBeenCalled();

    createConsoleReporter({ verbose: true }).debug('git: status --porcelain');
    expect(log).toHaveBeenCalledTimes(1);
  });

  it('sends warnings to stderr', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    createConsoleReporter().warn('data_dir override');
    expect(error).toHaveBeenCalledTimes(1);
  });
});
