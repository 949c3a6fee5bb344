import { describe, it, expect } from 'vitest';
import { CommandError, ConfigError, IncludeCycleError, WorkspaceError } from '../../../src/core/errors.js';

describe('errors', () => {
  it('carries the command line, exit code and output of a failed tool', () => {
    const err = new CommandError('Failed to create wheelhouse.', ['uv', 'pip', 'sync'], 2, '', 'No solution found');
    expect(err.message).toBe('Failed to create wheelhouse.\nCommand: uv pip sync\nExit code: 2\n\nNo solution found');
    expect(err.code).toBe('COMMAND_ERROR');
    expect(err).toBeInstanceOf(WorkspaceError);
  });

  it('reports an include cycle as a config error', () => {
    const err = new IncludeCycleError(['/a.ini', '/b.ini', '/a.ini']);
    expect(err).toBeInstanceOf(ConfigError);
    expect(err.source).toBe('/a.ini');
    expect(err.message).toBe('INI include cycle detected: /a.ini -> /b.ini -> /a.ini');
  });
});
