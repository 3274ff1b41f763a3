import { describe, it, expect } from 'vitest';
import {
  ExitCodes,
  GraphErrorCode,
  getErrorCategory,
  getExitCodeForError,
} from '../ErrorCodes.js';
import {
  ConfigError,
  ContainerCycleError,
  CycleDetectedError,
  DanglingConnectionError,
  DuplicateNodeError,
  ScopeError,
  WorkflowLoadError,
} from '../WorkflowError.js';

describe('error codes', () => {
  it('maps each error code to an exit code', () => {
    expect(getExitCodeForError(GraphErrorCode.SCHEMA_PARSE_ERROR)).toBe(ExitCodes.INVALID_FORMAT);
    expect(getExitCodeForError(GraphErrorCode.SCHEMA_INVALID_STRUCTURE)).toBe(ExitCodes.INVALID_SCHEMA);
    expect(getExitCodeForError(GraphErrorCode.VALIDATION_DUPLICATE_ID)).toBe(ExitCodes.VALIDATION_FAILED);
    expect(getExitCodeForError(GraphErrorCode.VALIDATION_CYCLE_DETECTED)).toBe(ExitCodes.CIRCULAR_DEPENDENCY);
    expect(getExitCodeForError(GraphErrorCode.VALIDATION_CONTAINER_CYCLE)).toBe(ExitCodes.CIRCULAR_DEPENDENCY);
    expect(getExitCodeForError(GraphErrorCode.RUNTIME_FILE_NOT_FOUND)).toBe(ExitCodes.INVALID_FILE);
    expect(getExitCodeForError(GraphErrorCode.RUNTIME_READ_FAILED)).toBe(ExitCodes.FILESYSTEM_ERROR);
    expect(getExitCodeForError(GraphErrorCode.RUNTIME_INVALID_CONFIG)).toBe(ExitCodes.INVALID_CONFIG);
    expect(getExitCodeForError(GraphErrorCode.RUNTIME_INTERNAL_ERROR)).toBe(ExitCodes.INTERNAL_ERROR);
  });

  it('keeps exit codes within a byte', () => {
    for (const code of Object.values(GraphErrorCode)) {
      expect(getExitCodeForError(code)).toBeLessThan(256);
    }
  });

  it('names categories by prefix', () => {
    expect(getErrorCategory(GraphErrorCode.SCHEMA_PARSE_ERROR)).toBe('Schema Error');
    expect(getErrorCategory(GraphErrorCode.VALIDATION_UNKNOWN_SCOPE_ID)).toBe('Validation Error');
    expect(getErrorCategory(GraphErrorCode.RUNTIME_READ_FAILED)).toBe('Runtime Error');
  });
});

describe('GraphError', () => {
  it('carries the diagnostic of a dangling connection', () => {
    const error = new DanglingConnectionError('99', { sourceId: '1', targetId: '99' });

    expect(error.name).toBe('Validation Error');
    expect(error.exitCode).toBe(ExitCodes.VALIDATION_FAILED);
    expect(error.hint).toBe('Add tool "99" or remove the connection');
    expect(error.toolIds).toEqual(['99']);
    expect(error.context).toEqual({ end: 'target', sourceId: '1', targetId: '99' });
  });

  it('falls back to the suggested action as hint', () => {
    const error = new ContainerCycleError('5', ['5', '5']);

    expect(error.hint).toBe('Fix the container nesting so no container contains itself');
  });

  it('names each container of a nesting loop once', () => {
    expect(new ContainerCycleError('5', ['5', '6', '5']).toolIds).toEqual(['5', '6']);
  });

  it('lists cycle members in the hint and as tool ids', () => {
    const error = new CycleDetectedError(['1', '2'], ['1', '2', '1']);

    expect(error.hint).toBe('Tools 1, 2 are connected in a loop. Remove a connection to break it.');
    expect(error.toolIds).toEqual(['1', '2']);
  });

  it('gives filesystem and config problems no tool ids', () => {
    expect(WorkflowLoadError.fileNotFound('a.yxmd').toolIds).toEqual([]);
    expect(new ConfigError('bad').exitCode).toBe(ExitCodes.INVALID_CONFIG);
  });

  it('serializes to JSON', () => {
    expect(new ScopeError(['99', '98']).toJSON()).toEqual({
      name: 'Validation Error',
      code: 'YXG-V-005',
      exitCode: 105,
      severity: 'error',
      message: 'Scope contains unknown ToolIDs: 99, 98',
      toolIds: ['99', '98'],
      hint: 'Check the ToolIDs passed as scope',
    });
    expect(WorkflowLoadError.fileNotFound('a.yxmd').toJSON()).toEqual({
      name: 'Runtime Error',
      code: 'YXG-R-001',
      exitCode: 104,
      severity: 'error',
      message: 'Workflow file not found: a.yxmd',
      path: 'a.yxmd',
      toolIds: [],
      hint: 'Check the file path exists and is accessible',
    });
  });

  it('renders a plain string form', () => {
    expect(new ConfigError('Invalid logLevel: loud').toString()).toBe(
      'Runtime Error [YXG-R-004]: Invalid logLevel: loud\nHint: Fix the configuration value'
    );
    expect(new DuplicateNodeError('7').toString()).toBe(
      [
        'Validation Error [YXG-V-001]: Duplicate ToolID "7"',
        'Tools: 7',
        'Hint: Each tool must have a unique ToolID; "7" appears more than once',
      ].join('\n')
    );
  });
});
