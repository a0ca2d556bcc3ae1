import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';

// ── Hoisted mock variables ─────────────────────────────────────────────────────

const { mockReadFileSync } = vi.hoisted(() => ({
  mockReadFileSync: vi.fn(),
}));

// ── Mocks ──────────────────────────────────────────────────────────────────────

vi.mock('node:fs', () => ({
  readFileSync: (...args: unknown[]) => mockReadFileSync(...args),
}));

import { didYouMean, printError, readInput, truncate } from '../helpers.js';

// ── Tests ──────────────────────────────────────────────────────────────────────

describe('readInput', () => {
  beforeEach(() => {
    mockReadFileSync.mockReset();
    mockReadFileSync.mockReturnValue('# Notes');
  });

  it('reads the named file as UTF-8', () => {
    expect(readInput('notes.md')).toBe('# Notes');
    expect(mockReadFileSync).toHaveBeenCalledWith('notes.md', 'utf-8');
  });

  it('reads stdin when no file is given', () => {
    readInput();
    expect(mockReadFileSync).toHaveBeenCalledWith(0, 'utf-8');
  });

  it('reads stdin for "-"', () => {
    readInput('-');
    expect(mockReadFileSync).toHaveBeenCalledWith(0, 'utf-8');
  });
});

describe('truncate', () => {
  it('returns original string when not longer than maxLen', () => {
    expect(truncate('hello', 10)).toBe('hello');
    expect(truncate('hello', 5)).toBe('hello');
  });

  it('truncates and appends an ellipsis', () => {
    expect(truncate('hello world', 8)).toBe('hello w…');
  });

  it('handles maxLen = 1', () => {
    expect(truncate('abc', 1)).toBe('…');
  });
});

describe('printError', () => {
  let stderrSpy: MockInstance;

  beforeEach(() => {
    process.exitCode = undefined;
    stderrSpy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    stderrSpy.mockRestore();
    process.exitCode = undefined;
  });

  it('prints the context and error message and sets exit code 1', () => {
    printError('Render failed', new Error('ENOENT: no such file'));

    expect(stderrSpy).toHaveBeenCalledWith('\n  Error: Render failed: ENOENT: no such file\n');
    expect(process.exitCode).toBe(1);
  });

  it('stringifies non-Error values', () => {
    printError('Send failed', 'timeout');

    expect(stderrSpy).toHaveBeenCalledWith('\n  Error: Send failed: timeout\n');
  });
});

describe('didYouMean', () => {
  const commands = ['render', 'send', 'admit', 'config'];

  it('suggests the closest command', () => {
    expect(didYouMean('rendr', commands)).toBe('render');
    expect(didYouMean('sned', commands)).toBe('send');
    expect(didYouMean('admti', commands)).toBe('admit');
  });

  it('ignores case', () => {
    expect(didYouMean('CONFIG', commands)).toBe('config');
  });

  it('returns undefined when nothing is close enough', () => {
    expect(didYouMean('deploy-everything', commands)).toBeUndefined();
  });

  it('respects a custom max distance', () => {
    expect(didYouMean('rnder', commands, 0)).toBeUndefined();
    expect(didYouMean('rnder', commands, 1)).toBe('render');
  });
});
