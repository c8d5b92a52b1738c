import { describe, expect, it } from 'vitest';
import { InputError, NoBlocksError, describeError } from './errors.js';

describe('errors', () => {
  it('names the unreadable input', () => {
    expect(new InputError('-').message).toBe('cannot read stdin');
    expect(describeError(new InputError('a.md', { cause: new Error('ENOENT') }))).toBe('cannot read a.md: ENOENT');
  });

  it('carries the source of an empty parse', () => {
    const err = new NoBlocksError('notes.md');
    expect(err.name).toBe('NoBlocksError');
    expect(err.message).toBe('no blocks found in notes.md');
  });

  it('describes any thrown value', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
    expect(describeError('plain')).toBe('plain');
  });
});
