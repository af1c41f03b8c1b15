import { truncate } from '../../../src/shared/text.js';

describe('truncate', () => {
  it('leaves text within the limit untouched', () => {
    expect(truncate('hello', 5)).toBe('hello');
  });

  it('cuts long text and says how much was dropped', () => {
    expect(truncate('abcdefghij', 4)).toBe('abcd\n... [truncated 6 chars]');
  });

  it('treats a non-positive limit as unlimited', () => {
    expect(truncate('abcdefghij', 0)).toBe('abcdefghij');
  });
});
