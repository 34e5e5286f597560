import { redactSecret } from './redact';

describe('redactSecret', () => {
  it('keeps the last four characters', () => {
    expect(redactSecret('test-virtual-key')).toBe('****-key');
  });

  it('hides short values entirely', () => {
    expect(redactSecret('abcd')).toBe('****');
    expect(redactSecret('')).toBe('****');
  });
});
