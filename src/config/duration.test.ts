import { parseDuration } from './duration';

describe('parseDuration', () => {
  test.each([
    ['500ms', 500],
    ['30s', 30_000],
    ['1m', 60_000],
    ['1m30s', 90_000],
    ['1.5h', 5_400_000],
    ['2h15m', 8_100_000],
    [' 2s ', 2_000],
    ['0', 0],
  ])('parses %p as %p ms', (input, expected) => {
    expect(parseDuration(input)).toBe(expected);
  });

  test.each(['', '10', 'soon', '5d', '1m 30s', '-1s'])(
    'rejects %p',
    input => {
      expect(() => parseDuration(input)).toThrow(
        `Invalid duration "${input}"`,
      );
    },
  );
});
