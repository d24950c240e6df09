import { formatDuration, parseIsoDuration } from './duration';

describe('parseIsoDuration', () => {
  it.each([
    ['PT1H2M10S', 3730],
    ['PT5M30S', 330],
    ['PT45S', 45],
    ['PT2H', 7200],
    ['P1DT2H', 93600],
    ['P0D', 0],
    ['not-a-duration', 0],
  ])('parses %s', (value, seconds) => {
    expect(parseIsoDuration(value)).toBe(seconds);
  });
});

describe('formatDuration', () => {
  it.each([
    [3730, '1:02:10'],
    [330, '5:30'],
    [45, '0:45'],
    [36000, '10:00:00'],
  ])('formats %i seconds', (seconds, text) => {
    expect(formatDuration(seconds)).toBe(text);
  });
});
