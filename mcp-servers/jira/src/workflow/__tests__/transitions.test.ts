import { isChronological, sortTransitions, toTransition, UNKNOWN_AUTHOR } from '../transitions';
import { transition } from './helpers';

describe('toTransition', () => {
  it('should parse the timestamp and freeze the result', () => {
    const parsed = toTransition({ timestamp: '2024-01-15T10:30:00.000+0000', fromStatus: 'To Do', toStatus: 'Done', author: 'Alice' });

    expect(parsed.timestamp.epochMicros).toBe(Date.UTC(2024, 0, 15, 10, 30) * 1000);
    expect(Object.isFrozen(parsed)).toBe(true);
  });

  it('should default a blank author', () => {
    expect(toTransition({ timestamp: '2024-01-15T10:30:00Z', fromStatus: 'a', toStatus: 'b', author: '  ' }).author).toBe(UNKNOWN_AUTHOR);
    expect(toTransition({ timestamp: '2024-01-15T10:30:00Z', fromStatus: 'a', toStatus: 'b' }).author).toBe('Unknown');
  });
});

describe('sortTransitions', () => {
  it('should order by instant and keep ties in input order', () => {
    const input = [
      transition('c', 'd', '2024-01-15T12:00:00Z', 'third'),
      transition('a', 'b', '2024-01-15T10:00:00Z', 'first'),
      transition('b', 'c', '2024-01-15T10:00:00Z', 'second'),
    ];

    const sorted = sortTransitions(input);

    expect(sorted.map(t => t.author)).toEqual(['first', 'second', 'third']);
    expect(isChronological(sorted)).toBe(true);
    expect(isChronological(input)).toBe(false);
    expect(input[0].author).toBe('third');
  });
});
