import { RingBuffer } from '../../../src/domain/metrics/RingBuffer';

describe('RingBuffer', () => {
  test('keeps items oldest first below capacity', () => {
    const ring = new RingBuffer<number>(3);
    ring.push(1);
    ring.push(2);
    expect(ring.size).toBe(2);
    expect(ring.toArray()).toEqual([1, 2]);
  });

  test('evicts the oldest item when full', () => {
    const ring = new RingBuffer<string>(3);
    for (const item of ['a', 'b', 'c', 'd', 'e']) ring.push(item);
    expect(ring.size).toBe(3);
    expect(ring.toArray()).toEqual(['c', 'd', 'e']);
  });

  test.each([0, -1, 1.5])('rejects capacity %p', (capacity) => {
    expect(() => new RingBuffer(capacity)).toThrow('RingBuffer capacity must be a positive integer.');
  });
});
