import { describe, it, expect, vi } from 'vitest';
import { RandomStream } from '../src/random';

function draws(stream: RandomStream, n: number): number[] {
  return Array.from({ length: n }, () => stream.next());
}

describe('RandomStream', () => {
  it('repeats itself for the same seed', () => {
    expect(draws(RandomStream.seeded(42), 10)).toEqual(draws(RandomStream.seeded(42), 10));
  });

  it('differs between seeds', () => {
    expect(draws(RandomStream.seeded(1), 5)).not.toEqual(draws(RandomStream.seeded(2), 5));
  });

  it('restores to the saved position', () => {
    const stream = RandomStream.seeded(9);
    draws(stream, 5);
    const pos = stream.position();
    const rest = draws(stream, 5);
    expect(pos).toEqual({ seed: 9, draws: 5 });
    expect(draws(RandomStream.restore(pos), 5)).toEqual(rest);
  });

  it('counts one draw per value', () => {
    const stream = RandomStream.seeded(3);
    stream.uniformInt(0, 10);
    stream.pick(['x', 'y']);
    stream.weighted([1, 1]);
    expect(stream.position().draws).toBe(3);
  });

  it('rejects seeds that are not 32-bit unsigned integers', () => {
    expect(() => RandomStream.seeded(-1)).toThrow(RangeError);
    expect(() => RandomStream.seeded(1.5)).toThrow(RangeError);
    expect(() => RandomStream.seeded(2 ** 32)).toThrow(RangeError);
  });

  it('keeps uniformInt inside its half-open range', () => {
    const stream = RandomStream.seeded(11);
    for (let i = 0; i < 200; i++) {
      const v = stream.uniformInt(3, 7);
      expect(v).toBeGreaterThanOrEqual(3);
      expect(v).toBeLessThan(7);
      expect(Number.isInteger(v)).toBe(true);
    }
  });

  it('never picks a zero weight', () => {
    const stream = RandomStream.seeded(5);
    for (let i = 0; i < 50; i++) {
      expect(stream.weighted([0, 2, 0])).toBe(1);
    }
    expect(() => stream.weighted([0, 0])).toThrow(RangeError);
  });

  it('announces an entropy seed', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const stream = RandomStream.fromEntropy();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(String(warn.mock.calls[0][0])).toContain(`--rng_seed ${stream.seed}`);
    warn.mockRestore();
  });
});
