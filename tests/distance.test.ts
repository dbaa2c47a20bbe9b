import { describe, it, expect } from 'vitest';
import { canUse, capacity, congestedTicks, freeFlowTicks, sharesTraffic } from '../src/distance';
import { road } from './helpers';

describe('road travel times', () => {
  const street = road('s', 'a', 'b', 100, undefined, 13.4);
  const withBikeLane = road('l', 'a', 'b', 100, ['sidewalk', 'biking', 'driving', 'driving', 'sidewalk'], 13.4);
  const withBusLane = road('u', 'a', 'b', 100, ['bus', 'driving'], 10);

  it('gives each mode its own free-flow speed', () => {
    expect(freeFlowTicks(street, 'walk')).toBe(800);
    expect(freeFlowTicks(street, 'bike')).toBe(250);
    expect(freeFlowTicks(withBikeLane, 'bike')).toBe(200);
    expect(freeFlowTicks(street, 'drive')).toBe(75);
  });

  it('caps speeds at the speed limit', () => {
    const slow = road('slow', 'a', 'b', 100, undefined, 2);
    expect(freeFlowTicks(slow, 'bike')).toBe(500);
    expect(freeFlowTicks(slow, 'walk')).toBe(800);
  });

  it('sizes capacity by driving lanes and length', () => {
    expect(capacity(street)).toBe(26);
  });

  it('slows vehicles in proportion to the load already on the road', () => {
    expect(congestedTicks(street, 'drive', 0)).toBe(75);
    expect(congestedTicks(street, 'drive', 26)).toBe(150);
    expect(congestedTicks(street, 'bike', 26)).toBe(250);
  });

  it('lets buses skip traffic in a bus lane', () => {
    expect(sharesTraffic(withBusLane, 'bus')).toBe(false);
    expect(sharesTraffic(street, 'bus')).toBe(true);
    expect(congestedTicks(withBusLane, 'bus', 50)).toBe(100);
  });

  it('needs the right lane to use a road', () => {
    const carsOnly = road('c', 'a', 'b', 100, ['driving']);
    const closed = road('x', 'a', 'b', 100, []);
    expect(canUse(carsOnly, 'walk')).toBe(false);
    expect(canUse(carsOnly, 'bike')).toBe(true);
    expect(canUse(withBusLane, 'transit')).toBe(true);
    expect(canUse(closed, 'drive')).toBe(false);
  });
});
