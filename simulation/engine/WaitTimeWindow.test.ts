import { WaitTimeWindow } from './WaitTimeWindow.js';

describe('WaitTimeWindow', () => {
  it('should evict the oldest sample once full', () => {
    const window = new WaitTimeWindow(3);
    window.pushAll([1, 2, 3, 4]);

    expect(window.samples()).toEqual([2, 3, 4]);
    expect(window.average()).toBe(3);
    expect(window.isFull()).toBe(true);
  });

  it('should average only the samples it holds', () => {
    const window = new WaitTimeWindow(10);
    window.push(100);
    window.push(300);

    expect(window.size).toBe(2);
    expect(window.average()).toBe(200);
    expect(window.isFull()).toBe(false);
  });

  it('should average to zero when empty', () => {
    expect(new WaitTimeWindow(4).average()).toBe(0);
  });

  it('should refuse a capacity that is not a positive integer', () => {
    expect(() => new WaitTimeWindow(0)).toThrow(RangeError);
    expect(() => new WaitTimeWindow(2.5)).toThrow(RangeError);
  });
});
