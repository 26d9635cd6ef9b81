import { MetricsCollector } from './MetricsCollector.js';

describe('MetricsCollector', () => {
  it('should derive averages from recorded events', () => {
    const collector = new MetricsCollector();
    collector.recordReceived();
    collector.recordReceived();
    collector.recordProcessed(100);
    collector.recordProcessed(300);
    collector.recordForwarded();
    collector.recordForwardFailure();
    collector.recordRejected();
    collector.recordQueueLength(2);
    collector.recordQueueLength(4);

    expect(collector.snapshot()).toEqual({
      received: 2,
      processed: 2,
      forwarded: 1,
      forwardFailures: 1,
      rejected: 1,
      avgWaitMs: 200,
      avgQueueLength: 3,
    });
  });

  it('should report zero averages before any samples', () => {
    const collector = new MetricsCollector();

    expect(collector.averageWaitMs()).toBe(0);
    expect(collector.averageQueueLength()).toBe(0);
  });

  it('should print a readable summary', () => {
    const collector = new MetricsCollector();
    collector.recordProcessed(12.34);

    const lines = collector.describe('P21').split('\n');
    expect(lines[0]).toBe('Statistics for P21:');
    expect(lines).toContain('  Avg Wait Time: 12.3ms');
  });
});
