import { makeResponse } from '../test/fixtures.js';
import { ResponseAggregator } from './ResponseAggregator.js';

const PEERS = ['P21', 'P22', 'P23'];

describe('ResponseAggregator', () => {
  let aggregator: ResponseAggregator;

  beforeEach(() => {
    jest.useFakeTimers();
    jest.setSystemTime(10_000);
    aggregator = new ResponseAggregator({ timeoutMs: 1_000 });
  });

  afterEach(() => {
    aggregator.close();
    jest.useRealTimers();
  });

  it('should succeed once every expected peer answered with success', () => {
    aggregator.register('K1_1_1000', PEERS);
    for (const peer of ['P22', 'P23', 'P21']) {
      expect(aggregator.accept(makeResponse(peer))).toBe('accepted');
    }

    const outcome = aggregator.outcome('K1_1_1000');
    expect(outcome?.status).toBe('SUCCESS');
    expect(outcome?.reason).toBe('completed');
    expect(outcome?.responses.map((response) => response.processedBy)).toEqual(['P22', 'P23', 'P21']);
    expect(aggregator.isPending('K1_1_1000')).toBe(false);
  });

  it('should fail when any of the three responses reports failure', () => {
    aggregator.register('K1_1_1000', PEERS);
    aggregator.accept(makeResponse('P21'));
    aggregator.accept(makeResponse('P22', { success: false }));
    aggregator.accept(makeResponse('P23'));

    expect(aggregator.outcome('K1_1_1000')).toMatchObject({ status: 'FAILED', reason: 'partial_failure' });
  });

  it('should fail at the deadline when a peer never answers', () => {
    aggregator.register('K1_1_1000', PEERS);
    aggregator.accept(makeResponse('P21'));
    aggregator.accept(makeResponse('P22'));

    jest.advanceTimersByTime(999);
    expect(aggregator.isPending('K1_1_1000')).toBe(true);

    jest.advanceTimersByTime(1);
    const outcome = aggregator.outcome('K1_1_1000');
    expect(outcome).toMatchObject({ status: 'FAILED', reason: 'timeout', submittedAt: 10_000, finalizedAt: 11_000 });
    expect(outcome?.responses).toHaveLength(2);
  });

  it('should not double count a duplicate response', () => {
    aggregator.register('K1_1_1000', PEERS);
    aggregator.accept(makeResponse('P21'));

    expect(aggregator.accept(makeResponse('P21'))).toBe('duplicate');
    expect(aggregator.isPending('K1_1_1000')).toBe(true);

    aggregator.accept(makeResponse('P22'));
    aggregator.accept(makeResponse('P23'));
    expect(aggregator.outcome('K1_1_1000')?.responses).toHaveLength(3);
    expect(aggregator.outcome('K1_1_1000')?.status).toBe('SUCCESS');
  });

  it('should ignore responses for finalized, unknown or unexpected sources', () => {
    aggregator.register('K1_1_1000', ['P23']);

    expect(aggregator.accept(makeResponse('P21'))).toBe('unexpected_peer');
    expect(aggregator.accept(makeResponse('P23'))).toBe('accepted');
    expect(aggregator.accept(makeResponse('P23'))).toBe('late');
    expect(aggregator.accept(makeResponse('P23', { requestId: 'K9_1_1' }))).toBe('unknown');
    expect(aggregator.outcome('K1_1_1000')?.responses).toHaveLength(1);
  });

  it('should refuse to track the same request twice or with no peers', () => {
    aggregator.register('K1_1_1000', PEERS);

    expect(() => aggregator.register('K1_1_1000', PEERS)).toThrow('Request K1_1_1000 is already tracked');
    expect(() => aggregator.register('K1_2_1000', [])).toThrow('Request K1_2_1000 must expect at least one peer');
  });

  it('should fail undeliverable requests right away', () => {
    aggregator.register('K1_1_1000', PEERS);

    expect(aggregator.fail('K1_1_1000', 'undeliverable')?.reason).toBe('undeliverable');
    expect(aggregator.fail('K1_1_1000', 'undeliverable')).toBeNull();
    expect(aggregator.counts()).toEqual({ pending: 0, successful: 0, failed: 1 });
  });

  it('should sweep overdue records', () => {
    aggregator.register('K1_1_1000', PEERS);
    aggregator.register('K1_2_1000', PEERS);

    expect(aggregator.expireDue(10_500)).toEqual([]);
    const expired = aggregator.expireDue(11_000);
    expect(expired.map((outcome) => outcome.requestId)).toEqual(['K1_1_1000', 'K1_2_1000']);
    expect(aggregator.pendingCount).toBe(0);
  });

  it('should notify listeners and waiters when a record is finalized', async () => {
    const seen: string[] = [];
    aggregator.onFinalized((outcome) => seen.push(`${outcome.requestId}:${outcome.status}`));
    aggregator.register('K1_1_1000', ['P21']);

    const waiting = aggregator.whenFinalized('K1_1_1000');
    const settled = aggregator.whenSettled();
    aggregator.accept(makeResponse('P21'));

    await expect(waiting).resolves.toMatchObject({ requestId: 'K1_1_1000', status: 'SUCCESS' });
    await expect(settled).resolves.toBeUndefined();
    expect(seen).toEqual(['K1_1_1000:SUCCESS']);
    await expect(aggregator.whenFinalized('K9_9_9')).resolves.toBeUndefined();
  });

  it('should time out whatever is still open on close', () => {
    aggregator.register('K1_1_1000', PEERS);
    aggregator.close();

    expect(aggregator.outcome('K1_1_1000')?.reason).toBe('timeout');
  });
});
