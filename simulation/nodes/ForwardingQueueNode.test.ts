import { AddressBook } from '../runtime/AddressBook.js';
import { sendMessage } from '../transport/connection.js';
import { makeRequest, requestsIn, startStub, testConfig, waitFor, type StubPeer } from '../test/fixtures.js';
import { ForwardingQueueNode } from './ForwardingQueueNode.js';

describe('ForwardingQueueNode', () => {
  const config = testConfig();
  let addressBook: AddressBook;
  let processor: StubPeer;
  let node: ForwardingQueueNode;

  beforeEach(async () => {
    addressBook = new AddressBook();
    processor = await startStub('P22', addressBook);
    node = new ForwardingQueueNode('Q22', { config, addressBook });
    await node.start();
  });

  afterEach(async () => {
    await node.stop(100);
    await processor.stop();
  });

  it('should forward requests to its fixed processor in arrival order', async () => {
    for (const requestId of ['a', 'b', 'c']) {
      await sendMessage('Q22', node.address, { kind: 'REQUEST', request: makeRequest('z2', { requestId }) }, config.transport);
    }
    await waitFor(() => processor.received.length === 3);

    const forwarded = requestsIn(processor.received);
    expect(node.target).toBe('P22');
    expect(forwarded.map((request) => request.requestId)).toEqual(['a', 'b', 'c']);
    expect(forwarded[0]?.hops).toEqual(['K1', 'Q22']);
  });

  it('should count a processor rejection as a forward failure', async () => {
    await processor.stop();
    processor = await startStub('P22', addressBook, () => ({ kind: 'ACK', nodeId: 'P22', accepted: false, reason: 'unavailable' }));

    await sendMessage('Q22', node.address, { kind: 'REQUEST', request: makeRequest('z2') }, config.transport);
    await waitFor(() => node.snapshot().stats.forwardFailures === 1);

    expect(node.snapshot().stats).toMatchObject({ received: 1, processed: 1, forwarded: 0 });
  });
});
