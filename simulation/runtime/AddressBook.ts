import type { NodeAddress } from '../types/pipeline.js';
import { UnavailablePeerError } from '../types/errors.js';

export class AddressBook {
  private readonly entries = new Map<string, NodeAddress>();

  static fromPorts(host: string, ports: Readonly<Record<string, number>>): AddressBook {
    const book = new AddressBook();
    for (const [nodeId, port] of Object.entries(ports)) {
      // Port 0 means "assigned at listen time"; the node registers itself once bound.
      if (port > 0) {
        book.register(nodeId, { host, port });
      }
    }
    return book;
  }

  register(nodeId: string, address: NodeAddress): void {
    this.entries.set(nodeId, { ...address });
  }

  resolve(nodeId: string): NodeAddress {
    const address = this.entries.get(nodeId);
    if (!address) {
      throw new UnavailablePeerError(nodeId, 'unknown_address');
    }
    return address;
  }

  has(nodeId: string): boolean {
    return this.entries.has(nodeId);
  }

  ids(): string[] {
    return [...this.entries.keys()];
  }
}
