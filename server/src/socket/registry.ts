import { UnknownPeerError } from '../lib/errors';
import type { PeerAddress } from '../types/protocol';
import type { Outbox } from './outbox';

export interface ConnectionRegistry {
  register(address: PeerAddress, outbox: Outbox<Buffer>): void;
  unregister(address: PeerAddress): boolean;
  has(address: PeerAddress): boolean;
  readonly size: number;
  /** Queues `payload` for every registered peer; returns how many accepted it. */
  broadcast(payload: Buffer): number;
  /**
   * Queues `payload` for one peer. An unregistered address is a lifecycle
   * bug and throws; a closed channel is pruned and reported as `false`.
   */
  directMessage(payload: Buffer, address: PeerAddress): boolean;
}

export function createRegistry(): ConnectionRegistry {
  const peers = new Map<PeerAddress, Outbox<Buffer>>();

  function prune(address: PeerAddress) {
    console.warn(`[registry] pruning closed channel for ${address}`);
    peers.delete(address);
  }

  return {
    register(address, outbox) {
      const previous = peers.get(address);
      if (previous && previous !== outbox) {
        console.warn(`[registry] replacing channel for ${address}`);
        previous.close();
      }
      peers.set(address, outbox);
    },

    unregister(address) {
      const outbox = peers.get(address);
      if (!outbox) return false;
      outbox.close();
      peers.delete(address);
      return true;
    },

    has: (address) => peers.has(address),

    get size() {
      return peers.size;
    },

    broadcast(payload) {
      let delivered = 0;
      for (const [address, outbox] of peers) {
        if (outbox.send(payload)) delivered++;
        else prune(address);
      }
      return delivered;
    },

    directMessage(payload, address) {
      const outbox = peers.get(address);
      if (!outbox) throw new UnknownPeerError(address);
      if (outbox.send(payload)) return true;
      prune(address);
      return false;
    },
  };
}
