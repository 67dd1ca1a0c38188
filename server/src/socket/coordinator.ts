import { decodeCommand, encodeResponse } from '../lib/codec';
import { DecodeError, UnknownPeerError } from '../lib/errors';
import type { GameSession } from '../services/gameSession';
import type { Command, PeerAddress, Response } from '../types/protocol';
import { Outbox } from './outbox';
import type { ConnectionRegistry } from './registry';

/** The transport side of one connection. */
export interface PeerLink {
  readonly address: PeerAddress;
  send(payload: Buffer): void;
  close(): void;
}

export interface ConnectionCoordinator {
  readonly address: PeerAddress;
  /** Registers the peer and drains its outbox until the connection closes. */
  open(): Promise<void>;
  receive(data: unknown): Promise<void>;
  /** Deregisters the peer and frees its seat; idempotent. */
  close(reason: string): Promise<void>;
}

function summarize(command: Command): string {
  switch (command.type) {
    case 'connect':
      return `connect name=${command.name}`;
    case 'move':
      return `move cell=${command.cellIndex} name=${command.name}`;
    case 'reset':
      return 'reset';
  }
}

/**
 * Bridges one connection to the shared game session and the registry.
 * Inbound commands and outbound delivery run independently: `receive`
 * handles one payload, while the loop started by `open` drains this peer's
 * outbox to the socket.
 */
export function createCoordinator(
  link: PeerLink,
  session: GameSession,
  registry: ConnectionRegistry,
): ConnectionCoordinator {
  const { address } = link;
  const outbox = new Outbox<Buffer>();
  let closed = false;

  function deliver(response: Response) {
    const payload = encodeResponse(response);
    switch (response.type) {
      case 'move':
      case 'reset':
        registry.broadcast(payload);
        return;
      case 'ok':
      case 'fail':
        try {
          registry.directMessage(payload, response.peer);
        } catch (err) {
          if (!(err instanceof UnknownPeerError)) throw err;
          console.error(`[registry] undeliverable ${response.type} response: ${err.message}`);
        }
        return;
    }
  }

  async function close(reason: string) {
    if (closed) return;
    closed = true;
    registry.unregister(address);
    console.log(`[socket] closed ${address} reason=${reason}`);
    const interrupted = await session.leave(address);
    if (interrupted) {
      console.log(`[game] ${address} left a game in progress, resetting`);
      deliver(interrupted);
    }
  }

  async function open() {
    registry.register(address, outbox);
    for await (const payload of outbox) {
      try {
        link.send(payload);
      } catch (err) {
        console.error(`[socket] send to ${address} failed`, err);
        link.close();
        await close('send failure');
        break;
      }
    }
  }

  async function receive(data: unknown) {
    if (closed) return;
    let command: Command;
    try {
      command = decodeCommand(data);
    } catch (err) {
      if (!(err instanceof DecodeError)) throw err;
      console.warn(`[socket] malformed payload from ${address}: ${err.message}`);
      link.close();
      await close('decode error');
      return;
    }

    console.log(`[game] ${address} ${summarize(command)}`);
    deliver(await session.dispatch(command, address));
  }

  return { address, open, receive, close };
}
