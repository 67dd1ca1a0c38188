import type { Server as HTTPServer } from 'http';
import { Server, type Socket } from 'socket.io';
import { env } from '../config/env';
import type { GameSession } from '../services/gameSession';
import type { ClientToServerEvents, PeerAddress, ServerToClientEvents } from '../types/protocol';
import { createCoordinator, type PeerLink } from './coordinator';
import type { ConnectionRegistry } from './registry';

type GameSocket = Socket<ClientToServerEvents, ServerToClientEvents>;

export function peerAddress(socket: GameSocket): PeerAddress {
  return `${socket.handshake.address}/${socket.id}`;
}

function linkFor(socket: GameSocket): PeerLink {
  return {
    address: peerAddress(socket),
    send: (payload) => {
      socket.emit('response', payload);
    },
    close: () => {
      socket.disconnect(true);
    },
  };
}

export function createSocketServer(httpServer: HTTPServer, session: GameSession, registry: ConnectionRegistry) {
  const io = new Server<ClientToServerEvents, ServerToClientEvents>(httpServer, {
    cors: {
      origin: env.corsOrigin,
      methods: ['GET', 'POST'],
    },
  });

  io.on('connection', (socket) => {
    const coordinator = createCoordinator(linkFor(socket), session, registry);
    console.log(`[socket] connected: ${coordinator.address}`);

    socket.on('command', (payload) => {
      coordinator.receive(payload).catch((err) => {
        console.error(`[socket] command from ${coordinator.address} failed`, err);
      });
    });

    socket.on('disconnect', (reason) => {
      coordinator.close(reason).catch((err) => {
        console.error(`[socket] cleanup for ${coordinator.address} failed`, err);
      });
    });

    coordinator.open().catch((err) => {
      console.error(`[socket] delivery loop for ${coordinator.address} failed`, err);
    });
  });

  return io;
}
