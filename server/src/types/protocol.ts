import type { Color } from './game';

export type PeerAddress = string;

export type Command =
  | { type: 'connect'; name: string }
  | { type: 'move'; cellIndex: number; name: string }
  | { type: 'reset' };

export type Response =
  | { type: 'ok'; peer: PeerAddress }
  | { type: 'fail'; message: string; peer: PeerAddress }
  | { type: 'move'; cellIndex: number; color: Color; winner: string | null }
  | { type: 'reset' };

export interface ClientToServerEvents {
  command: (payload: unknown) => void;
}

export interface ServerToClientEvents {
  response: (payload: Buffer) => void;
}
