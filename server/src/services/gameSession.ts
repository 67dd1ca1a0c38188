import type { GameSnapshot, GameState, Transition } from '../types/game';
import type { Command, PeerAddress, Response } from '../types/protocol';
import { createGame, handleCommand, removePeer, toSnapshot } from './gameService';

export interface GameSession {
  dispatch(command: Command, peer: PeerAddress): Promise<Response>;
  /** Removes a disconnected peer's players; resolves to a `reset` to broadcast when a game was interrupted. */
  leave(peer: PeerAddress): Promise<Response | null>;
  snapshot(): Promise<GameSnapshot>;
}

/**
 * The one game shared by every connection. Operations queue up and run one
 * at a time in the order they were submitted; the state is replaced only
 * when an operation returns, so a throwing operation changes nothing.
 */
export function createGameSession(initial: GameState = createGame()): GameSession {
  let state = initial;
  let tail: Promise<void> = Promise.resolve();

  function exclusive<T>(task: (game: GameState) => Transition<T>): Promise<T> {
    const run = tail.then(() => {
      const { game, result } = task(state);
      state = game;
      return result;
    });
    // A failure belongs to the caller of `run`; the queue moves on.
    tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  return {
    dispatch: (command, peer) => exclusive((game) => handleCommand(game, command, peer)),
    leave: (peer) =>
      exclusive<Response | null>((game) => {
        const { game: next, result: interrupted } = removePeer(game, peer);
        return { game: next, result: interrupted ? { type: 'reset' } : null };
      }),
    snapshot: () => exclusive((game) => ({ game, result: toSnapshot(game) })),
  };
}
