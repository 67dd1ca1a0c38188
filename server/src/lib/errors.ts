export type GameErrorCode =
  | 'NotEnoughPlayers'
  | 'OutOfTurn'
  | 'GameFull'
  | 'NameTaken'
  | 'UnknownPlayer'
  | 'InvalidName'
  | 'GameOver'
  | 'InvalidCell'
  | 'CellOccupied';

const MESSAGES: Record<GameErrorCode, string> = {
  NotEnoughPlayers: 'Wait for a second player to connect',
  OutOfTurn: "It's not your move",
  GameFull: 'Game is full',
  NameTaken: 'Name already taken',
  UnknownPlayer: 'You are not a player in this game',
  InvalidName: 'Name must be 1 to 32 characters',
  GameOver: 'Game is over, reset to play again',
  InvalidCell: 'Invalid cell index',
  CellOccupied: 'Cell occupied',
};

/** A rejected command. Reported to the peer that sent it, never broadcast. */
export class GameRuleError extends Error {
  readonly code: GameErrorCode;

  constructor(code: GameErrorCode) {
    super(MESSAGES[code]);
    this.name = 'GameRuleError';
    this.code = code;
  }
}

/** Malformed wire payload. Fatal for the connection that sent it. */
export class DecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DecodeError';
  }
}

/** A response was addressed to a peer the registry does not know. */
export class UnknownPeerError extends Error {
  readonly address: string;

  constructor(address: string) {
    super(`no connection registered for peer ${address}`);
    this.name = 'UnknownPeerError';
    this.address = address;
  }
}
