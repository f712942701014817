import { GameState, Seat } from './game';

export type GameErrorCode = 'INVALID_ACTION' | 'INVALID_DEAL' | 'CORRUPT_STATE' | 'INVALID_CONFIG';

/**
 * Error carrying an optional GameState reference and a machine-readable code.
 */
export class GameError extends Error {
    public game?: GameState;
    public code?: GameErrorCode;

    constructor(message: string, game?: GameState, code?: GameErrorCode) {
        super(message);
        this.name = 'GameError';

        if (game !== undefined) {
            this.game = game;
        }

        if (code !== undefined) {
            this.code = code;
        }

        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, new.target);
        }
    }
}

// Thrown by applyAction for anything outside the current legal set
export class InvalidActionError extends GameError {
    public readonly action: number;
    public readonly seat: Seat;

    constructor(message: string, game: GameState, action: number, seat: Seat) {
        super(message, game, 'INVALID_ACTION');
        this.name = 'InvalidActionError';
        this.action = action;
        this.seat = seat;
    }
}
