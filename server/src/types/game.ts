export type Suit = 0 | 1 | 2 | 3;
export type Seat = 0 | 1 | 2 | 3;
export type Team = 0 | 1;

// Card ids run 0..39: suit = floor(id / 10), rank index = id % 10
export type CardId = number;

// 40-bit set of card ids, bit n set when card n is present
export type CardSet = number;

export type Hands = [CardSet, CardSet, CardSet, CardSet];
export type TeamScores = [number, number];

export type GamePhase = 'trump_selection' | 'playing' | 'finished';

export interface TrickPlay {
    seat: Seat;
    card: CardId;
}

export interface Trick {
    plays: TrickPlay[];
    leadSuit: Suit | null;
}

export interface CompletedTrick {
    readonly leadSuit: Suit;
    readonly plays: readonly TrickPlay[];
    readonly winner: Seat;
    readonly thirds: number;
}

export interface Deal {
    hands: Hands;
    declarer: Seat;
}

export interface GameState {
    id: string;
    phase: GamePhase;
    hands: Hands;
    declarer: Seat;
    currentPlayer: Seat;
    trumpSuit: Suit | null;
    currentTrick: Trick;
    trickIndex: number;
    history: CompletedTrick[];
    scoresThirds: TeamScores;
    bonusTeam: Team | null;
    playedMask: CardSet; // every card played this hand, including the trick in progress
    truncated: boolean;
}

/**
 * Player-scoped view of a GameState. This is the only thing a policy ever
 * receives: it carries the acting seat's own hand and the public record, never
 * another seat's cards.
 */
export interface Observation {
    readonly gameId: string;
    readonly seat: Seat;
    readonly hand: CardSet;
    readonly phase: GamePhase;
    readonly declarer: Seat;
    readonly currentPlayer: Seat;
    readonly trumpSuit: Suit | null;
    readonly currentTrick: {
        readonly plays: readonly TrickPlay[];
        readonly leadSuit: Suit | null;
    };
    readonly trickIndex: number;
    readonly scoresThirds: readonly [number, number];
    readonly bonusTeam: Team | null;
    readonly history: readonly CompletedTrick[];
    readonly playedMask: CardSet;
    readonly isTerminal: boolean;
}

// voids[seat][suit] is true once the seat is known to hold no card of the suit
export type VoidTable = readonly (readonly boolean[])[];

export interface Policy {
    readonly name: string;
    chooseTrump(observation: Observation, legalSuits: readonly Suit[]): Suit;
    playCard(observation: Observation, legalCards: readonly CardId[]): CardId;
}

export type SeatPolicies = Policy | readonly [Policy, Policy, Policy, Policy];

export type DeterminizationMode = 'constrained' | 'fallback';

export interface Determinization {
    state: GameState;
    mode: DeterminizationMode;
    attempts: number;
}

export interface ActionEvaluation {
    action: number;
    averageDifferential: number;
    samples: number;
}
