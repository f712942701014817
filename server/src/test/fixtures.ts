import { CardId, Deal, GameState, Observation, Seat, Trick } from '../types/game';
import { cardSuit, toCardSet } from '../utils/cards';
import { applyAction, createGame } from '../utils/gameLogic';

// Each seat holds one whole suit: seat 0 coins, 1 cups, 2 swords, 3 clubs
export function suitPerSeatDeal(declarer: Seat = 0): Deal {
    const suitCards = (suit: number) => toCardSet(Array.from({ length: 10 }, (_, rank) => suit * 10 + rank));
    return { hands: [suitCards(0), suitCards(1), suitCards(2), suitCards(3)], declarer };
}

// Card c goes to seat c % 4
export function interleavedDeal(declarer: Seat = 0): Deal {
    const seatCards = (seat: number) => toCardSet(Array.from({ length: 10 }, (_, i) => i * 4 + seat));
    return { hands: [seatCards(0), seatCards(1), seatCards(2), seatCards(3)], declarer };
}

export function playAll(game: GameState, actions: readonly number[]): GameState {
    for (const action of actions) {
        applyAction(game, action);
    }
    return game;
}

export function gameWith(deal: Deal, actions: readonly number[] = []): GameState {
    return playAll(createGame(deal), actions);
}

export function makeObservation(overrides: Partial<Observation> & { hand: number; seat: Seat }): Observation {
    return {
        gameId: 'test-hand',
        phase: 'playing',
        declarer: 0,
        currentPlayer: overrides.seat,
        trumpSuit: 0,
        currentTrick: { plays: [], leadSuit: null },
        trickIndex: 0,
        scoresThirds: [0, 0],
        bonusTeam: null,
        history: [],
        playedMask: 0,
        isTerminal: false,
        ...overrides,
    };
}

export function trickOf(...plays: [Seat, CardId][]): Trick {
    const first = plays[0];
    return {
        plays: plays.map(([seat, card]) => ({ seat, card })),
        leadSuit: first === undefined ? null : cardSuit(first[1]),
    };
}

export function caught(fn: () => unknown): unknown {
    try {
        fn();
    } catch (err) {
        return err;
    }
    throw new Error('Expected the call to throw');
}
