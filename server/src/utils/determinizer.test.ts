import { describe, test, expect, vi, afterEach } from 'vitest';
import { GameState, Seat } from '../types/game';
import logger from '../logger';
import { EMPTY_SET, SEATS, cardCount, cardSuit, cardsIn, partnerOf, toCardSet } from './cards';
import { createRng, pick } from './rng';
import { applyAction, createGame, legalActions } from './gameLogic';
import { inferVoidSuits, observe, remainingHandSize } from './observation';
import { checkCardConservation } from './debug';
import { determinize } from './determinizer';
import { caught, makeObservation } from '../test/fixtures';

// Trump plus 13 cards: three tricks done, one card into the fourth
function midHand(seed: number): GameState {
    const game = createGame(seed);
    const rng = createRng(`mid-${seed}`);
    for (let i = 0; i < 14; i++) {
        applyAction(game, pick(legalActions(game, game.currentPlayer), rng));
    }
    return game;
}

afterEach(() => {
    vi.restoreAllMocks();
});

describe('determinize', () => {
    test('samples agree with everything the observer knows', () => {
        for (const seed of [21, 22, 23, 24]) {
            const game = midHand(seed);
            const view = observe(game, game.currentPlayer);
            const voids = inferVoidSuits(view);

            for (let sample = 0; sample < 5; sample++) {
                const { state, mode } = determinize(view, createRng(`sample-${seed}-${sample}`));
                expect(state.hands[view.seat]).toBe(view.hand);
                expect(state.playedMask).toBe(view.playedMask);
                expect(checkCardConservation(state)).toBe(true);
                for (const seat of SEATS) {
                    expect(cardCount(state.hands[seat])).toBe(remainingHandSize(view, seat));
                    if (mode === 'constrained') {
                        for (const card of cardsIn(state.hands[seat])) {
                            expect(voids[seat]?.[cardSuit(card)]).toBe(false);
                        }
                    }
                }
            }
        }
    });

    test('never deals a card into a suit its holder is void in', () => {
        // Seats 1 and 3 showed void in coins, seat 2 in cups. Every unseen coin
        // must land with seat 2 and no cups are left to place.
        const view = makeObservation({
            hand: toCardSet([4, 5, 14, 15, 16, 17, 18, 19]),
            seat: 0,
            trickIndex: 2,
            history: [
                {
                    leadSuit: 0,
                    plays: [{ seat: 0, card: 0 }, { seat: 1, card: 10 }, { seat: 2, card: 1 }, { seat: 3, card: 20 }],
                    winner: 0,
                    thirds: 4,
                },
                {
                    leadSuit: 1,
                    plays: [{ seat: 0, card: 11 }, { seat: 1, card: 12 }, { seat: 2, card: 30 }, { seat: 3, card: 13 }],
                    winner: 0,
                    thirds: 6,
                },
            ],
            scoresThirds: [10, 0],
            playedMask: toCardSet([0, 1, 10, 11, 12, 13, 20, 30]),
        });
        const voids = inferVoidSuits(view);
        expect(voids[1]?.[0]).toBe(true);
        expect(voids[2]?.[1]).toBe(true);
        expect(voids[3]?.[0]).toBe(true);

        for (let sample = 0; sample < 10; sample++) {
            const { state, mode, attempts } = determinize(view, createRng(`voids-${sample}`));
            expect(mode).toBe('constrained');
            expect(attempts).toBe(1);
            expect(state.hands[0]).toBe(view.hand);
            for (const seat of [1, 2, 3] as const) {
                expect(cardCount(state.hands[seat])).toBe(8);
                for (const card of cardsIn(state.hands[seat])) {
                    expect(voids[seat]?.[cardSuit(card)]).toBe(false);
                }
            }
            expect(cardsIn(state.hands[2]).filter(card => cardSuit(card) === 0)).toEqual([2, 3, 6, 7, 8, 9]);
            expect(checkCardConservation(state)).toBe(true);
        }
    });

    test('the same generator seed gives the same sample', () => {
        const game = midHand(25);
        const view = observe(game, game.currentPlayer);
        const a = determinize(view, createRng('repeat'));
        const b = determinize(view, createRng('repeat'));
        expect(a.state.hands).toEqual(b.state.hands);
    });

    test('a known partner hand is kept as is', () => {
        const game = midHand(26);
        const seat = game.currentPlayer;
        const partner: Seat = partnerOf(seat);
        const view = observe(game, seat);
        const knownHands = new Map([[partner, game.hands[partner]]]);

        for (let sample = 0; sample < 5; sample++) {
            const { state } = determinize(view, createRng(`known-${sample}`), { knownHands });
            expect(state.hands[partner]).toBe(game.hands[partner]);
        }
    });

    test('known hands of the wrong size are ignored', () => {
        const game = midHand(27);
        const seat = game.currentPlayer;
        const view = observe(game, seat);
        const knownHands = new Map([[partnerOf(seat), EMPTY_SET]]);

        const { state } = determinize(view, createRng('stale'), { knownHands });
        expect(cardCount(state.hands[partnerOf(seat)])).toBe(remainingHandSize(view, partnerOf(seat)));
        expect(checkCardConservation(state)).toBe(true);
    });

    test('falls back to an unconstrained deal when voids cannot be met', () => {
        const warn = vi.spyOn(logger, 'warn');
        // Seat 0 led the 3 of coins and everyone else showed void in coins,
        // yet nine coins remain unseen
        const view = makeObservation({
            hand: toCardSet([11, 12, 13, 14, 15, 16, 17, 18, 19]),
            seat: 0,
            trickIndex: 1,
            history: [{
                leadSuit: 0,
                plays: [{ seat: 0, card: 0 }, { seat: 1, card: 10 }, { seat: 2, card: 20 }, { seat: 3, card: 30 }],
                winner: 0,
                thirds: 4,
            }],
            scoresThirds: [4, 0],
            playedMask: toCardSet([0, 10, 20, 30]),
        });

        const result = determinize(view, createRng('stuck'), { maxAttempts: 3 });
        expect(result.mode).toBe('fallback');
        expect(result.attempts).toBe(3);
        expect(warn).toHaveBeenCalledTimes(1);
        expect(result.state.hands.map(cardCount)).toEqual([9, 9, 9, 9]);
        expect(checkCardConservation(result.state)).toBe(true);
    });

    test('an observation whose counts do not add up is corrupt', () => {
        const view = makeObservation({
            hand: toCardSet([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]),
            seat: 0,
            playedMask: toCardSet([39]),
        });
        expect(caught(() => determinize(view, createRng('bad')))).toMatchObject({ code: 'CORRUPT_STATE' });
    });
});
