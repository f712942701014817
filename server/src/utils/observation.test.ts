import { describe, test, expect } from 'vitest';
import { cardSuit, toCardSet } from './cards';
import { createRng, pick } from './rng';
import { applyAction, createGame, isTerminal, legalActions } from './gameLogic';
import {
    currentWinningTeam,
    highCardsSeenFraction,
    inferVoidSuits,
    isFreshHand,
    legalCardsFor,
    observe,
    pointsOnTable,
    remainingHandSize,
    winsIfPlayed,
} from './observation';
import { caught, gameWith, interleavedDeal, suitPerSeatDeal } from '../test/fixtures';

describe('observe', () => {
    test('carries only the observer\'s own hand', () => {
        const game = gameWith(suitPerSeatDeal(), [0, 0]);
        const view = observe(game, 1);
        expect('hands' in view).toBe(false);
        expect(view.hand).toBe(game.hands[1]);
        expect(view.currentPlayer).toBe(1);
        expect(view.playedMask).toBe(toCardSet([0]));
        expect(view.isTerminal).toBe(false);
    });

    test('is a copy, not a window onto the state', () => {
        const game = gameWith(suitPerSeatDeal(), [0, 0]);
        const view = observe(game, 1);
        applyAction(game, 10);
        expect(view.currentTrick.plays).toHaveLength(1);
        expect(view.scoresThirds).toEqual([0, 0]);
    });

    test('a hand of the wrong size is reported as corrupt', () => {
        const game = createGame(suitPerSeatDeal());
        game.hands[1] = toCardSet([10]);
        expect(caught(() => observe(game, 1))).toMatchObject({ code: 'CORRUPT_STATE' });
    });

    test('remaining hand sizes count the trick in progress', () => {
        const view = observe(gameWith(suitPerSeatDeal(), [0, 0]), 1);
        expect(remainingHandSize(view, 0)).toBe(9);
        expect(remainingHandSize(view, 1)).toBe(10);
    });

    test('fresh only before trump is declared', () => {
        const game = createGame(suitPerSeatDeal());
        expect(isFreshHand(observe(game, 0))).toBe(true);
        applyAction(game, 0);
        expect(isFreshHand(observe(game, 0))).toBe(false);
    });

    test('no legal cards while trump is being chosen', () => {
        expect(legalCardsFor(observe(createGame(suitPerSeatDeal()), 0))).toEqual([]);
        expect(legalCardsFor(observe(gameWith(interleavedDeal(), [0, 12]), 1))).toEqual([13, 17]);
    });
});

describe('inferVoidSuits', () => {
    test('off-suit plays in completed tricks mark the lead suit void', () => {
        const view = observe(gameWith(suitPerSeatDeal(), [0, 0, 19, 29, 39]), 0);
        expect(inferVoidSuits(view)).toEqual([
            [false, false, false, false],
            [true, false, false, false],
            [true, false, false, false],
            [true, false, false, false],
        ]);
    });

    test('the trick in progress counts too', () => {
        const view = observe(gameWith(suitPerSeatDeal(), [0, 0, 19]), 2);
        const voids = inferVoidSuits(view);
        expect(voids[1]).toEqual([true, false, false, false]);
        expect(voids[2]).toEqual([false, false, false, false]);
    });

    test('no seat ever plays a suit it was inferred void in', () => {
        for (const seed of [11, 12, 13]) {
            const rng = createRng(`voids-${seed}`);
            const game = createGame(seed);
            while (!isTerminal(game)) {
                const seat = game.currentPlayer;
                const action = pick(legalActions(game, seat), rng);
                if (game.phase === 'playing') {
                    const voids = inferVoidSuits(observe(game, seat));
                    expect(voids[seat]?.[cardSuit(action)]).toBe(false);
                }
                applyAction(game, action);
            }
        }
    });
});

describe('trick in progress', () => {
    // Interleaved deal, coins trump, seat 0 has led the A of cups
    const view = observe(gameWith(interleavedDeal(), [0, 12]), 1);

    test('points on the table and who is winning', () => {
        expect(pointsOnTable(view)).toBe(1);
        expect(currentWinningTeam(view)).toBe(0);
    });

    test('winsIfPlayed compares against the current winner', () => {
        expect(winsIfPlayed(view, 17)).toBe(false);
        expect(winsIfPlayed(view, 13)).toBe(false);
        expect(winsIfPlayed(view, 1)).toBe(true);
    });

    test('nothing to win when leading', () => {
        const leading = observe(gameWith(interleavedDeal(), [0]), 0);
        expect(pointsOnTable(leading)).toBe(0);
        expect(currentWinningTeam(leading)).toBeNull();
        expect(winsIfPlayed(leading, 12)).toBe(false);
    });
});

describe('highCardsSeenFraction', () => {
    test('counts the 3, 2 and A of a suit already played', () => {
        const view = observe(gameWith(suitPerSeatDeal(), [0, 0, 19, 29, 39, 2]), 1);
        expect(highCardsSeenFraction(view, 0)).toBe(2 / 3);
        expect(highCardsSeenFraction(view, 1)).toBe(0);
    });
});
