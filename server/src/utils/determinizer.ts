import { CardId, CardSet, Determinization, GameState, Hands, Observation, Seat, Suit } from '../types/game';
import { GameError } from '../types/errors';
import logger from '../logger';
import config from '../config';
import {
    EMPTY_SET,
    FULL_DECK,
    SEATS,
    SUITS,
    addCard,
    cardCount,
    cardSuit,
    cardsIn,
    difference,
    intersection,
    union,
} from './cards';
import { inferVoidSuits, remainingHandSize } from './observation';
import { Rng, pick, shuffleInPlace, shuffled } from './rng';

export interface DeterminizeOptions {
    // Hands remembered from earlier in the same hand, e.g. a partner's
    knownHands?: ReadonlyMap<Seat, CardSet>;
    maxAttempts?: number;
}

interface OpenSeat {
    seat: Seat;
    quota: number;
    allowed: Suit[];
}

/**
 * Sample one complete hidden state consistent with everything the observer
 * knows: their own hand, any known hands, the exact number of cards each
 * other seat still holds, and the suits those seats have shown void in.
 *
 * Seats are filled most-constrained first, each card drawn from the allowed
 * suit with the most cards left. When every attempt dead-ends the pool is
 * dealt ignoring voids and the result is tagged 'fallback'.
 */
export function determinize(observation: Observation, rng: Rng, options: DeterminizeOptions = {}): Determinization {
    const maxAttempts = options.maxAttempts ?? config.monteCarlo.determinizeAttempts;
    const hands: Hands = [EMPTY_SET, EMPTY_SET, EMPTY_SET, EMPTY_SET];
    const fixed = new Set<Seat>([observation.seat]);
    hands[observation.seat] = observation.hand;

    let taken = union(observation.playedMask, observation.hand);
    for (const [seat, known] of options.knownHands ?? []) {
        if (fixed.has(seat)) continue;
        const unplayed = difference(known, observation.playedMask);
        // Stale memory (another hand, or out of date) is ignored
        if (cardCount(unplayed) !== remainingHandSize(observation, seat)) continue;
        if (intersection(unplayed, taken) !== EMPTY_SET) continue;
        hands[seat] = unplayed;
        fixed.add(seat);
        taken = union(taken, unplayed);
    }
    const pool = difference(FULL_DECK, taken); // Cards nobody has seen

    const voids = inferVoidSuits(observation);
    const poolBySuit = SUITS.map(suit => cardsIn(pool).filter(card => cardSuit(card) === suit));

    const open: OpenSeat[] = SEATS
        .filter(seat => !fixed.has(seat))
        .map(seat => ({
            seat,
            quota: remainingHandSize(observation, seat),
            allowed: SUITS.filter(suit => !voids[seat]?.[suit]),
        }));

    const needed = open.reduce((n, entry) => n + entry.quota, 0);
    if (needed !== cardCount(pool)) {
        throw new GameError(
            `Pool of ${cardCount(pool)} unseen cards cannot fill ${needed} hidden slots in hand ${observation.gameId}`,
            undefined,
            'CORRUPT_STATE'
        );
    }

    // Fewest usable cards first, so tight seats are not starved by loose ones
    const capacity = (entry: OpenSeat) => entry.allowed.reduce<number>((n, suit) => n + (poolBySuit[suit]?.length ?? 0), 0);
    open.sort((a, b) => capacity(a) - capacity(b) || a.allowed.length - b.allowed.length || a.seat - b.seat);

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
        const dealt = dealConstrained(open, poolBySuit, rng);
        if (dealt) {
            for (const [seat, hand] of dealt) hands[seat] = hand;
            return { state: buildState(observation, hands), mode: 'constrained', attempts: attempt };
        }
    }

    logger.warn(`Determinizer gave up on void constraints after ${maxAttempts} attempts in hand ${observation.gameId}; dealing unconstrained`);
    // Hand sizes still hold, voids may not
    const loose = shuffled(cardsIn(pool), rng);
    for (const { seat, quota } of open) {
        hands[seat] = loose.splice(0, quota).reduce(addCard, EMPTY_SET);
    }
    return { state: buildState(observation, hands), mode: 'fallback', attempts: maxAttempts };
}

function dealConstrained(open: readonly OpenSeat[], poolBySuit: readonly CardId[][], rng: Rng): Map<Seat, CardSet> | null {
    const buckets = poolBySuit.map(cards => shuffleInPlace([...cards], rng));
    const dealt = new Map<Seat, CardSet>();

    for (const { seat, quota, allowed } of open) {
        let hand = EMPTY_SET;
        for (let n = 0; n < quota; n++) {
            let largest = 0;
            for (const suit of allowed) {
                largest = Math.max(largest, buckets[suit]?.length ?? 0);
            }
            if (largest === 0) return null;

            const candidates = allowed.filter(suit => (buckets[suit]?.length ?? 0) === largest);
            const card = buckets[pick(candidates, rng)]?.pop();
            if (card === undefined) return null;
            hand = addCard(hand, card);
        }
        dealt.set(seat, hand);
    }
    return dealt;
}

function buildState(observation: Observation, hands: Hands): GameState {
    return {
        id: observation.gameId,
        phase: observation.phase,
        hands,
        declarer: observation.declarer,
        currentPlayer: observation.currentPlayer,
        trumpSuit: observation.trumpSuit,
        currentTrick: {
            plays: observation.currentTrick.plays.map(play => ({ ...play })),
            leadSuit: observation.currentTrick.leadSuit,
        },
        trickIndex: observation.trickIndex,
        history: observation.history.slice(),
        scoresThirds: [observation.scoresThirds[0], observation.scoresThirds[1]],
        bonusTeam: observation.bonusTeam,
        playedMask: observation.playedMask,
        truncated: false,
    };
}
