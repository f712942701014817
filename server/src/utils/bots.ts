import { CardId, Observation, Policy, Suit } from '../types/game';
import { GameError } from '../types/errors';
import {
    SUIT_NAMES,
    bonusMask,
    cardCount,
    cardOf,
    cardStrength,
    cardSuit,
    cardThirds,
    cardsIn,
    cardsOfSuit,
    describeCard,
    hasCard,
    intersection,
    nextSeat,
    partnerOf,
    previousSeat,
    teamOf,
} from './cards';
import { currentWinningTeam, highCardsSeenFraction, inferVoidSuits, pointsOnTable, winsIfPlayed } from './observation';
import { Rng, createRng, pick } from './rng';
import logger from '../logger';

export { HeuristicPolicy, HeroPolicy, RandomPolicy, DEFAULT_HEURISTIC_PARAMS, DEFAULT_HERO_WEIGHTS, HEURISTIC_PARAM_COUNT };
export type { HeroWeights };

// Trick index from which leading trump is no longer penalised
const LATE_HAND_TRICK = 7;

const HEURISTIC_PARAM_COUNT = 26;

/*
 * Tuned weights, grouped by decision:
 *  0-5   trump: count, points, strength, holds 3, holds 2, holds A
 *  6-10  lead: points, strength, trump penalty, late-hand trump relief, suit length
 *  11-12 partner winning: points-at-risk threshold, trick index threshold
 *  13-15 partner winning, overtake: thirds, strength, points on table
 *  16-18 partner winning, dump: thirds, strength, trump
 *  19-22 opponents winning, take: thirds, strength, trump, points on table
 *  23-25 cannot win, dump: thirds, strength, trump
 */
const DEFAULT_HEURISTIC_PARAMS: readonly number[] = [
    1.1958994967541685, 0.23732132780136353, 1.3145561114881144, 2.9150501916851876,
    2.1061757294197907, 2.2683148287656025, 1.155172106006112, 0.7173930080513861,
    4.0871172885377804, 0.3641083368279365, 0.47583165471112804, 2.0887888800332526,
    8.434659265083043, 1.0050785455262579, 0.9273591977417727, 0.381876215038942,
    0.7419534138672005, 1.4954955712462221, 1.6991269397494742, 1.9500378843662873,
    2.259093493950632, -0.6452249782432833, 2.1809659381862323, 0.8862483106944297,
    0.9269978097802034, 2.1438463666192784,
];

function argMax<T>(items: readonly T[], score: (item: T) => number): T {
    let best = items[0];
    let bestScore = -Infinity;
    for (const item of items) {
        const value = score(item);
        if (value > bestScore) {
            bestScore = value;
            best = item;
        }
    }
    if (best === undefined) {
        throw new RangeError('Cannot choose from an empty list');
    }
    return best;
}

function argMin<T>(items: readonly T[], score: (item: T) => number): T {
    return argMax(items, item => -score(item));
}

// Linear-scoring bot over observation features; stateless
class HeuristicPolicy implements Policy {
    readonly name: string;
    private readonly params: readonly number[];

    constructor(params: readonly number[] = DEFAULT_HEURISTIC_PARAMS, name: string = 'heuristic') {
        if (params.length !== HEURISTIC_PARAM_COUNT || params.some(p => !Number.isFinite(p))) {
            throw new GameError(`Heuristic needs ${HEURISTIC_PARAM_COUNT} finite weights, got ${params.length}`, undefined, 'INVALID_CONFIG');
        }
        this.params = [...params];
        this.name = name;
    }

    chooseTrump(observation: Observation, legalSuits: readonly Suit[]): Suit {
        const p = this.params;
        const hand = observation.hand;

        const suit = argMax(legalSuits, s => {
            const cards = cardsIn(cardsOfSuit(hand, s));
            const points = cards.reduce((sum, c) => sum + cardThirds(c) / 3, 0);
            const strength = cards.reduce((sum, c) => sum + cardStrength(c) / 9, 0);
            const has3 = hasCard(hand, cardOf(s, 0)) ? 1 : 0;
            const has2 = hasCard(hand, cardOf(s, 1)) ? 1 : 0;
            const hasAce = hasCard(hand, cardOf(s, 2)) ? 1 : 0;
            return p[0] * cards.length + p[1] * points + p[2] * strength + p[3] * has3 + p[4] * has2 + p[5] * hasAce;
        });

        logger.debug(`${this.name} seat ${observation.seat} declares ${SUIT_NAMES[suit]}`);
        return suit;
    }

    playCard(observation: Observation, legalCards: readonly CardId[]): CardId {
        const only = legalCards.length === 1 ? legalCards[0] : undefined;
        if (only !== undefined) return only;

        return observation.currentTrick.plays.length === 0
            ? this.selectLead(observation, legalCards)
            : this.selectFollow(observation, legalCards);
    }

    private selectLead(observation: Observation, legalCards: readonly CardId[]): CardId {
        const p = this.params;
        const late = observation.trickIndex >= LATE_HAND_TRICK ? 1 : 0;

        return argMax(legalCards, card => {
            const trump = cardSuit(card) === observation.trumpSuit ? 1 : 0;
            const suitLength = cardCount(cardsOfSuit(observation.hand, cardSuit(card)));
            return p[6] * (cardThirds(card) / 3)
                + p[7] * (cardStrength(card) / 9)
                - p[8] * trump
                + p[9] * trump * late
                + p[10] * (suitLength / 10);
        });
    }

    private selectFollow(observation: Observation, legalCards: readonly CardId[]): CardId {
        const p = this.params;
        const trumpOf = (card: CardId) => (cardSuit(card) === observation.trumpSuit ? 1 : 0);
        const partnerWinning = currentWinningTeam(observation) === teamOf(observation.seat);
        const onTable = pointsOnTable(observation);
        const winners = legalCards.filter(card => winsIfPlayed(observation, card));

        if (partnerWinning) {
            // Only overtake a winning partner when enough is at stake
            if (winners.length > 0 && (onTable >= p[11] || observation.trickIndex >= p[12])) {
                return argMin(winners, card => p[13] * cardThirds(card) + p[14] * cardStrength(card) - p[15] * onTable);
            }
            return argMin(legalCards, card => p[16] * cardThirds(card) + p[17] * cardStrength(card) + p[18] * trumpOf(card));
        }

        if (winners.length > 0) {
            return argMin(winners, card =>
                p[19] * cardThirds(card) + p[20] * cardStrength(card) + p[21] * trumpOf(card) - p[22] * onTable
            );
        }
        return argMin(legalCards, card => p[23] * cardThirds(card) + p[24] * cardStrength(card) + p[25] * trumpOf(card));
    }
}

/*
 * Second-generation heuristic. Adds public information to the trump and lead
 * scores: suits the other seats have shown void in, and how many of a suit's
 * 3, 2 and A have already gone.
 */
interface HeroWeights {
    trumpCount: number;
    trumpPoints: number;
    trumpStrength: number;
    trumpHoldsBonus: number;
    trumpVoids: number;
    trumpSeenHigh: number;
    leadPoints: number;
    leadStrength: number;
    leadTrumpPenalty: number;
    leadSuitLength: number;
    leadSeenHigh: number;
    followTakeStrength: number;
    followTakePoints: number;
    followDumpPoints: number;
    followDumpTrumpPenalty: number;
}

const DEFAULT_HERO_WEIGHTS: Readonly<HeroWeights> = {
    trumpCount: 1.2,
    trumpPoints: 0.25,
    trumpStrength: 1.3,
    trumpHoldsBonus: 2.6,
    trumpVoids: 0.25,
    trumpSeenHigh: 0.3,
    leadPoints: 1.1,
    leadStrength: 0.7,
    leadTrumpPenalty: 3.5,
    leadSuitLength: 0.6,
    leadSeenHigh: 0.8,
    followTakeStrength: 1.0,
    followTakePoints: 1.3,
    followDumpPoints: 1.0,
    followDumpTrumpPenalty: 1.2,
};

// Points on the table (whole points) worth overtaking a winning partner for
const HERO_OVERTAKE_POINTS = 1.5;

// A partner void counts for a quarter of an opponent void
const PARTNER_VOID_SHARE = 0.25;

class HeroPolicy implements Policy {
    readonly name: string;
    private readonly weights: Readonly<HeroWeights>;

    constructor(weights: Partial<HeroWeights> = {}, name: string = 'hero') {
        const merged = { ...DEFAULT_HERO_WEIGHTS, ...weights };
        if (Object.values(merged).some(w => !Number.isFinite(w))) {
            throw new GameError('Hero weights must all be finite', undefined, 'INVALID_CONFIG');
        }
        this.weights = merged;
        this.name = name;
    }

    chooseTrump(observation: Observation, legalSuits: readonly Suit[]): Suit {
        const w = this.weights;
        const { hand, seat } = observation;
        const voids = inferVoidSuits(observation);
        const opponents = [nextSeat(seat), previousSeat(seat)];

        const suit = argMax(legalSuits, s => {
            const cards = cardsIn(cardsOfSuit(hand, s));
            const points = cards.reduce((sum, c) => sum + cardThirds(c) / 3, 0);
            const strength = cards.reduce((sum, c) => sum + cardStrength(c) / 9, 0);
            const holdsBonus = intersection(hand, bonusMask(s)) === bonusMask(s) ? 1 : 0;

            // Opponents void in the suit make leading it later safer
            let voidScore = opponents.filter(opp => voids[opp]?.[s]).length;
            if (voids[partnerOf(seat)]?.[s]) voidScore += PARTNER_VOID_SHARE;

            return w.trumpCount * cards.length
                + w.trumpPoints * points
                + w.trumpStrength * strength
                + w.trumpHoldsBonus * holdsBonus
                + w.trumpVoids * voidScore
                + w.trumpSeenHigh * highCardsSeenFraction(observation, s);
        });

        logger.debug(`${this.name} seat ${seat} declares ${SUIT_NAMES[suit]}`);
        return suit;
    }

    playCard(observation: Observation, legalCards: readonly CardId[]): CardId {
        const only = legalCards.length === 1 ? legalCards[0] : undefined;
        if (only !== undefined) return only;

        return observation.currentTrick.plays.length === 0
            ? this.selectLead(observation, legalCards)
            : this.selectFollow(observation, legalCards);
    }

    // Long suits whose top cards are gone; trump is held back until late
    private selectLead(observation: Observation, legalCards: readonly CardId[]): CardId {
        const w = this.weights;
        const early = observation.trickIndex >= LATE_HAND_TRICK ? 0 : 1;

        return argMax(legalCards, card => {
            const suit = cardSuit(card);
            const trump = suit === observation.trumpSuit ? 1 : 0;
            return w.leadPoints * (cardThirds(card) / 3)
                + w.leadStrength * (cardStrength(card) / 9)
                - w.leadTrumpPenalty * trump * early
                + w.leadSuitLength * (cardCount(cardsOfSuit(observation.hand, suit)) / 10)
                + w.leadSeenHigh * highCardsSeenFraction(observation, suit);
        });
    }

    private selectFollow(observation: Observation, legalCards: readonly CardId[]): CardId {
        const w = this.weights;
        const trumpOf = (card: CardId) => (cardSuit(card) === observation.trumpSuit ? 1 : 0);
        const partnerWinning = currentWinningTeam(observation) === teamOf(observation.seat);
        const onTable = pointsOnTable(observation);
        const winners = legalCards.filter(card => winsIfPlayed(observation, card));

        if (partnerWinning) {
            if (winners.length > 0 && onTable >= HERO_OVERTAKE_POINTS) {
                return argMin(winners, card =>
                    w.followTakePoints * cardThirds(card) + w.followTakeStrength * cardStrength(card) - 0.8 * onTable
                );
            }
            return argMin(legalCards, card =>
                w.followDumpPoints * cardThirds(card) + 0.9 * cardStrength(card) + w.followDumpTrumpPenalty * trumpOf(card)
            );
        }

        // Cheapest winner, leaning towards taking points
        if (winners.length > 0) {
            return argMin(winners, card => cardThirds(card) + 1.2 * cardStrength(card) + 1.1 * trumpOf(card) - onTable);
        }
        return argMin(legalCards, card => cardThirds(card) + cardStrength(card) + trumpOf(card));
    }
}

// Uniform choice, used as a weak baseline. Each decision gets its own
// generator derived from the seed and the view, so the bot holds no state.
class RandomPolicy implements Policy {
    readonly name = 'random';
    private readonly seed: string;

    constructor(seed: string | number = 0) {
        this.seed = String(seed);
    }

    chooseTrump(observation: Observation, legalSuits: readonly Suit[]): Suit {
        return pick(legalSuits, this.decisionRng(observation));
    }

    playCard(observation: Observation, legalCards: readonly CardId[]): CardId {
        const card = pick(legalCards, this.decisionRng(observation));
        logger.debug(`random seat ${observation.seat} plays ${describeCard(card)}`);
        return card;
    }

    private decisionRng(observation: Observation): Rng {
        return createRng([
            this.seed,
            'random',
            observation.gameId,
            observation.phase,
            observation.playedMask,
            observation.hand,
            observation.seat,
        ].join(':'));
    }
}
