import { v4 as uuidv4 } from 'uuid';
import { CardId, Deal, GameState, Hands, Observation, Seat, Suit, Team } from '../types/game';
import { GameError, InvalidActionError } from '../types/errors';
import logger from '../logger';
import {
    BONUS_THIRDS,
    EMPTY_SET,
    FULL_DECK,
    HAND_SIZE,
    NUM_CARDS,
    NUM_TRICKS,
    SEATS,
    SUITS,
    SUIT_NAMES,
    addCard,
    bonusMask,
    cardCount,
    cardSuit,
    describeCard,
    intersection,
    isCardId,
    isSuit,
    nextSeat,
    otherTeam,
    previousSeat,
    removeCard,
    teamOf,
    union,
} from './cards';
import { createRng, freshSeed, randomInt, shuffled } from './rng';
import { followSuitCards, resolveTrick } from './rules';
import { observe } from './observation';
import { debugPrintHands } from './debug';

const DECK: readonly CardId[] = Array.from({ length: NUM_CARDS }, (_, card) => card);

export function dealFromSeed(seed: string | number): Deal {
    const rng = createRng(seed);
    const deck = shuffled(DECK, rng);

    const hands: Hands = [EMPTY_SET, EMPTY_SET, EMPTY_SET, EMPTY_SET];
    deck.forEach((card, index) => {
        const seat = SEATS[index % SEATS.length] ?? 0;
        hands[seat] = addCard(hands[seat], card);
    });

    const declarer = SEATS[randomInt(rng, SEATS.length)] ?? 0;
    return { hands, declarer };
}

// Seat p takes the hand seat p - 1 held, so the same cards change team parity
export function rotateDeal(deal: Deal): Deal {
    const hands: Hands = [
        deal.hands[previousSeat(0)],
        deal.hands[previousSeat(1)],
        deal.hands[previousSeat(2)],
        deal.hands[previousSeat(3)],
    ];
    return { hands, declarer: nextSeat(deal.declarer) };
}

// Accepts loosely typed input so callers can check a deal read from outside
export function validateDeal(deal: { hands: Hands; declarer: number }): asserts deal is Deal {
    if (!SEATS.some(seat => seat === deal.declarer)) {
        throw new GameError(`Declarer ${deal.declarer} is not a seat`, undefined, 'INVALID_DEAL');
    }

    let seen = EMPTY_SET;
    for (const seat of SEATS) {
        const hand = deal.hands[seat];
        if (!Number.isInteger(hand) || hand < 0 || hand > FULL_DECK) {
            throw new GameError(`Hand for seat ${seat} is not a card set`, undefined, 'INVALID_DEAL');
        }
        if (cardCount(hand) !== HAND_SIZE) {
            throw new GameError(`Seat ${seat} was dealt ${cardCount(hand)} cards, expected ${HAND_SIZE}`, undefined, 'INVALID_DEAL');
        }
        if (intersection(seen, hand) !== EMPTY_SET) {
            throw new GameError(`Seat ${seat} shares cards with another hand`, undefined, 'INVALID_DEAL');
        }
        seen = union(seen, hand);
    }
    if (seen !== FULL_DECK) {
        throw new GameError('Deal does not cover the full deck', undefined, 'INVALID_DEAL');
    }
}

/**
 * Start a hand. A seed (or no argument, for a fresh random seed) shuffles
 * and deals; an explicit Deal is validated and used as given.
 */
export function createGame(source: string | number | Deal = freshSeed()): GameState {
    let deal: Deal;
    if (typeof source === 'object') {
        validateDeal(source);
        deal = { hands: [...source.hands], declarer: source.declarer };
    } else {
        deal = dealFromSeed(source);
    }

    const game: GameState = {
        id: uuidv4(),
        phase: 'trump_selection',
        hands: deal.hands,
        declarer: deal.declarer,
        currentPlayer: deal.declarer,
        trumpSuit: null,
        currentTrick: { plays: [], leadSuit: null },
        trickIndex: 0,
        history: [],
        scoresThirds: [0, 0],
        bonusTeam: null,
        playedMask: EMPTY_SET,
        truncated: false,
    };

    logger.debug(`Hand ${game.id} dealt, seat ${game.declarer} declares trump`);
    return game;
}

export function isTerminal(game: GameState): boolean {
    return game.phase === 'finished';
}

/**
 * Actions available to a seat: suit ids while trump is being chosen (declarer
 * only), card ids during play (current player only, follow-suit enforced).
 */
export function legalActions(game: GameState, seat: Seat): number[] {
    if (game.phase === 'finished' || seat !== game.currentPlayer) return [];

    if (game.phase === 'trump_selection') {
        return seat === game.declarer ? [...SUITS] : [];
    }

    return followSuitCards(game.hands[seat], game.currentTrick.leadSuit);
}

function declareTrump(game: GameState, suit: Suit): void {
    game.trumpSuit = suit;
    game.phase = 'playing';
    game.currentPlayer = game.declarer; // Declarer also leads the first trick

    // Bonus goes to whichever team holds the 3, 2 and A of trump between them
    const bonus = bonusMask(suit);
    const holdings: Record<Team, number> = {
        0: union(game.hands[0], game.hands[2]),
        1: union(game.hands[1], game.hands[3]),
    };
    if (intersection(holdings[0], bonus) === bonus) {
        game.bonusTeam = 0;
    } else if (intersection(holdings[1], bonus) === bonus) {
        game.bonusTeam = 1;
    } else {
        game.bonusTeam = null;
    }

    logger.debug(`Hand ${game.id}: trump is ${SUIT_NAMES[suit]}, bonus team ${game.bonusTeam ?? 'none'}`);
}

function playCard(game: GameState, seat: Seat, card: CardId): void {
    game.hands[seat] = removeCard(game.hands[seat], card);
    game.playedMask = addCard(game.playedMask, card);

    const trick = game.currentTrick;
    // First card sets the suit to follow
    if (trick.plays.length === 0) {
        trick.leadSuit = cardSuit(card);
    }
    trick.plays.push({ seat, card });

    if (trick.plays.length < SEATS.length) {
        game.currentPlayer = nextSeat(seat);
        return;
    }

    const leadSuit = trick.leadSuit ?? cardSuit(card);
    const { winner, thirds } = resolveTrick(trick.plays, game.trumpSuit);
    game.history.push({ leadSuit, plays: trick.plays, winner, thirds });
    game.scoresThirds[teamOf(winner)] += thirds;
    game.trickIndex++;

    game.currentTrick = { plays: [], leadSuit: null };
    game.currentPlayer = winner;

    if (logger.isDebugEnabled()) {
        logger.debug(`Hand ${game.id}: trick ${game.trickIndex} to seat ${winner} for ${thirds} thirds`);
        debugPrintHands(game, `after trick ${game.trickIndex}`);
    }

    // Last trick: add the bonus and close the hand
    if (game.trickIndex === NUM_TRICKS) {
        if (game.bonusTeam !== null) {
            game.scoresThirds[game.bonusTeam] += BONUS_THIRDS;
        }
        game.phase = 'finished';
        logger.debug(`Hand ${game.id} finished ${game.scoresThirds[0]}-${game.scoresThirds[1]} (thirds)`);
    }
}

/**
 * The single way a hand moves forward. Anything outside the current legal set,
 * including any action on a finished hand, is rejected.
 */
export function applyAction(game: GameState, action: number): Observation {
    const seat = game.currentPlayer;
    const legal = legalActions(game, seat);

    if (!legal.includes(action)) {
        const what = game.phase === 'trump_selection' ? `suit ${action}` : isCardId(action) ? describeCard(action) : `card ${action}`;
        logger.warn(`Rejected ${what} from seat ${seat} in hand ${game.id} (phase ${game.phase})`);
        throw new InvalidActionError(`Illegal action ${action} for seat ${seat} during ${game.phase}`, game, action, seat);
    }

    if (game.phase === 'trump_selection') {
        if (!isSuit(action)) {
            throw new InvalidActionError(`Action ${action} is not a suit`, game, action, seat);
        }
        declareTrump(game, action);
    } else {
        playCard(game, seat, action);
    }

    return observe(game, game.currentPlayer);
}

// Stops a hand early: bounded rollouts and the no-legal-action guard
export function forceTerminal(game: GameState): void {
    game.phase = 'finished';
    game.truncated = true;
}

export function cloneState(game: GameState): GameState {
    return {
        ...game,
        hands: [...game.hands],
        currentTrick: {
            plays: game.currentTrick.plays.map(play => ({ ...play })),
            leadSuit: game.currentTrick.leadSuit,
        },
        history: game.history.slice(),
        scoresThirds: [...game.scoresThirds],
    };
}

// Whole points; leftover thirds are dropped
export function teamPoints(game: GameState): [number, number] {
    return [Math.floor(game.scoresThirds[0] / 3), Math.floor(game.scoresThirds[1] / 3)];
}

export function scoreDifferential(game: GameState, team: Team): number {
    const points = teamPoints(game);
    return points[team] - points[otherTeam(team)];
}
