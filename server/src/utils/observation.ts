import { CardId, GameState, Observation, Seat, Suit, Team, VoidTable } from '../types/game';
import { GameError } from '../types/errors';
import { BONUS_RANKS, HAND_SIZE, SEATS, SUITS, bonusMask, cardCount, cardSuit, cardThirds, intersection, teamOf } from './cards';
import { followSuitCards, winningPlayIndex } from './rules';

/**
 * Project a GameState onto one seat. Public fields are copied, the seat's own
 * hand is the only private information carried over.
 */
export function observe(state: GameState, seat: Seat): Observation {
    const observation: Observation = {
        gameId: state.id,
        seat,
        hand: state.hands[seat],
        phase: state.phase,
        declarer: state.declarer,
        currentPlayer: state.currentPlayer,
        trumpSuit: state.trumpSuit,
        currentTrick: {
            plays: state.currentTrick.plays.map(play => ({ ...play })), // Copied so later plays don't leak in
            leadSuit: state.currentTrick.leadSuit,
        },
        trickIndex: state.trickIndex,
        scoresThirds: [state.scoresThirds[0], state.scoresThirds[1]],
        bonusTeam: state.bonusTeam,
        history: state.history.slice(),
        playedMask: state.playedMask,
        isTerminal: state.phase === 'finished',
    };

    if (cardCount(observation.hand) !== remainingHandSize(observation, seat)) {
        throw new GameError(
            `Seat ${seat} holds ${cardCount(observation.hand)} cards, expected ${remainingHandSize(observation, seat)}`,
            state,
            'CORRUPT_STATE'
        );
    }

    return observation;
}

export function hasPlayedInCurrentTrick(observation: Observation, seat: Seat): boolean {
    return observation.currentTrick.plays.some(play => play.seat === seat);
}

export function remainingHandSize(observation: Observation, seat: Seat): number {
    // One card per finished trick, plus one if already in this trick
    const played = Math.min(observation.trickIndex, HAND_SIZE) + (hasPlayedInCurrentTrick(observation, seat) ? 1 : 0);
    return HAND_SIZE - played;
}

export function legalCardsFor(observation: Observation): CardId[] {
    if (observation.phase !== 'playing') return [];
    return followSuitCards(observation.hand, observation.currentTrick.leadSuit);
}

export function isFreshHand(observation: Observation): boolean {
    return observation.trickIndex === 0
        && observation.currentTrick.plays.length === 0
        && observation.playedMask === 0
        && observation.trumpSuit === null;
}

/**
 * Suits each seat has shown it cannot follow. Following suit is mandatory, so
 * any off-suit play in a trick proves the player was void in that trick's
 * lead suit for the rest of the hand.
 */
export function inferVoidSuits(observation: Observation): VoidTable {
    const voids = SEATS.map(() => SUITS.map(() => false));

    const markVoids = (leadSuit: number, seat: Seat, card: CardId) => {
        if (cardSuit(card) === leadSuit) return;
        const row = voids[seat];
        if (row) row[leadSuit] = true;
    };

    for (const trick of observation.history) {
        for (const { seat, card } of trick.plays) {
            markVoids(trick.leadSuit, seat, card);
        }
    }

    const { plays, leadSuit } = observation.currentTrick;
    if (leadSuit !== null) {
        for (const { seat, card } of plays) {
            markVoids(leadSuit, seat, card);
        }
    }

    return voids;
}

// Points already committed to the trick in progress
export function pointsOnTable(observation: Observation): number {
    return observation.currentTrick.plays.reduce((total, { card }) => total + cardThirds(card), 0) / 3;
}

export function currentWinningTeam(observation: Observation): Team | null {
    const { plays } = observation.currentTrick;
    if (plays.length === 0) return null;

    const winning = plays[winningPlayIndex(plays, observation.trumpSuit)];
    return winning ? teamOf(winning.seat) : null;
}

export function winsIfPlayed(observation: Observation, card: CardId): boolean {
    const { plays } = observation.currentTrick;
    if (plays.length === 0) return false;

    const extended = [...plays, { seat: observation.seat, card }];
    return winningPlayIndex(extended, observation.trumpSuit) === plays.length;
}

// Share of the suit's 3, 2 and A already seen; playedMask includes the trick in progress
export function highCardsSeenFraction(observation: Observation, suit: Suit): number {
    return cardCount(intersection(observation.playedMask, bonusMask(suit))) / BONUS_RANKS.length;
}
