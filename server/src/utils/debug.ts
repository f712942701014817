import logger from '../logger';
import { GameError } from '../types/errors';
import { GameState } from '../types/game';
import { EMPTY_SET, FULL_DECK, SEATS, cardCount, describeSet, intersection, union } from './cards';

// Hands are pairwise disjoint and, with the played cards, cover all 40 cards
export function checkCardConservation(game: GameState): boolean {
    let seen = game.playedMask;
    for (const seat of SEATS) {
        const hand = game.hands[seat];
        if (intersection(seen, hand) !== EMPTY_SET) return false;
        seen = union(seen, hand);
    }
    return seen === FULL_DECK;
}

export function debugPrintHands(game: GameState, context: string = ''): void {
    logger.debug(`🃏 Hands in ${game.id} ${context ? `(${context})` : ''}`);
    SEATS.forEach(seat => {
        const hand = game.hands[seat];
        const marker = seat === game.currentPlayer ? ' <- to act' : '';
        logger.debug(`  seat ${seat}: ${cardCount(hand)} cards [${describeSet(hand)}]${marker}`);
    });
    logger.debug(`  played: ${cardCount(game.playedMask)}/40`);

    if (!checkCardConservation(game)) {
        logger.error(`🚨 Card conservation broken in hand ${game.id}`);
        throw new GameError('Hands and played cards do not partition the deck', game, 'CORRUPT_STATE');
    }
}
