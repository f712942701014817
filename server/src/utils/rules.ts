import { CardId, CardSet, Seat, Suit, TrickPlay } from '../types/game';
import { cardSuit, cardStrength, cardThirds, cardsIn, cardsOfSuit } from './cards';

// Must follow the lead suit when possible, otherwise anything goes
export function followSuitCards(hand: CardSet, leadSuit: Suit | null): CardId[] {
    if (leadSuit === null) return cardsIn(hand);

    const following = cardsOfSuit(hand, leadSuit);
    return following ? cardsIn(following) : cardsIn(hand);
}

/**
 * Index of the play currently winning a trick of 1..4 plays. When any trump
 * is on the table only trumps compete, otherwise only cards of the lead suit
 * (the first card's suit). Strength is unique within a suit, so there are no ties.
 */
export function winningPlayIndex(plays: readonly TrickPlay[], trumpSuit: Suit | null): number {
    const first = plays[0];
    if (!first) {
        throw new RangeError('Cannot resolve an empty trick');
    }

    const leadSuit = cardSuit(first.card);
    const trumpPlayed = trumpSuit !== null && plays.some(({ card }) => cardSuit(card) === trumpSuit);
    const eligibleSuit = trumpPlayed ? trumpSuit : leadSuit; // Only cards of this suit can take the trick

    let best = 0;
    let bestStrength = -1;
    plays.forEach(({ card }, index) => {
        if (cardSuit(card) !== eligibleSuit) return;
        const strength = cardStrength(card);
        if (strength > bestStrength) {
            bestStrength = strength;
            best = index;
        }
    });
    return best;
}

export function trickThirds(plays: readonly TrickPlay[]): number {
    return plays.reduce((total, { card }) => total + cardThirds(card), 0);
}

export function resolveTrick(plays: readonly TrickPlay[], trumpSuit: Suit | null): { winner: Seat; thirds: number } {
    const winning = plays[winningPlayIndex(plays, trumpSuit)];
    if (!winning) {
        throw new RangeError('Cannot resolve an empty trick');
    }
    return { winner: winning.seat, thirds: trickThirds(plays) };
}
