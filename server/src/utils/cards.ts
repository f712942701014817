import { CardId, CardSet, Seat, Suit, Team } from '../types/game';

export const NUM_PLAYERS = 4;
export const NUM_SUITS = 4;
export const NUM_RANKS = 10;
export const NUM_CARDS = 40;
export const NUM_TRICKS = 10;
export const HAND_SIZE = NUM_CARDS / NUM_PLAYERS;

// Awarded to the team holding 3, 2 and A of trump when trump is declared
export const BONUS_THIRDS = 9;

export const SUITS: readonly Suit[] = [0, 1, 2, 3];
export const SEATS: readonly Seat[] = [0, 1, 2, 3];

export const SUIT_NAMES: Record<Suit, string> = {
    0: 'coins',
    1: 'cups',
    2: 'swords',
    3: 'clubs',
};

const SUIT_SHORT: Record<Suit, string> = {
    0: 'Co',
    1: 'Cu',
    2: 'Sw',
    3: 'Cl',
};

// Rank indices, strongest first: 3 > 2 > A > K > N > J > 7 > 6 > 5 > 4
export const RANK_LABELS = ['3', '2', 'A', 'K', 'N', 'J', '7', '6', '5', '4'] as const;
const RANK_STRENGTH = [9, 8, 7, 6, 5, 4, 3, 2, 1, 0] as const;
const RANK_POINTS_THIRDS = [1, 1, 3, 1, 1, 1, 0, 0, 0, 0] as const;

// 3, 2 and A
export const BONUS_RANKS = [0, 1, 2] as const;

const CARD_IDS: readonly CardId[] = Array.from({ length: NUM_CARDS }, (_, card) => card);
const CARD_SUIT: readonly Suit[] = SUITS.flatMap(suit => Array.from({ length: NUM_RANKS }, () => suit));
const CARD_STRENGTH: readonly number[] = CARD_IDS.map(card => RANK_STRENGTH[card % NUM_RANKS] ?? 0);
const CARD_POINTS_THIRDS: readonly number[] = CARD_IDS.map(card => RANK_POINTS_THIRDS[card % NUM_RANKS] ?? 0);
const CARD_BIT: readonly number[] = CARD_IDS.map(card => 2 ** card);

export const TOTAL_THIRDS = CARD_POINTS_THIRDS.reduce((sum, thirds) => sum + thirds, 0);

export function isCardId(value: number): boolean {
    return Number.isInteger(value) && value >= 0 && value < NUM_CARDS;
}

export function isSuit(value: number): value is Suit {
    return value === 0 || value === 1 || value === 2 || value === 3;
}

export function cardSuit(card: CardId): Suit {
    const suit = CARD_SUIT[card];
    if (suit === undefined) {
        throw new RangeError(`Card id ${card} is out of range`);
    }
    return suit;
}

export function cardRank(card: CardId): number {
    return card % NUM_RANKS;
}

export function cardStrength(card: CardId): number {
    return CARD_STRENGTH[card] ?? 0;
}

export function cardThirds(card: CardId): number {
    return CARD_POINTS_THIRDS[card] ?? 0;
}

export function cardOf(suit: Suit, rank: number): CardId {
    return suit * NUM_RANKS + rank;
}

export function describeCard(card: CardId): string {
    return `${RANK_LABELS[cardRank(card)]} of ${SUIT_NAMES[cardSuit(card)]}`;
}

export function teamOf(seat: Seat): Team {
    return seat % 2 === 0 ? 0 : 1;
}

export function otherTeam(team: Team): Team {
    return team === 0 ? 1 : 0;
}

const NEXT_SEAT: Record<Seat, Seat> = { 0: 1, 1: 2, 2: 3, 3: 0 };
const PREVIOUS_SEAT: Record<Seat, Seat> = { 0: 3, 1: 0, 2: 1, 3: 2 };
const PARTNER: Record<Seat, Seat> = { 0: 2, 1: 3, 2: 0, 3: 1 };

export function nextSeat(seat: Seat): Seat {
    return NEXT_SEAT[seat];
}

export function previousSeat(seat: Seat): Seat {
    return PREVIOUS_SEAT[seat];
}

export function partnerOf(seat: Seat): Seat {
    return PARTNER[seat];
}

/* card sets */

// Bitwise operators truncate to 32 bits, so set algebra works on two 20-bit halves.
const HALF = 2 ** 20;

function low(set: CardSet): number {
    return set % HALF;
}

function high(set: CardSet): number {
    return Math.floor(set / HALF);
}

function join(lo: number, hi: number): CardSet {
    return hi * HALF + lo;
}

function popcount(bits: number): number {
    let count = 0;
    let rest = bits;
    while (rest) {
        rest &= rest - 1;
        count++;
    }
    return count;
}

export const EMPTY_SET: CardSet = 0;
export const FULL_DECK: CardSet = 2 ** NUM_CARDS - 1;

export function hasCard(set: CardSet, card: CardId): boolean {
    const bit = CARD_BIT[card];
    return bit !== undefined && Math.floor(set / bit) % 2 === 1;
}

export function addCard(set: CardSet, card: CardId): CardSet {
    return hasCard(set, card) ? set : set + (CARD_BIT[card] ?? 0);
}

export function removeCard(set: CardSet, card: CardId): CardSet {
    return hasCard(set, card) ? set - (CARD_BIT[card] ?? 0) : set;
}

export function union(a: CardSet, b: CardSet): CardSet {
    return join(low(a) | low(b), high(a) | high(b));
}

export function intersection(a: CardSet, b: CardSet): CardSet {
    return join(low(a) & low(b), high(a) & high(b));
}

export function difference(a: CardSet, b: CardSet): CardSet {
    return join(low(a) & ~low(b), high(a) & ~high(b));
}

export function cardCount(set: CardSet): number {
    return popcount(low(set)) + popcount(high(set));
}

// Ascending card ids
export function cardsIn(set: CardSet): CardId[] {
    const cards: CardId[] = [];
    for (const card of CARD_IDS) {
        if (hasCard(set, card)) cards.push(card);
    }
    return cards;
}

export function toCardSet(cards: Iterable<CardId>): CardSet {
    let set = EMPTY_SET;
    for (const card of cards) {
        set = addCard(set, card);
    }
    return set;
}

const SUIT_MASKS: readonly CardSet[] = SUITS.map(suit =>
    toCardSet(Array.from({ length: NUM_RANKS }, (_, rank) => cardOf(suit, rank)))
);

const BONUS_MASKS: readonly CardSet[] = SUITS.map(suit =>
    toCardSet(BONUS_RANKS.map(rank => cardOf(suit, rank)))
);

export function suitMask(suit: Suit): CardSet {
    return SUIT_MASKS[suit] ?? EMPTY_SET;
}

export function bonusMask(suit: Suit): CardSet {
    return BONUS_MASKS[suit] ?? EMPTY_SET;
}

export function cardsOfSuit(set: CardSet, suit: Suit): CardSet {
    return intersection(set, suitMask(suit));
}

export function describeSet(set: CardSet): string {
    return cardsIn(set).map(card => `${RANK_LABELS[cardRank(card)]}${SUIT_SHORT[cardSuit(card)]}`).join(' ');
}
