export * from './types/game';
export { GameError, InvalidActionError } from './types/errors';
export type { GameErrorCode } from './types/errors';
export { default as config, loadConfig } from './config';
export type { Config, MonteCarloDefaults } from './config';
export { default as logger } from './logger';

export {
    BONUS_THIRDS,
    HAND_SIZE,
    NUM_CARDS,
    NUM_TRICKS,
    RANK_LABELS,
    SEATS,
    SUITS,
    SUIT_NAMES,
    TOTAL_THIRDS,
    cardOf,
    cardRank,
    cardStrength,
    cardSuit,
    cardThirds,
    cardsIn,
    describeCard,
    hasCard,
    partnerOf,
    teamOf,
    toCardSet,
} from './utils/cards';
export { createRng } from './utils/rng';
export type { Rng } from './utils/rng';
export { followSuitCards, resolveTrick, trickThirds, winningPlayIndex } from './utils/rules';
export {
    applyAction,
    cloneState,
    createGame,
    dealFromSeed,
    forceTerminal,
    isTerminal,
    legalActions,
    rotateDeal,
    scoreDifferential,
    teamPoints,
    validateDeal,
} from './utils/gameLogic';
export {
    currentWinningTeam,
    highCardsSeenFraction,
    inferVoidSuits,
    isFreshHand,
    legalCardsFor,
    observe,
    pointsOnTable,
    remainingHandSize,
    winsIfPlayed,
} from './utils/observation';
export { checkCardConservation, debugPrintHands } from './utils/debug';
export { DEFAULT_HERO_WEIGHTS, DEFAULT_HEURISTIC_PARAMS, HEURISTIC_PARAM_COUNT, HeroPolicy, HeuristicPolicy, RandomPolicy } from './utils/bots';
export type { HeroWeights } from './utils/bots';
export { determinize } from './utils/determinizer';
export type { DeterminizeOptions } from './utils/determinizer';
export { playHand, rollout } from './utils/rollout';
export type { RolloutOptions } from './utils/rollout';
export { MonteCarloPolicy } from './utils/monteCarlo';
export type { MonteCarloOptions, SampledWorlds, SearchResult } from './utils/monteCarlo';
