import { ActionEvaluation, CardId, CardSet, GameState, Observation, Policy, Seat, Suit } from '../types/game';
import { GameError } from '../types/errors';
import logger from '../logger';
import config from '../config';
import { SUIT_NAMES, describeCard, partnerOf, teamOf } from './cards';
import { HeuristicPolicy } from './bots';
import { determinize } from './determinizer';
import { applyAction, cloneState } from './gameLogic';
import { isFreshHand, pointsOnTable } from './observation';
import { Rng, createRng } from './rng';
import { rollout } from './rollout';

// Mixed into every decision seed so a policy never shares streams with a deal seeded alike
const DECISION_SALT = 'mc-decision';

export interface MonteCarloOptions {
    samples?: number;
    horizon?: number;
    seed?: string | number;
    baseline?: Policy;
    teamMemory?: boolean;
    materialityGate?: boolean;
    gateMaxChoices?: number;
    maxDeterminizeAttempts?: number;
    name?: string;
}

export interface SampledWorlds {
    worlds: GameState[];
    fallbacks: number;
}

export interface SearchResult {
    evaluations: ActionEvaluation[];
    fallbacks: number;
}

/**
 * Chooses by sampling hidden hands consistent with the observation, trying
 * every legal action on each sample and rolling out with a cheap baseline.
 *
 * With team memory on, one instance seated for both partners remembers each
 * partner's hand across decisions of the same hand and pins it in every
 * sample, so only the opponents' cards are guessed.
 */
export class MonteCarloPolicy implements Policy {
    readonly name: string;
    private readonly samples: number;
    private readonly horizon: number | undefined;
    private readonly seed: string;
    private readonly baseline: Policy;
    private readonly teamMemory: boolean;
    private readonly materialityGate: boolean;
    private readonly gateMaxChoices: number;
    private readonly maxDeterminizeAttempts: number;

    private readonly knownHands = new Map<Seat, CardSet>();
    private memoryGameId: string | null = null;

    constructor(options: MonteCarloOptions = {}) {
        this.name = options.name ?? 'monte_carlo';
        this.samples = options.samples ?? config.monteCarlo.samples;
        this.maxDeterminizeAttempts = options.maxDeterminizeAttempts ?? config.monteCarlo.determinizeAttempts;
        if (!Number.isInteger(this.samples) || this.samples < 1) {
            throw new GameError(`${this.name}: samples must be a positive integer, got ${this.samples}`, undefined, 'INVALID_CONFIG');
        }
        if (!Number.isInteger(this.maxDeterminizeAttempts) || this.maxDeterminizeAttempts < 1) {
            throw new GameError(`${this.name}: determinize attempts must be a positive integer, got ${this.maxDeterminizeAttempts}`, undefined, 'INVALID_CONFIG');
        }
        this.horizon = options.horizon ?? config.monteCarlo.horizon;
        this.seed = String(options.seed ?? 0);
        this.baseline = options.baseline ?? new HeuristicPolicy();
        this.teamMemory = options.teamMemory ?? true;
        this.materialityGate = options.materialityGate ?? true;
        this.gateMaxChoices = options.gateMaxChoices ?? config.monteCarlo.gateMaxChoices;
    }

    chooseTrump(observation: Observation, legalSuits: readonly Suit[]): Suit {
        this.remember(observation);
        const only = legalSuits.length === 1 ? legalSuits[0] : undefined;
        if (only !== undefined) return only;

        const { evaluations } = this.evaluate(observation, legalSuits);
        const best = bestEvaluation(evaluations);
        const suit = legalSuits.find(s => s === best.action) ?? legalSuits[0];
        if (suit === undefined) {
            throw new RangeError('No legal suit to declare');
        }

        logger.debug(`${this.name} seat ${observation.seat} declares ${SUIT_NAMES[suit]} (avg ${best.averageDifferential.toFixed(2)})`);
        return suit;
    }

    playCard(observation: Observation, legalCards: readonly CardId[]): CardId {
        this.remember(observation);
        const only = legalCards.length === 1 ? legalCards[0] : undefined;
        if (only !== undefined) return only;

        if (this.isLowStakes(observation, legalCards)) {
            return this.baseline.playCard(observation, legalCards);
        }

        const { evaluations, fallbacks } = this.evaluate(observation, legalCards);
        const best = bestEvaluation(evaluations);

        logger.debug(`${this.name} seat ${observation.seat} plays ${describeCard(best.action)} (avg ${best.averageDifferential.toFixed(2)} over ${best.samples} samples, ${fallbacks} unconstrained)`);
        return best.action;
    }

    /**
     * Average rollout differential for every candidate. All candidates are
     * scored on the same sampled worlds; ties keep the earlier candidate.
     */
    evaluate(observation: Observation, legal: readonly number[]): SearchResult {
        const team = teamOf(observation.seat);
        const { worlds, fallbacks } = this.sampleWorlds(observation, this.decisionRng(observation));

        const evaluations = legal.map(action => {
            let total = 0;
            for (const world of worlds) {
                const sample = cloneState(world); // Worlds are shared, so each candidate plays a copy
                applyAction(sample, action);
                total += rollout(sample, this.baseline, team, { horizon: this.horizon });
            }
            return { action, averageDifferential: total / worlds.length, samples: worlds.length };
        });

        return { evaluations, fallbacks };
    }

    /**
     * Draw the hidden states for one decision. With team memory the partner's
     * remembered hand is pinned in every world.
     */
    sampleWorlds(observation: Observation, rng: Rng): SampledWorlds {
        const knownHands = this.partnerMemory(observation);
        const worlds: GameState[] = [];
        let fallbacks = 0;
        for (let i = 0; i < this.samples; i++) {
            const { state, mode } = determinize(observation, rng, {
                knownHands,
                maxAttempts: this.maxDeterminizeAttempts,
            });
            if (mode === 'fallback') fallbacks++;
            worlds.push(state);
        }
        if (fallbacks > 0) {
            logger.warn(`${this.name}: ${fallbacks}/${this.samples} samples ignored void constraints in hand ${observation.gameId}`);
        }
        return { worlds, fallbacks };
    }

    rememberedHand(seat: Seat): CardSet | undefined {
        return this.knownHands.get(seat);
    }

    // Forget remembered hands; the next decision starts from scratch
    resetHand(): void {
        this.knownHands.clear();
        this.memoryGameId = null;
    }

    private remember(observation: Observation): void {
        if (isFreshHand(observation) || observation.gameId !== this.memoryGameId) {
            this.resetHand();
            this.memoryGameId = observation.gameId;
        }
        // Read back when the partner acts on this instance
        if (this.teamMemory) {
            this.knownHands.set(observation.seat, observation.hand);
        }
    }

    private partnerMemory(observation: Observation): ReadonlyMap<Seat, CardSet> | undefined {
        if (!this.teamMemory) return undefined;
        const partner = partnerOf(observation.seat);
        const hand = this.knownHands.get(partner);
        return hand === undefined ? undefined : new Map([[partner, hand]]);
    }

    // Nothing on the table and few options: not worth sampling
    private isLowStakes(observation: Observation, legalCards: readonly CardId[]): boolean {
        return this.materialityGate
            && pointsOnTable(observation) === 0
            && legalCards.length <= this.gateMaxChoices;
    }

    // Same seed and view give the same stream
    private decisionRng(observation: Observation): Rng {
        return createRng([
            this.seed,
            DECISION_SALT,
            observation.playedMask,
            observation.hand,
            observation.seat,
            observation.trickIndex,
        ].join(':'));
    }
}

function bestEvaluation(evaluations: readonly ActionEvaluation[]): ActionEvaluation {
    let best = evaluations[0];
    for (const evaluation of evaluations) {
        if (best === undefined || evaluation.averageDifferential > best.averageDifferential) {
            best = evaluation;
        }
    }
    if (best === undefined) {
        throw new RangeError('No candidate actions to evaluate');
    }
    return best;
}
