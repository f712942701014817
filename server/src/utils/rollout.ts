import { GameState, Policy, SeatPolicies, Seat, Team } from '../types/game';
import logger from '../logger';
import { isSuit } from './cards';
import { applyAction, forceTerminal, isTerminal, legalActions, scoreDifferential, teamPoints } from './gameLogic';
import { observe } from './observation';

export interface RolloutOptions {
    // Stop at the first trick boundary with trickIndex >= horizon
    horizon?: number;
}

function policyFor(policies: SeatPolicies, seat: Seat): Policy {
    return 'chooseTrump' in policies ? policies : policies[seat];
}

// One decision by the acting seat's policy, applied to the state
function advance(game: GameState, policies: SeatPolicies): boolean {
    const seat = game.currentPlayer;
    const legal = legalActions(game, seat);
    if (legal.length === 0) {
        logger.warn(`Seat ${seat} has no legal action in hand ${game.id} (phase ${game.phase}); ending it early`);
        forceTerminal(game);
        return false;
    }

    const policy = policyFor(policies, seat);
    const observation = observe(game, seat);
    const action = game.phase === 'trump_selection'
        ? policy.chooseTrump(observation, legal.filter(isSuit))
        : policy.playCard(observation, legal);
    applyAction(game, action);
    return true;
}

/**
 * Play a hypothesized state forward with fixed policies and report the score
 * differential for `team` in whole points. The state is consumed: pass a clone
 * when the input state is still needed.
 */
export function rollout(game: GameState, policies: SeatPolicies, team: Team, options: RolloutOptions = {}): number {
    const { horizon } = options;

    while (!isTerminal(game)) {
        if (horizon !== undefined && game.trickIndex >= horizon && game.currentTrick.plays.length === 0 && game.phase === 'playing') {
            forceTerminal(game); // No bonus; scored on thirds won so far
            break;
        }
        if (!advance(game, policies)) break;
    }

    return scoreDifferential(game, team);
}

// Play a hand to the end; whole points per team
export function playHand(game: GameState, policies: SeatPolicies): [number, number] {
    while (!isTerminal(game)) {
        if (!advance(game, policies)) break;
    }
    return teamPoints(game);
}
