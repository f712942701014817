import { GameError } from './types/errors';

// Unset or empty falls back; anything else must be an integer no smaller than min
function readInt(name: string, fallback: number, min = 0): number {
    const raw = process.env[name];
    if (raw === undefined || raw === '') return fallback;

    const value = Number(raw);
    if (!Number.isInteger(value) || value < min) {
        throw new GameError(`${name} must be an integer of at least ${min}, got "${raw}"`, undefined, 'INVALID_CONFIG');
    }
    return value;
}

function readOptionalInt(name: string): number | undefined {
    const raw = process.env[name];
    if (raw === undefined || raw === '') return undefined;
    return readInt(name, 0);
}

export interface MonteCarloDefaults {
    samples: number; // at least 1
    horizon: number | undefined; // undefined plays every rollout to the end of the hand
    gateMaxChoices: number;
    determinizeAttempts: number;
}

export interface Config {
    nodeEnv: string;
    logLevel: string;
    monteCarlo: MonteCarloDefaults;
}

export function loadConfig(): Config {
    return {
        nodeEnv: process.env.NODE_ENV || 'development',
        logLevel: process.env.LOG_LEVEL || 'info',
        monteCarlo: {
            samples: readInt('MC_SAMPLES', 24, 1),
            horizon: readOptionalInt('MC_HORIZON'),
            gateMaxChoices: readInt('MC_GATE_MAX_CHOICES', 2),
            determinizeAttempts: readInt('DETERMINIZE_ATTEMPTS', 20, 1),
        },
    };
}

const config = loadConfig();

export default config;
