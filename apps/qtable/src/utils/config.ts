/**
 * Q-Table Configuration
 *
 * Central configuration for hyperparameters and runtime settings.
 */

import { ConfigurationError } from './errors';
import { epsilonSchema } from './validation';

/**
 * Main configuration object
 */
export const CONFIG = {
  /**
   * Reinforcement Learning Hyperparameters
   */
  rl: {
    epsilon: 0.01,            // Base exploration rate, approached as episodes grow
    epsilonDropoff: 5.0,      // Controls how fast exploration decays toward epsilon
    learningRate: 0.5,        // Step size of the Q-learning update (0 to 1)
    futureRewardDiscount: 1.0, // Discount applied to the next state's best value (0 to 1)
    maxStepsPerEpisode: 200,  // Step cap so cyclic state graphs still end an episode
  },

  /**
   * Training Loop Defaults
   */
  training: {
    episodes: 500,
    progressInterval: 50,     // Log progress every N episodes
  },

  /**
   * Logging Configuration
   */
  logging: {
    level: process.env.LOG_LEVEL || 'info',  // Log level: debug, info, warn, error
    pretty: process.env.NODE_ENV !== 'production',  // Pretty print logs in dev
  },
} as const;

const parseFloatEnv = (name: string, fallback: number): number => {
  const raw = process.env[name];
  return raw ? parseFloat(raw) : fallback;
};

const parseIntEnv = (name: string, fallback: number): number => {
  const raw = process.env[name];
  return raw ? parseInt(raw, 10) : fallback;
};

/**
 * Environment-specific configuration overrides
 */
export const getConfig = () => {
  const rl = {
    epsilon: parseFloatEnv('RL_EPSILON', CONFIG.rl.epsilon),
    epsilonDropoff: CONFIG.rl.epsilonDropoff,
    learningRate: parseFloatEnv('RL_LEARNING_RATE', CONFIG.rl.learningRate),
    futureRewardDiscount: parseFloatEnv('RL_DISCOUNT', CONFIG.rl.futureRewardDiscount),
    maxStepsPerEpisode: parseIntEnv('RL_MAX_STEPS', CONFIG.rl.maxStepsPerEpisode),
  };

  const training = {
    episodes: parseIntEnv('TRAINING_EPISODES', CONFIG.training.episodes),
    progressInterval: CONFIG.training.progressInterval,
  };

  return {
    ...CONFIG,
    rl,
    training,
  };
};

/**
 * Resolved configuration shape
 */
export type AppConfig = ReturnType<typeof getConfig>;

const inUnitInterval = (value: number): boolean =>
  Number.isFinite(value) && value >= 0 && value <= 1;

/**
 * Validate configuration on startup
 */
export const validateConfig = (config: AppConfig): void => {
  if (!epsilonSchema.safeParse(config.rl.epsilon).success) {
    throw new ConfigurationError('RL epsilon must be a non-negative number', { epsilon: config.rl.epsilon });
  }
  if (!inUnitInterval(config.rl.learningRate)) {
    throw new ConfigurationError('RL learning rate must be between 0 and 1', {
      learningRate: config.rl.learningRate,
    });
  }
  if (!inUnitInterval(config.rl.futureRewardDiscount)) {
    throw new ConfigurationError('RL discount must be between 0 and 1', {
      futureRewardDiscount: config.rl.futureRewardDiscount,
    });
  }
  if (!Number.isInteger(config.rl.maxStepsPerEpisode) || config.rl.maxStepsPerEpisode < 1) {
    throw new ConfigurationError('Max steps per episode must be a positive integer');
  }
  if (!Number.isInteger(config.training.episodes) || config.training.episodes < 1) {
    throw new ConfigurationError('Training episodes must be a positive integer');
  }
};
