/**
 * Configuration Tests
 */

import { CONFIG, getConfig, validateConfig } from '../../../src/utils/config';
import { ConfigurationError } from '../../../src/utils/errors';

describe('config', () => {
  const originalEnv = { ...process.env };

  afterEach(() => {
    process.env = { ...originalEnv };
  });

  it('should default epsilon and dropoff to the standard schedule', () => {
    expect(CONFIG.rl.epsilon).toBe(0.01);
    expect(CONFIG.rl.epsilonDropoff).toBe(5.0);
  });

  it('should apply environment overrides', () => {
    process.env.RL_EPSILON = '0.2';
    process.env.RL_LEARNING_RATE = '0.3';
    process.env.TRAINING_EPISODES = '75';

    const config = getConfig();

    expect(config.rl.epsilon).toBe(0.2);
    expect(config.rl.learningRate).toBe(0.3);
    expect(config.training.episodes).toBe(75);
  });

  it('should accept the defaults', () => {
    delete process.env.RL_EPSILON;
    delete process.env.RL_LEARNING_RATE;
    delete process.env.RL_DISCOUNT;
    delete process.env.RL_MAX_STEPS;
    delete process.env.TRAINING_EPISODES;

    expect(() => validateConfig(getConfig())).not.toThrow();
  });

  it('should reject a learning rate above 1', () => {
    const config = getConfig();

    expect(() => validateConfig({ ...config, rl: { ...config.rl, learningRate: 1.5 } }))
      .toThrow(ConfigurationError);
  });

  it('should reject an unparsable epsilon', () => {
    process.env.RL_EPSILON = 'lots';

    expect(() => validateConfig(getConfig())).toThrow('RL epsilon must be a non-negative number');
  });

  it('should accept an epsilon above 1, as the table does', () => {
    delete process.env.RL_LEARNING_RATE;
    delete process.env.RL_DISCOUNT;
    delete process.env.RL_MAX_STEPS;
    delete process.env.TRAINING_EPISODES;
    process.env.RL_EPSILON = '1.5';

    expect(() => validateConfig(getConfig())).not.toThrow();
  });

  it('should reject a negative epsilon', () => {
    process.env.RL_EPSILON = '-0.1';

    expect(() => validateConfig(getConfig())).toThrow(ConfigurationError);
  });

  it('should reject a zero episode count', () => {
    const config = getConfig();

    expect(() => validateConfig({ ...config, training: { ...config.training, episodes: 0 } }))
      .toThrow(ConfigurationError);
  });
});
