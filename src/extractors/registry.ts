import { NoStrategyError } from '../utils/errors.js';
import { AbercrombieExtractor } from './abercrombie-extractor.js';
import type { ExtractionStrategy } from './base-extractor.js';

/**
 * Ordered list of site strategies.
 *
 * Resolution is first-match-wins in registration order. Patterns are expected
 * not to overlap; nothing checks that, so the earlier registrant silently wins.
 */
export class ExtractorRegistry {
  private readonly strategies: ExtractionStrategy[];

  constructor(strategies: ExtractionStrategy[] = defaultStrategies()) {
    this.strategies = [...strategies];
  }

  register(strategy: ExtractionStrategy): void {
    this.strategies.push(strategy);
  }

  resolve(url: string): ExtractionStrategy {
    const strategy = this.strategies.find(s => s.matches(url));
    if (!strategy) {
      throw new NoStrategyError(url);
    }
    return strategy;
  }

  list(): readonly ExtractionStrategy[] {
    return this.strategies;
  }
}

export function defaultStrategies(): ExtractionStrategy[] {
  return [new AbercrombieExtractor()];
}
