import type { Strategy } from './Strategy.ts';

import { HiddenSingleStrategy } from './HiddenSingleStrategy.ts';
import { NakedTwinsStrategy } from './NakedTwinsStrategy.ts';
import { SingleCandidateStrategy } from './SingleCandidateStrategy.ts';

export function createDefaultStrategies(): Strategy[] {
  return [
    new SingleCandidateStrategy(),
    new HiddenSingleStrategy(),
    new NakedTwinsStrategy()
  ];
}
