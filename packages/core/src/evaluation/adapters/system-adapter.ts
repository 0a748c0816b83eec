import type { GoldAnswer, TestCase } from '@graphgate/shared/src/types/evaluation.types.js';

/** A system under evaluation: answers a case with YES, NO or UNKNOWN. */
export interface SystemAdapter {
  readonly name: string;
  answer(testCase: TestCase): Promise<GoldAnswer>;
}
