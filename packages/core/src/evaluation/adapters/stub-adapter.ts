import type { GoldAnswer } from '@graphgate/shared/src/types/evaluation.types.js';
import type { SystemAdapter } from './system-adapter.js';

/** Always abstains; the floor every other system is compared against. */
export function createStubAdapter(name = 'stub'): SystemAdapter {
  return {
    name,
    answer(): Promise<GoldAnswer> {
      return Promise.resolve('UNKNOWN');
    },
  };
}
