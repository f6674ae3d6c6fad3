import { Result } from '../../utils/result';

/**
 * Value of a successful result; fails the test with the error otherwise
 */
export function expectOk<T, E>(result: Result<T, E>): T {
  if (!result.ok) {
    throw new Error(`Expected success, got ${JSON.stringify(result.error)}`);
  }
  return result.value;
}
