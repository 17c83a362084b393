import { monotonicFactory } from 'ulidx';

const generateUlid = monotonicFactory();

/**
 * Generate a fresh subscription id.
 *
 * Monotonic ULIDs, so ids created in the same millisecond still sort in
 * creation order. 26 characters, well under the relay limit of 64.
 */
export function createSubscriptionId(): string {
  return generateUlid();
}
