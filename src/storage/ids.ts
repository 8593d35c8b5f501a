import { monotonicFactory } from 'ulid';

const ULID_PATTERN = /^[0-9A-HJKMNP-TV-Z]{26}$/;

// Monotonic so ids minted in the same millisecond still sort in creation order.
const nextUlid = monotonicFactory();

export function generateId(): string {
  return nextUlid();
}

/** Ids become directory names, so only well-formed ULIDs are accepted. */
export function isValidId(id: string): boolean {
  return ULID_PATTERN.test(id);
}
