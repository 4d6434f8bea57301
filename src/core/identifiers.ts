/**
 * Record identifier allocation
 */
import { randomBytes } from 'crypto';
import type { DescriptorModel, IdGenerator } from '../types/index.js';

const IDENTIFIER_PATTERN = /\b[0-9A-Fa-f]{24}\b/g;

/** Upper bound on collision retries before giving up */
const MAX_ATTEMPTS = 32;

/**
 * Every 24-hex token in the descriptor, including ids of records the model
 * does not type (targets, configurations, proxies)
 */
export function collectIdentifiers(model: DescriptorModel): Set<string> {
  const taken = new Set<string>();
  for (const match of model.text.matchAll(IDENTIFIER_PATTERN)) {
    taken.add(match[0].toUpperCase());
  }
  for (const id of model.objects.keys()) {
    taken.add(id.toUpperCase());
  }
  return taken;
}

/**
 * Random 96-bit identifiers, checked against `taken` and against everything
 * previously handed out
 */
export function createIdGenerator(
  taken: Set<string>,
  random: () => string = () => randomBytes(12).toString('hex').toUpperCase()
): IdGenerator {
  const used = new Set(taken);
  return {
    newIdentifier(): string {
      for (let attempt = 0; attempt < MAX_ATTEMPTS; attempt++) {
        const candidate = random();
        if (!used.has(candidate)) {
          used.add(candidate);
          return candidate;
        }
      }
      throw new Error(`Could not allocate a unique identifier after ${MAX_ATTEMPTS} attempts`);
    },
  };
}

/**
 * Deterministic generator: `prefix` followed by a zero-padded counter, skipping
 * anything already taken
 */
export function createSequentialIdGenerator(taken: Set<string> = new Set(), prefix = 'AA'): IdGenerator {
  let counter = 0;
  const next = () => {
    counter++;
    return `${prefix}${counter.toString(16).toUpperCase().padStart(24 - prefix.length, '0')}`;
  };
  return createIdGenerator(taken, next);
}
