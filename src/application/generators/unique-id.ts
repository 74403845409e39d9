import { UniquenessExhaustedError } from '../../domain/errors/index.js';

// Number of distinct random (version 4) UUIDs
export const UUID_V4_CAPACITY = 2 ** 122;

// Refuse to fill more than this share of the id space
const SAFE_CAPACITY_RATIO = 0.5;

const DEFAULT_MAX_ATTEMPTS = 10;

export interface UniqueIdRegistryOptions {
  /** Size of the space `source` draws from, when known */
  capacity?: number;
  /** Draws allowed per id before giving up */
  maxAttempts?: number;
}

/**
 * Hands out ids from a random source, never the same one twice.
 *
 * Every issued id is kept in a set so a collision is caught at insertion
 * and redrawn.
 */
export class UniqueIdRegistry {
  private readonly issued = new Set<string>();
  private readonly capacity?: number;
  private readonly maxAttempts: number;

  constructor(
    private readonly source: () => string,
    options: UniqueIdRegistryOptions = {}
  ) {
    this.capacity = options.capacity;
    this.maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  }

  get size(): number {
    return this.issued.size;
  }

  has(id: string): boolean {
    return this.issued.has(id);
  }

  /**
   * Fails fast when `count` more ids would push the registry past the safe
   * share of its capacity.
   */
  reserve(count: number): void {
    if (this.capacity === undefined) {
      return;
    }

    const limit = Math.floor(this.capacity * SAFE_CAPACITY_RATIO);
    if (this.issued.size + count > limit) {
      throw new UniquenessExhaustedError(
        `Cannot issue ${count} more unique ids: ${this.issued.size} already issued, limit is ${limit}`,
        { requested: count, issued: this.issued.size, limit }
      );
    }
  }

  next(): string {
    for (let attempt = 0; attempt < this.maxAttempts; attempt++) {
      const candidate = this.source();
      if (!this.issued.has(candidate)) {
        this.issued.add(candidate);
        return candidate;
      }
    }

    throw new UniquenessExhaustedError(
      `No unused id found after ${this.maxAttempts} attempts`,
      { attempts: this.maxAttempts, issued: this.issued.size }
    );
  }
}
