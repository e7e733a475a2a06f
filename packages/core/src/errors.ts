// ============================================================================
// @armory/core — Error Types
// ============================================================================

/**
 * Base error class for all Armory errors.
 */
export class ArmoryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ArmoryError';
  }
}

// ---------------------------------------------------------------------------
// Validation Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when an item is constructed from invalid fields.
 */
export class ItemValidationError extends ArmoryError {
  public readonly field: 'description' | 'cost' | 'value';
  public readonly reason: string;
  public readonly value: unknown;

  constructor(field: 'description' | 'cost' | 'value', reason: string, value: unknown) {
    super(`Invalid item ${field}: ${reason} (got ${JSON.stringify(value)})`);
    this.name = 'ItemValidationError';
    this.field = field;
    this.reason = reason;
    this.value = value;
  }
}

/**
 * Thrown when CLI flags or environment variables hold unusable values.
 */
export class ConfigError extends ArmoryError {
  public readonly field?: string;

  constructor(message: string, field?: string) {
    super(message);
    this.name = 'ConfigError';
    this.field = field;
  }
}

// ---------------------------------------------------------------------------
// Solver Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when the exhaustive solver is handed more items than its
 * 64-bit subset mask can enumerate.
 */
export class SubsetLimitExceededError extends ArmoryError {
  public readonly itemCount: number;
  public readonly maxItems: number;

  constructor(itemCount: number, maxItems: number) {
    super(
      `Exhaustive search supports at most ${maxItems} items, got ${itemCount}. Filter the collection first.`,
    );
    this.name = 'SubsetLimitExceededError';
    this.itemCount = itemCount;
    this.maxItems = maxItems;
  }
}

// ---------------------------------------------------------------------------
// Storage Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when the armor database cannot be read.
 */
export class DatabaseLoadError extends ArmoryError {
  public readonly operation: 'read';
  public readonly path: string;

  constructor(path: string, message: string) {
    super(`Database read failed: ${message}`);
    this.name = 'DatabaseLoadError';
    this.operation = 'read';
    this.path = path;
  }
}
