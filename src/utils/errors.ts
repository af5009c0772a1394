import type { ZodIssue } from 'zod';

export class DriftError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A snapshot source could not be read or is not a table -> columns mapping. */
export class LoadError extends DriftError {
  constructor(public readonly sourceId: string, reason: string, options?: { cause?: unknown }) {
    super(`Failed to load metadata from ${sourceId}: ${reason}`, options);
  }
}

/** A column descriptor is missing a required field or has one of the wrong kind. */
export class MalformedMetadataError extends DriftError {
  constructor(
    public readonly sourceId: string,
    public readonly table: string,
    public readonly index: number,
    public readonly field: string,
  ) {
    super(`Malformed metadata in ${sourceId}: table "${table}" column #${index} has no valid "${field}"`);
  }
}

export class DuplicateLabelError extends DriftError {
  constructor(public readonly label: string) {
    super(`Database label "${label}" is used more than once`);
  }
}

export class ConfigError extends DriftError {
  constructor(public readonly issues: ZodIssue[]) {
    super(`Invalid configuration: ${issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ')}`);
  }
}
