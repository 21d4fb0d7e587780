import type { Document } from 'bson';

import { DriverInvalidArgumentError } from './error';
import type { TagSet } from './sdam/server_description';

/** @public */
export const ReadPreferenceMode = Object.freeze({
  primary: 'primary',
  primaryPreferred: 'primaryPreferred',
  secondary: 'secondary',
  secondaryPreferred: 'secondaryPreferred',
  nearest: 'nearest'
} as const);

/** @public */
export type ReadPreferenceMode = (typeof ReadPreferenceMode)[keyof typeof ReadPreferenceMode];

/** @public */
export type ReadPreferenceLike = ReadPreference | ReadPreferenceMode;

/** @public */
export interface ReadPreferenceOptions {
  /** Max secondary read staleness in seconds, Minimum value is 90 seconds.*/
  maxStalenessSeconds?: number;
}

/** @public */
export interface ReadPreferenceFromOptions {
  readPreference?:
    | ReadPreferenceLike
    | { mode: ReadPreferenceMode; tags?: TagSet[]; maxStalenessSeconds?: number };
  readPreferenceTags?: TagSet[];
  maxStalenessSeconds?: number;
}

/**
 * Parses a read preference mode, returning `null` for anything that is not one.
 * @internal
 */
export function parseReadPreferenceMode(mode: unknown): ReadPreferenceMode | null {
  return Object.values(ReadPreferenceMode).find(valid => valid === mode) ?? null;
}

/**
 * Which members of the deployment an operation may read from, optionally narrowed by tag sets and
 * a staleness bound.
 * @public
 */
export class ReadPreference {
  mode: ReadPreferenceMode;
  tags?: TagSet[];
  maxStalenessSeconds?: number;

  public static PRIMARY = ReadPreferenceMode.primary;
  public static PRIMARY_PREFERRED = ReadPreferenceMode.primaryPreferred;
  public static SECONDARY = ReadPreferenceMode.secondary;
  public static SECONDARY_PREFERRED = ReadPreferenceMode.secondaryPreferred;
  public static NEAREST = ReadPreferenceMode.nearest;

  public static primary = new ReadPreference(ReadPreferenceMode.primary);
  public static primaryPreferred = new ReadPreference(ReadPreferenceMode.primaryPreferred);
  public static secondary = new ReadPreference(ReadPreferenceMode.secondary);
  public static secondaryPreferred = new ReadPreference(ReadPreferenceMode.secondaryPreferred);
  public static nearest = new ReadPreference(ReadPreferenceMode.nearest);

  /**
   * @param mode - A string describing the read preference mode (primary|primaryPreferred|secondary|secondaryPreferred|nearest)
   * @param tags - A tag set used to target reads to members with the specified tag(s). tagSet is not available if using read preference mode primary.
   */
  constructor(mode: ReadPreferenceMode, tags?: TagSet[] | null, options?: ReadPreferenceOptions) {
    if (!ReadPreference.isValid(mode)) {
      throw new DriverInvalidArgumentError(`Invalid read preference mode ${JSON.stringify(mode)}`);
    }
    if (tags != null && !Array.isArray(tags)) {
      throw new DriverInvalidArgumentError('ReadPreference tags must be an array');
    }

    this.mode = mode;
    this.tags = tags ?? undefined;

    if (options?.maxStalenessSeconds != null) {
      if (options.maxStalenessSeconds <= 0) {
        throw new DriverInvalidArgumentError('maxStalenessSeconds must be a positive integer');
      }

      this.maxStalenessSeconds = options.maxStalenessSeconds;
    }

    if (this.mode === ReadPreference.PRIMARY) {
      if (this.tags && this.tags.length > 0) {
        throw new DriverInvalidArgumentError(
          'Primary read preference cannot be combined with tags'
        );
      }

      if (this.maxStalenessSeconds) {
        throw new DriverInvalidArgumentError(
          'Primary read preference cannot be combined with maxStalenessSeconds'
        );
      }
    }
  }

  static fromString(mode: string): ReadPreference {
    const parsed = parseReadPreferenceMode(mode);
    if (parsed == null) {
      throw new DriverInvalidArgumentError(`Invalid read preference mode ${JSON.stringify(mode)}`);
    }
    return new ReadPreference(parsed);
  }

  /**
   * Construct a ReadPreference given an options object.
   *
   * @param options - The options object from which to extract the read preference.
   */
  static fromOptions(options?: ReadPreferenceFromOptions): ReadPreference | undefined {
    const readPreference = options?.readPreference;
    if (options == null || readPreference == null) {
      return;
    }

    if (readPreference instanceof ReadPreference) {
      return readPreference;
    }

    if (typeof readPreference === 'string') {
      return new ReadPreference(readPreference, options.readPreferenceTags, {
        maxStalenessSeconds: options.maxStalenessSeconds
      });
    }

    return new ReadPreference(readPreference.mode, readPreference.tags, {
      maxStalenessSeconds: readPreference.maxStalenessSeconds
    });
  }

  /**
   * Validate if a mode is legal
   *
   * @param mode - The string representing the read preference mode.
   */
  static isValid(mode: string): boolean {
    return parseReadPreferenceMode(mode) != null;
  }

  /**
   * Validate if a mode is legal
   *
   * @param mode - The string representing the read preference mode.
   */
  isValid(mode?: string): boolean {
    return ReadPreference.isValid(typeof mode === 'string' ? mode : this.mode);
  }

  /**
   * Check if the two ReadPreferences are equivalent
   *
   * @param readPreference - The read preference with which to check equality
   */
  equals(readPreference: ReadPreference): boolean {
    return readPreference.mode === this.mode;
  }

  /** Return JSON representation */
  toJSON(): Document {
    const readPreference: Document = { mode: this.mode };
    if (Array.isArray(this.tags)) readPreference.tags = this.tags;
    if (this.maxStalenessSeconds) readPreference.maxStalenessSeconds = this.maxStalenessSeconds;
    return readPreference;
  }
}
