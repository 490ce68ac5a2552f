import { Injectable } from '@nestjs/common';
import moment from 'moment';
import { customAlphabet } from 'nanoid';
import { IdentityCodeCollisionError } from '../shared/errors';

export const DISPLAY_CODE_GENERATOR = 'DISPLAY_CODE_GENERATOR';

export const DISAMBIGUATOR_LENGTH = 4;
const MAX_SEQUENCE = 10 ** DISAMBIGUATOR_LENGTH - 1;

export interface DisplayCodeGenerator {
  generate(timestamp: Date): string;
}

/**
 * Minute-granularity bucket shared by every code generated within the same
 * UTC minute, e.g. `20260301_0945`.
 */
export function displayCodeBucket(timestamp: Date): string {
  return moment.utc(timestamp).format('YYYYMMDD_HHmm');
}

@Injectable()
export class RandomDisplayCodeGenerator implements DisplayCodeGenerator {
  private readonly disambiguator = customAlphabet(
    '0123456789',
    DISAMBIGUATOR_LENGTH,
  );

  generate(timestamp: Date): string {
    return `PERSON_${displayCodeBucket(timestamp)}_${this.disambiguator()}`;
  }
}

/**
 * Counts 0001..9999 within each minute bucket. Deterministic, so tests can
 * assert exact codes.
 */
export class SequentialDisplayCodeGenerator implements DisplayCodeGenerator {
  private readonly counters = new Map<string, number>();

  generate(timestamp: Date): string {
    const bucket = displayCodeBucket(timestamp);
    const next = (this.counters.get(bucket) ?? 0) + 1;
    if (next > MAX_SEQUENCE) {
      throw new IdentityCodeCollisionError(bucket);
    }
    this.counters.set(bucket, next);
    return `PERSON_${bucket}_${String(next).padStart(DISAMBIGUATOR_LENGTH, '0')}`;
  }
}
