import { Injectable } from '@nestjs/common';
import {
  compareEmbeddings,
  Embedding,
  isCandidateMatch,
} from '../comparator/embedding-comparator';

export const IDENTITY_MATCHER = 'IDENTITY_MATCHER';

export interface MatchCandidate {
  identityId: string;
  firstSeen: Date;
  embedding: Embedding;
}

export interface GalleryMatch {
  identityId: string;
  score: number;
}

export interface IdentityMatcher {
  bestMatch(
    query: Embedding,
    candidates: readonly MatchCandidate[],
    threshold: number,
  ): GalleryMatch | null;
}

// Equal scores go to the oldest identity, then to the smaller id.
function outranks(
  candidate: MatchCandidate,
  score: number,
  best: { candidate: MatchCandidate; score: number },
): boolean {
  if (score !== best.score) return score > best.score;
  const age =
    candidate.firstSeen.getTime() - best.candidate.firstSeen.getTime();
  if (age !== 0) return age < 0;
  return candidate.identityId < best.candidate.identityId;
}

/**
 * Exhaustive comparison against every identity in the gallery.
 */
@Injectable()
export class LinearScanMatcher implements IdentityMatcher {
  bestMatch(
    query: Embedding,
    candidates: readonly MatchCandidate[],
    threshold: number,
  ): GalleryMatch | null {
    let best: { candidate: MatchCandidate; score: number } | null = null;

    for (const candidate of candidates) {
      const score = compareEmbeddings(query, candidate.embedding);
      if (best === null || outranks(candidate, score, best)) {
        best = { candidate, score };
      }
    }

    if (best === null || !isCandidateMatch(best.score, threshold)) return null;
    return { identityId: best.candidate.identityId, score: best.score };
  }
}
