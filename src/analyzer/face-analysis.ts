export interface ScoredAttribute {
  dominant: string;
  scores: Record<string, number>;
}

/**
 * Demographic payload reported by the analyzer for one face. Carried through
 * to detection events as-is.
 */
export interface FaceAttributes {
  age: number | null;
  gender?: ScoredAttribute;
  emotion?: ScoredAttribute;
  ethnicity?: ScoredAttribute;
}

export interface FaceAnalysis {
  facesFound: number;
  // Present only when exactly one face was found.
  embedding?: number[];
  attributes: FaceAttributes;
}

export const FACE_ANALYZER = 'FACE_ANALYZER';

export interface FaceAnalyzer {
  analyze(image: Buffer, filename: string): Promise<FaceAnalysis>;
}
