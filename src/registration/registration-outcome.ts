import { FaceAttributes } from '../analyzer/face-analysis';

export interface NoFaceOutcome {
  status: 'no_face';
}

export interface MultipleFacesOutcome {
  status: 'multiple_faces';
  facesFound: number;
}

export interface ExactDuplicateOutcome {
  status: 'exact_duplicate';
  // the event recorded for the first submission of these bytes
  eventId: string;
  identityId: string;
}

export interface PersonRecognizedOutcome {
  status: 'person_recognized';
  identityId: string;
  displayCode: string;
  confidence: number;
  totalDetections: number;
  firstSeen: Date;
  averageConfidence: number | null;
  attributes: FaceAttributes;
}

export interface NewPersonRegisteredOutcome {
  status: 'new_person_registered';
  identityId: string;
  displayCode: string;
  attributes: FaceAttributes;
}

export interface AnalysisFailedOutcome {
  status: 'analysis_failed';
  error: string;
}

export type RegistrationOutcome =
  | NoFaceOutcome
  | MultipleFacesOutcome
  | ExactDuplicateOutcome
  | PersonRecognizedOutcome
  | NewPersonRegisteredOutcome
  | AnalysisFailedOutcome;

export type ResolvedOutcome =
  | PersonRecognizedOutcome
  | NewPersonRegisteredOutcome;
