import { RegistrationOutcome } from './registration-outcome';

const round = (value: number) => Math.round(value * 10000) / 10000;

/**
 * Wire shape of an outcome, as returned by `POST /check_person` and the
 * capture consumer.
 */
export function toRegistrationResponse(outcome: RegistrationOutcome) {
  switch (outcome.status) {
    case 'no_face':
      return {
        status: outcome.status,
        seen_before: false,
        message: 'No face detected in the image',
      };
    case 'multiple_faces':
      return {
        status: outcome.status,
        seen_before: false,
        faces_found: outcome.facesFound,
        message: `Multiple faces detected (${outcome.facesFound}). Please use an image with a single person.`,
      };
    case 'exact_duplicate':
      return {
        status: outcome.status,
        seen_before: true,
        event_id: outcome.eventId,
        identity_id: outcome.identityId,
        message: 'This exact same image was processed before',
      };
    case 'person_recognized':
      return {
        status: outcome.status,
        seen_before: true,
        identity_id: outcome.identityId,
        person_code: outcome.displayCode,
        confidence: round(outcome.confidence),
        first_seen: outcome.firstSeen.toISOString(),
        total_detections: outcome.totalDetections,
        avg_confidence:
          outcome.averageConfidence === null
            ? null
            : round(outcome.averageConfidence),
        analysis: outcome.attributes,
        message: `Person recognized! Seen ${outcome.totalDetections} times.`,
      };
    case 'new_person_registered':
      return {
        status: outcome.status,
        seen_before: false,
        identity_id: outcome.identityId,
        person_code: outcome.displayCode,
        analysis: outcome.attributes,
        message: `New person automatically registered as '${outcome.displayCode}'`,
      };
    case 'analysis_failed':
      return {
        status: outcome.status,
        seen_before: false,
        error: outcome.error,
        message: 'Face analysis failed',
      };
  }
}
