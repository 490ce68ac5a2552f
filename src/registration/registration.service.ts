import { Inject, Injectable, Logger } from '@nestjs/common';
import { DataSource, EntityManager } from 'typeorm';
import { Mutex } from 'async-mutex';
import {
  DEFAULT_THRESHOLD,
  Embedding,
  resolveThreshold,
} from '../comparator/embedding-comparator';
import {
  FACE_ANALYZER,
  FaceAnalysis,
  FaceAnalyzer,
  FaceAttributes,
} from '../analyzer/face-analysis';
import { GalleryService } from '../gallery/gallery.service';
import {
  fingerprintOf,
  FingerprintService,
} from '../fingerprint/fingerprint.service';
import { ActivityLogService } from '../activity/activity-log.service';
import { OutcomeNotifierService } from './outcome-notifier.service';
import {
  ExactDuplicateOutcome,
  NewPersonRegisteredOutcome,
  PersonRecognizedOutcome,
  RegistrationOutcome,
} from './registration-outcome';

export interface Submission {
  image: Buffer;
  filename?: string;
  threshold?: number;
}

type CommittedOutcome =
  | ExactDuplicateOutcome
  | PersonRecognizedOutcome
  | NewPersonRegisteredOutcome;

/**
 * Decides, for one captured face, between an exact re-submission, a known
 * identity and a new one.
 *
 * Bytes already fingerprinted are answered without calling the analyzer.
 * Otherwise face analysis runs before any lock is taken. The fingerprint
 * check, gallery lookup and the resulting writes then run under one
 * process-wide mutex and one transaction, so racing requests for the same
 * person or the same bytes cannot both register.
 */
@Injectable()
export class RegistrationService {
  private readonly logger = new Logger('Registration');
  private readonly lock = new Mutex();

  constructor(
    private dataSource: DataSource,
    private galleryService: GalleryService,
    private fingerprintService: FingerprintService,
    private activityLogService: ActivityLogService,
    private notifier: OutcomeNotifierService,
    @Inject(FACE_ANALYZER) private analyzer: FaceAnalyzer,
  ) {}

  async register(submission: Submission): Promise<RegistrationOutcome> {
    const threshold = resolveThreshold(submission.threshold);
    const fingerprint = fingerprintOf(submission.image);

    // Unlocked read; a miss here is settled again under the lock.
    if (await this.fingerprintService.lookup(fingerprint)) {
      const duplicate = await this.lock.runExclusive(() =>
        this.dataSource.transaction((manager) =>
          this.markIfDuplicate(manager, fingerprint),
        ),
      );
      if (duplicate) {
        this.logger.log(`${fingerprint}: ${summarize(duplicate)}`);
        return duplicate;
      }
    }

    let analysis: FaceAnalysis;
    try {
      analysis = await this.analyzer.analyze(
        submission.image,
        submission.filename ?? `${fingerprint}.jpg`,
      );
    } catch (err) {
      const error = err instanceof Error ? err.message : String(err);
      this.logger.warn(`Analysis failed for ${fingerprint}: ${error}`);
      return { status: 'analysis_failed', error };
    }

    return this.resolve(fingerprint, analysis, threshold);
  }

  async resolve(
    fingerprint: string,
    analysis: FaceAnalysis,
    threshold: number = DEFAULT_THRESHOLD,
  ): Promise<RegistrationOutcome> {
    resolveThreshold(threshold);

    if (analysis.facesFound === 0) return { status: 'no_face' };
    if (analysis.facesFound > 1) {
      return { status: 'multiple_faces', facesFound: analysis.facesFound };
    }

    const { embedding, attributes } = analysis;
    if (!embedding || embedding.length === 0) {
      return {
        status: 'analysis_failed',
        error: 'Analyzer reported a face without an embedding',
      };
    }

    const outcome = await this.lock.runExclusive(() =>
      this.dataSource.transaction((manager) =>
        this.decide(manager, fingerprint, embedding, attributes, threshold),
      ),
    );

    this.logger.log(`${fingerprint}: ${summarize(outcome)}`);
    if (outcome.status !== 'exact_duplicate') {
      this.notifier.notify(outcome);
    }
    return outcome;
  }

  private async decide(
    manager: EntityManager,
    fingerprint: string,
    embedding: Embedding,
    attributes: FaceAttributes,
    threshold: number,
  ): Promise<CommittedOutcome> {
    const duplicate = await this.markIfDuplicate(manager, fingerprint);
    if (duplicate) return duplicate;

    const match = await this.galleryService.bestMatch(
      embedding,
      threshold,
      manager,
    );

    if (match) {
      const identity = await this.galleryService.recordMatch(
        match.identityId,
        match.score,
        manager,
      );
      const event = await this.activityLogService.append(
        {
          identityId: identity.identityId,
          kind: 'match',
          confidence: match.score,
          contentFingerprint: fingerprint,
          attributes,
        },
        manager,
      );
      await this.fingerprintService.record(
        fingerprint,
        event.eventId,
        identity.identityId,
        manager,
      );

      return {
        status: 'person_recognized',
        identityId: identity.identityId,
        displayCode: identity.displayCode,
        confidence: match.score,
        totalDetections: identity.totalDetections,
        firstSeen: identity.firstSeen,
        averageConfidence: identity.confidenceAverage,
        attributes,
      };
    }

    const identity = await this.galleryService.insert(
      embedding,
      attributes,
      manager,
    );
    const event = await this.activityLogService.append(
      {
        identityId: identity.identityId,
        kind: 'registration',
        confidence: null,
        contentFingerprint: fingerprint,
        attributes,
      },
      manager,
    );
    await this.fingerprintService.record(
      fingerprint,
      event.eventId,
      identity.identityId,
      manager,
    );

    return {
      status: 'new_person_registered',
      identityId: identity.identityId,
      displayCode: identity.displayCode,
      attributes,
    };
  }

  private async markIfDuplicate(
    manager: EntityManager,
    fingerprint: string,
  ): Promise<ExactDuplicateOutcome | null> {
    const seen = await this.fingerprintService.lookup(fingerprint, manager);
    if (!seen) return null;

    await this.fingerprintService.markDuplicate(fingerprint, manager);
    return {
      status: 'exact_duplicate',
      eventId: seen.eventId,
      identityId: seen.identityId,
    };
  }
}

function summarize(outcome: CommittedOutcome): string {
  switch (outcome.status) {
    case 'exact_duplicate':
      return `exact duplicate of event ${outcome.eventId}`;
    case 'person_recognized':
      return `recognized ${outcome.displayCode} (${outcome.confidence.toFixed(4)})`;
    case 'new_person_registered':
      return `registered ${outcome.displayCode}`;
  }
}
