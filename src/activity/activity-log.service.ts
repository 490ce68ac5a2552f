import { Inject, Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, MoreThan, Repository } from 'typeorm';
import { v4 as uuidv4 } from 'uuid';
import { DetectionEvent, DetectionKind } from './detection-event.entity';
import { GalleryService } from '../gallery/gallery.service';
import { FingerprintService } from '../fingerprint/fingerprint.service';
import { FaceAttributes } from '../analyzer/face-analysis';
import { Clock, CLOCK } from '../shared/clock';

export const DEFAULT_RECENT_LIMIT = 20;
export const MAX_RECENT_LIMIT = 500;
const DAY_MS = 24 * 60 * 60 * 1000;

export interface NewDetectionEvent {
  identityId: string;
  kind: DetectionKind;
  confidence: number | null;
  contentFingerprint: string;
  attributes: FaceAttributes;
}

export interface ActivityStats {
  totalIdentities: number;
  totalDetections: number;
  totalExactDuplicates: number;
  detectionsLast24h: number;
  mostSeen: { displayCode: string; totalDetections: number } | null;
}

export function clampRecentLimit(limit?: number): number {
  if (limit === undefined || !Number.isFinite(limit)) {
    return DEFAULT_RECENT_LIMIT;
  }
  return Math.min(Math.max(Math.floor(limit), 1), MAX_RECENT_LIMIT);
}

/**
 * Append-only record of every non-duplicate detection. Reads do not take the
 * registration lock and may trail in-flight writes.
 */
@Injectable()
export class ActivityLogService {
  constructor(
    @InjectRepository(DetectionEvent)
    private eventRepository: Repository<DetectionEvent>,
    private galleryService: GalleryService,
    private fingerprintService: FingerprintService,
    @Inject(CLOCK) private clock: Clock,
  ) {}

  async append(
    event: NewDetectionEvent,
    manager?: EntityManager,
  ): Promise<DetectionEvent> {
    const repository = manager
      ? manager.getRepository(DetectionEvent)
      : this.eventRepository;

    return repository.save(
      repository.create({
        eventId: uuidv4(),
        detectedAt: this.clock.now(),
        ...event,
      }),
    );
  }

  async recent(limit?: number): Promise<DetectionEvent[]> {
    return this.eventRepository.find({
      order: { detectedAt: 'DESC' },
      take: clampRecentLimit(limit),
    });
  }

  async stats(): Promise<ActivityStats> {
    const since = new Date(this.clock.now().getTime() - DAY_MS);
    const [
      totalIdentities,
      totalDetections,
      totalExactDuplicates,
      detectionsLast24h,
      mostSeen,
    ] = await Promise.all([
      this.galleryService.count(),
      this.eventRepository.count(),
      this.fingerprintService.countDuplicates(),
      this.eventRepository.countBy({ detectedAt: MoreThan(since) }),
      this.galleryService.mostSeen(),
    ]);

    return {
      totalIdentities,
      totalDetections,
      totalExactDuplicates,
      detectionsLast24h,
      mostSeen: mostSeen
        ? {
            displayCode: mostSeen.displayCode,
            totalDetections: mostSeen.totalDetections,
          }
        : null,
    };
  }
}
