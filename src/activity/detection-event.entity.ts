import {
  Column,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryColumn,
} from 'typeorm';
import { Identity } from '../gallery/identity.entity';
import { FaceAttributes } from '../analyzer/face-analysis';

export type DetectionKind = 'registration' | 'match';

@Entity('detection_events')
export class DetectionEvent {
  @PrimaryColumn({ name: 'event_id' })
  eventId!: string;

  @Index()
  @Column({ name: 'identity_id' })
  identityId!: string;

  @ManyToOne(() => Identity, { onDelete: 'RESTRICT', nullable: false })
  @JoinColumn({ name: 'identity_id' })
  identity?: Identity;

  @Index()
  @Column({ name: 'detected_at' })
  detectedAt!: Date;

  @Column({ name: 'kind', type: 'varchar' })
  kind!: DetectionKind;

  // null for the registration event: there was nothing to compare against
  @Column({ name: 'confidence', type: 'double precision', nullable: true })
  confidence!: number | null;

  @Index()
  @Column({ name: 'content_fingerprint' })
  contentFingerprint!: string;

  @Column({ name: 'attributes', type: 'simple-json', nullable: true })
  attributes!: FaceAttributes | null;

  toEventInfo(): DetectionEventInfo {
    return {
      event_id: this.eventId,
      identity_id: this.identityId,
      detected_at: this.detectedAt.toISOString(),
      kind: this.kind,
      confidence: this.confidence,
      content_fingerprint: this.contentFingerprint,
      attributes: this.attributes,
    };
  }
}

export interface DetectionEventInfo {
  event_id: string;
  identity_id: string;
  detected_at: string;
  kind: DetectionKind;
  confidence: number | null;
  content_fingerprint: string;
  attributes: FaceAttributes | null;
}
