import { Column, Entity, PrimaryColumn } from 'typeorm';

@Entity('fingerprints')
export class Fingerprint {
  @PrimaryColumn({ name: 'content_fingerprint' })
  contentFingerprint!: string;

  // first detection event produced from these bytes
  @Column({ name: 'event_id' })
  eventId!: string;

  @Column({ name: 'identity_id' })
  identityId!: string;

  @Column({ name: 'recorded_at' })
  recordedAt!: Date;

  @Column({ name: 'duplicate_hits', type: 'integer', default: 0 })
  duplicateHits!: number;
}
