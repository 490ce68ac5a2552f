import { Column, Entity, Index, PrimaryColumn } from 'typeorm';

@Entity('identities')
export class Identity {
  @PrimaryColumn({ name: 'identity_id' })
  identityId!: string;

  @Index({ unique: true })
  @Column({ name: 'display_code' })
  displayCode!: string;

  @Column({ name: 'representative_embedding', type: 'simple-json' })
  representativeEmbedding!: number[];

  @Column({ name: 'first_seen' })
  firstSeen!: Date;

  @Column({ name: 'last_seen' })
  lastSeen!: Date;

  @Column({ name: 'total_detections', type: 'integer', default: 1 })
  totalDetections!: number;

  // null until the first match; the registration event does not count
  @Column({ name: 'confidence_avg', type: 'double precision', nullable: true })
  confidenceAverage!: number | null;

  @Column({ name: 'age_estimate', type: 'integer', nullable: true })
  ageEstimate!: number | null;

  @Column({ name: 'gender_estimate', type: 'varchar', nullable: true })
  genderEstimate!: string | null;

  toPersonInfo(): PersonInfo {
    return {
      identity_id: this.identityId,
      person_code: this.displayCode,
      first_seen: this.firstSeen.toISOString(),
      last_seen: this.lastSeen.toISOString(),
      total_detections: this.totalDetections,
      avg_confidence:
        this.confidenceAverage === null
          ? null
          : Math.round(this.confidenceAverage * 10000) / 10000,
      estimated_age: this.ageEstimate,
      estimated_gender: this.genderEstimate,
    };
  }
}

export interface PersonInfo {
  identity_id: string;
  person_code: string;
  first_seen: string;
  last_seen: string;
  total_detections: number;
  avg_confidence: number | null;
  estimated_age: number | null;
  estimated_gender: string | null;
}
