import { Inject, Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, Repository } from 'typeorm';
import md5 from 'md5';
import { Fingerprint } from './fingerprint.entity';
import { Clock, CLOCK } from '../shared/clock';

/**
 * Content hash of the raw upload, independent of what the face analyzer
 * makes of it.
 */
export function fingerprintOf(image: Buffer): string {
  return md5(image);
}

@Injectable()
export class FingerprintService {
  constructor(
    @InjectRepository(Fingerprint)
    private fingerprintRepository: Repository<Fingerprint>,
    @Inject(CLOCK) private clock: Clock,
  ) {}

  private repository(manager?: EntityManager): Repository<Fingerprint> {
    return manager
      ? manager.getRepository(Fingerprint)
      : this.fingerprintRepository;
  }

  async lookup(
    contentFingerprint: string,
    manager?: EntityManager,
  ): Promise<Fingerprint | null> {
    return this.repository(manager).findOneBy({ contentFingerprint });
  }

  async record(
    contentFingerprint: string,
    eventId: string,
    identityId: string,
    manager?: EntityManager,
  ): Promise<Fingerprint> {
    const repository = this.repository(manager);
    return repository.save(
      repository.create({
        contentFingerprint,
        eventId,
        identityId,
        recordedAt: this.clock.now(),
        duplicateHits: 0,
      }),
    );
  }

  async markDuplicate(
    contentFingerprint: string,
    manager?: EntityManager,
  ): Promise<void> {
    await this.repository(manager).increment(
      { contentFingerprint },
      'duplicateHits',
      1,
    );
  }

  async countDuplicates(): Promise<number> {
    return (await this.fingerprintRepository.sum('duplicateHits')) ?? 0;
  }
}
